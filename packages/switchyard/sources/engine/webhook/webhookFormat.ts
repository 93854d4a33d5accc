import type { DiscordEmbed } from "../events/eventTypes.js";

export type NotifyPriority = "high" | "medium" | "low";

const PRIORITY_MARKERS: Record<NotifyPriority, string> = {
    high: "🔴",
    medium: "🟡",
    low: "🟢"
};

export function webhookLogFormat(input: { level: string; source: string; message: string }): string {
    return `📋 **[${input.level.toUpperCase()}]** ${input.source}\n${input.message}`;
}

/**
 * Unknown priorities get the low marker.
 */
export function webhookNotifyFormat(input: { title: string; message: string; priority: string }): string {
    const priority = input.priority.toLowerCase();
    const marker = priority === "high" || priority === "medium" ? PRIORITY_MARKERS[priority] : PRIORITY_MARKERS.low;
    return `${marker} **${input.title}**\n${input.message}`;
}

/**
 * Content first, then one `**title**\ndescription` block per embed; a username becomes a bold header line.
 */
export function webhookDiscordFormat(input: { content: string; username: string | null; embeds: readonly DiscordEmbed[] }): string {
    const blocks: string[] = [];
    const content = input.content.trim();
    if (input.username) {
        blocks.push(content.length > 0 ? `**${input.username}**\n${content}` : `**${input.username}**`);
    } else if (content.length > 0) {
        blocks.push(content);
    }
    for (const embed of input.embeds) {
        const lines: string[] = [];
        if (embed.title) {
            lines.push(`**${embed.title}**`);
        }
        if (embed.description) {
            lines.push(embed.description);
        }
        if (lines.length > 0) {
            blocks.push(lines.join("\n"));
        }
    }
    return blocks.join("\n\n");
}
