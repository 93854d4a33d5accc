import { format, formatDuration, intervalToDuration } from "date-fns";

import type { ConfigRegistry } from "../registry/configRegistry.js";
import type { BuiltinHandler, BuiltinHandlers, CommandResult } from "./commandTypes.js";
import { diskUsageRead } from "./diskUsage.js";
import type { MagnetHandlers } from "./magnetCommands.js";

export type CommandBuiltinsOptions = {
    registry: Pick<ConfigRegistry, "snapshot" | "isAllowed" | "reload">;
    /** Whether the user has AI chat enabled; adds the AI section to help. */
    aiEnabled: (userId: string) => boolean;
    magnet: MagnetHandlers;
    startedAt: number;
    now?: () => number;
    systemUptimeSeconds?: () => number;
    diskUsage?: () => Promise<string>;
};

/**
 * Builds the closed builtin dispatch table.
 */
export function commandBuiltinsBuild(options: CommandBuiltinsOptions): BuiltinHandlers {
    const now = options.now ?? Date.now;
    const diskUsage = options.diskUsage ?? diskUsageRead;
    const ok = (token: string, text: string): CommandResult => ({ type: "ok", token, text });

    const help: BuiltinHandler = async (input) => {
        const table = options.registry.snapshot();
        const lines = Object.keys(table)
            .sort()
            .filter((token) => options.registry.isAllowed(input.userId, token))
            .map((token) => `• \`${token}\` - ${table[token]?.description || "No description"}`);
        let text = `**Available Commands:**\n\n${lines.join("\n")}\n`;
        if (options.aiEnabled(input.userId)) {
            text += "\n**AI Commands:**\n• Just send a message without `!` to chat with AI (if enabled for your user)\n";
        }
        return ok(input.token, text);
    };

    const uptime: BuiltinHandler = async (input) => {
        const current = now();
        const lines = [`⏱️ **Uptime:** ${durationFormat(current - options.startedAt)}`];
        if (options.systemUptimeSeconds) {
            lines.push(`• **System:** ${durationFormat(options.systemUptimeSeconds() * 1000)}`);
        }
        lines.push(`• **Since:** ${format(options.startedAt, "yyyy-MM-dd HH:mm:ss")}`);
        return ok(input.token, lines.join("\n"));
    };

    return {
        help,
        ping: async (input) => ok(input.token, "Pong! 🏓"),
        uptime,
        date: async (input) => ok(input.token, `📅 ${format(now(), "EEEE, yyyy-MM-dd HH:mm:ss xxx")}`),
        reload: async (input) => {
            const result = await options.registry.reload();
            if (!result.ok) {
                return { type: "config_parse_error", token: input.token, text: `❌ Reload failed: ${result.error.message}` };
            }
            return ok(input.token, "Commands reloaded successfully!");
        },
        disk_usage: async (input) => ok(input.token, await diskUsage()),
        ...options.magnet
    };
}

export function durationFormat(durationMs: number): string {
    const duration = intervalToDuration({ start: 0, end: Math.max(0, Math.floor(durationMs / 1000) * 1000) });
    const text = formatDuration(duration, { format: ["years", "months", "days", "hours", "minutes", "seconds"] });
    return text.length > 0 ? text : "0 seconds";
}
