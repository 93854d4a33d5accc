import type { DownloadJob } from "./downloadTypes.js";

const LINKS_SHOWN = 5;

/**
 * Composes the chat notification for a job in a terminal state.
 * Expects: job.state is ready, failed or expired.
 */
export function downloadMessageBuild(job: DownloadJob): string {
    const header = [`• **File:** ${job.filename}`, `• **Torrent ID:** ${job.torrentId}`];

    if (job.state === "ready") {
        const links = job.result?.links ?? [];
        let text = `✅ **Download complete!**\n\n${header.join("\n")}\n\n**Links:**\n`;
        if (links.length === 0) {
            return `${text}No links available yet`;
        }
        text += links
            .slice(0, LINKS_SHOWN)
            .map((link, index) => `${index + 1}. \`${link}\``)
            .join("\n");
        if (links.length > LINKS_SHOWN) {
            text += `\n... and ${links.length - LINKS_SHOWN} more links`;
        }
        return text;
    }

    if (job.state === "failed") {
        return `❌ **Download failed**\n\n${header.join("\n")}\n• **Reason:** ${job.error ?? "unknown"}`;
    }

    return `⌛ **Download expired**\n\n${header.join("\n")}\n• **Progress:** ${job.progress}%\n\nThe torrent did not finish in time and is no longer tracked.`;
}
