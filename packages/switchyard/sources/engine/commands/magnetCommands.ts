import { getLogger } from "../../log.js";
import { type DebridClient, DebridError, type DebridTorrentSummary, debridErrorText } from "../downloads/debridClient.js";
import type { DownloadTracker } from "../downloads/downloadTracker.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import type { BuiltinHandler, BuiltinInput, CommandResult } from "./commandTypes.js";

const logger = getLogger("commands.magnet");

const LIST_LIMIT = 10;
const LINKS_PER_TORRENT = 3;

const STATUS_EMOJI: Readonly<Record<string, string>> = {
    downloading: "⏳",
    queued: "⏸️",
    magnet_conversion: "🔄",
    waiting_files_selection: "⏸️",
    error: "❌"
};

export const DEBRID_KEY_MISSING_TEXT =
    "❌ RealDebrid API key not configured. Use `magnet-config <your_api_key>` to set it up.";

export type MagnetCommandsOptions = {
    debrid: Pick<DebridClient, "addMagnet" | "torrentInfo" | "selectFiles" | "torrentList" | "unrestrictLink" | "downloadList">;
    downloads: Pick<DownloadTracker, "submit">;
    sessions: Pick<SessionStore, "ensure" | "debridKeySet">;
};

export type MagnetHandlers = {
    magnet: BuiltinHandler;
    magnet_config: BuiltinHandler;
    magnet_list: BuiltinHandler;
    magnet_info: BuiltinHandler;
};

/**
 * Builds the debrid builtins. Each call uses the invoking user's own debrid key.
 */
export function magnetCommandsBuild(options: MagnetCommandsOptions): MagnetHandlers {
    const { debrid, downloads, sessions } = options;

    const keyResolve = (userId: string): string | null => sessions.ensure(userId).debridApiKey;
    const ok = (input: BuiltinInput, text: string): CommandResult => ({ type: "ok", token: input.token, text });
    const unavailable = (input: BuiltinInput, error: unknown): CommandResult => {
        logger.warn({ token: input.token, userId: input.userId, error }, "error: Debrid call failed");
        return { type: "backend_unavailable", token: input.token, text: debridErrorText(error) };
    };

    const magnet: BuiltinHandler = async (input) => {
        const link = input.args.trim();
        if (link.length === 0) {
            return ok(input, "Usage: `magnet magnet:?xt=urn:btih:...`");
        }
        if (!link.startsWith("magnet:")) {
            return ok(input, "❌ Invalid magnet link format. Must start with 'magnet:'");
        }
        const apiKey = keyResolve(input.userId);
        if (!apiKey) {
            return ok(input, DEBRID_KEY_MISSING_TEXT);
        }

        let torrentId: string;
        try {
            torrentId = (await debrid.addMagnet(apiKey, link)).id;
        } catch (error) {
            return unavailable(input, error);
        }

        let filename = "Unknown";
        let manualSelection = false;
        try {
            const info = await debrid.torrentInfo(apiKey, torrentId);
            filename = info.filename;
            if (info.status === "waiting_files_selection") {
                await debrid.selectFiles(apiKey, torrentId, "all");
            }
        } catch (error) {
            manualSelection = true;
            logger.warn({ torrentId, error }, "error: Could not start torrent after adding it");
        }

        const job = await downloads.submit({ torrentId, ownerId: input.userId, roomId: input.roomId, filename });
        logger.info({ torrentId, jobId: job.id, userId: input.userId }, "event: Magnet added");

        const lines = [
            "✅ **Torrent Added Successfully!**",
            "",
            `• **Torrent ID:** \`${torrentId}\``,
            `• **Filename:** ${filename}`,
            ""
        ];
        if (manualSelection) {
            lines.push(
                "⚠️ **Auto-start failed** - Please go to [RealDebrid Torrents](https://real-debrid.com/torrents) to manually select files and start the download.",
                ""
            );
        } else {
            lines.push("_Download started. Tracking progress..._ 📊", "");
        }
        lines.push("Use `magnet-list` to see download links when ready.");
        return ok(input, lines.join("\n"));
    };

    const magnet_config: BuiltinHandler = async (input) => {
        const apiKey = input.args.trim();
        if (apiKey.length === 0 || /\s/.test(apiKey)) {
            return ok(input, "Usage: `magnet-config <your_real_debrid_api_key>`");
        }
        await sessions.debridKeySet(input.userId, apiKey);
        logger.info({ userId: input.userId }, "event: Debrid key stored");
        return ok(input, "✅ RealDebrid API key configured successfully!");
    };

    const magnet_list: BuiltinHandler = async (input) => {
        const apiKey = keyResolve(input.userId);
        if (!apiKey) {
            return ok(input, DEBRID_KEY_MISSING_TEXT);
        }
        let torrents: DebridTorrentSummary[];
        try {
            torrents = await debrid.torrentList(apiKey);
        } catch (error) {
            return unavailable(input, error);
        }
        if (torrents.length === 0) {
            return ok(input, "📭 No torrents found.");
        }

        let text = `📊 **Your Torrents (${torrents.length})**\n\n`;
        for (const torrent of torrents.slice(0, LIST_LIMIT)) {
            text += await torrentLineBuild(torrent, apiKey);
            text += "\n";
        }
        if (torrents.length > LIST_LIMIT) {
            text += `... and ${torrents.length - LIST_LIMIT} more\n`;
        }
        return ok(input, text);
    };

    const torrentLineBuild = async (torrent: DebridTorrentSummary, apiKey: string): Promise<string> => {
        if (torrent.status !== "downloaded") {
            const emoji = STATUS_EMOJI[torrent.status] ?? "📦";
            return `${emoji} **${torrent.filename}** - Status: \`${torrent.status}\`\n`;
        }
        const links = torrent.links ?? [];
        if (links.length === 0) {
            return `⏳ **${torrent.filename}** - Processing... (ID: \`${torrent.id}\`)\n`;
        }
        let text = `✅ **${torrent.filename}**\n`;
        for (const link of links.slice(0, LINKS_PER_TORRENT)) {
            try {
                const unrestricted = await debrid.unrestrictLink(apiKey, link);
                text += `  📥 [${unrestricted.filename}](${unrestricted.download})\n`;
            } catch (error) {
                logger.warn({ torrentId: torrent.id, error }, "error: Failed to unrestrict link");
            }
        }
        if (links.length > LINKS_PER_TORRENT) {
            text += `  ... and ${links.length - LINKS_PER_TORRENT} more files\n`;
        }
        return text;
    };

    const magnet_info: BuiltinHandler = async (input) => {
        const torrentId = input.args.trim();
        if (torrentId.length === 0) {
            return ok(input, "Usage: `magnet-info <torrent_id>`");
        }
        const apiKey = keyResolve(input.userId);
        if (!apiKey) {
            return ok(input, DEBRID_KEY_MISSING_TEXT);
        }

        let infoError: unknown;
        try {
            const info = await debrid.torrentInfo(apiKey, torrentId);
            return ok(
                input,
                [
                    `📋 **Torrent Info (ID: ${torrentId})**`,
                    "",
                    `• **Name:** ${info.filename}`,
                    `• **Status:** ${info.status}`,
                    `• **Progress:** ${info.progress ?? 0}%`,
                    `• **Bytes:** ${info.bytes ?? 0}`,
                    `• **Added:** ${info.added ?? "unknown"}`
                ].join("\n")
            );
        } catch (error) {
            infoError = error;
        }

        try {
            const downloadsList = await debrid.downloadList(apiKey);
            const found = downloadsList.find((entry) => entry.id === torrentId);
            if (found) {
                return ok(
                    input,
                    [
                        `✅ **Download Ready (ID: ${found.id})**`,
                        "",
                        `• **Filename:** ${found.filename}`,
                        `• **Link:** ${found.link}`,
                        `• **Size:** ${found.filesize ?? 0} bytes`,
                        `• **Added:** ${found.generated ?? "unknown"}`,
                        "",
                        "📥 **Direct Download:**",
                        found.download
                    ].join("\n")
                );
            }
        } catch (error) {
            return unavailable(input, error);
        }

        if (infoError instanceof DebridError && infoError.kind === "not_found") {
            return ok(
                input,
                [
                    `❌ **Torrent/Download not found** (ID: \`${torrentId}\`)`,
                    "",
                    "Possible reasons:",
                    "• Torrent was deleted from RealDebrid",
                    "• ID is incorrect (check with `magnet-list`)",
                    "• Torrent expired or failed to add",
                    "",
                    "Use `magnet-list` to see your active torrents and downloads."
                ].join("\n")
            );
        }
        return unavailable(input, infoError);
    };

    return { magnet, magnet_config, magnet_list, magnet_info };
}
