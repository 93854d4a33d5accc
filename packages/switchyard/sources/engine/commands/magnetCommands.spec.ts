import { describe, expect, it, vi } from "vitest";

import { DebridError, type DebridTorrentSummary } from "../downloads/debridClient.js";
import type { CommandDefinition } from "../registry/registryTypes.js";
import type { BuiltinInput } from "./commandTypes.js";
import { DEBRID_KEY_MISSING_TEXT, magnetCommandsBuild, type MagnetCommandsOptions } from "./magnetCommands.js";

const definition: CommandDefinition = {
    token: "magnet",
    description: "",
    allowedUsers: [],
    kind: "builtin",
    builtin: "magnet",
    script: null
};

function inputBuild(token: string, args: string): BuiltinInput {
    return { userId: "@alice:example.org", roomId: "!room:example.org", token, args, definition };
}

function optionsBuild(debridApiKey: string | null) {
    const debrid = {
        addMagnet: vi.fn(async (_apiKey: string, _magnet: string) => ({ id: "T1", uri: null })),
        torrentInfo: vi.fn(async (_apiKey: string, torrentId: string) => ({
            id: torrentId,
            filename: "ubuntu.iso",
            status: "waiting_files_selection",
            progress: 0,
            bytes: 2048,
            added: "2026-01-01T00:00:00.000Z"
        })),
        selectFiles: vi.fn(async (_apiKey: string, _torrentId: string, _files?: string) => {}),
        torrentList: vi.fn(async (_apiKey: string): Promise<DebridTorrentSummary[]> => []),
        unrestrictLink: vi.fn(async (_apiKey: string, link: string) => ({
            filename: `${link.slice(-1)}.bin`,
            download: `https://cdn.test/${link.slice(-1)}`
        })),
        downloadList: vi.fn(async (_apiKey: string) => [
            {
                id: "D9",
                filename: "movie.mkv",
                link: "https://debrid.test/d/9",
                download: "https://cdn.test/9",
                filesize: 10,
                generated: "2026-01-02"
            }
        ])
    };
    const downloads = {
        submit: vi.fn(async (input: { torrentId: string; ownerId: string; roomId: string | null; filename: string }) => ({
            ...input,
            id: "job-1",
            state: "submitted" as const,
            createdAt: 0,
            lastPolledAt: null,
            progress: 0,
            result: null,
            error: null
        }))
    };
    const debridKeySet = vi.fn(async (_userId: string, _apiKey: string) => {});
    const sessions = {
        ensure: () => ({
            userId: "@alice:example.org",
            history: [],
            maxHistory: 10,
            aiEnabled: false,
            triggers: {},
            apiKey: null,
            debridApiKey,
            usage: { aiRequests: 0, commands: 0 },
            createdAt: 0,
            updatedAt: 0
        }),
        debridKeySet
    };
    const options: MagnetCommandsOptions = { debrid, downloads, sessions };
    return { options, debrid, downloads, debridKeySet };
}

describe("magnetCommandsBuild", () => {
    it("requires a magnet link and a key", async () => {
        const withoutKey = magnetCommandsBuild(optionsBuild(null).options);
        const withKey = magnetCommandsBuild(optionsBuild("test-secret").options);

        expect(await withKey.magnet(inputBuild("magnet", ""))).toMatchObject({ text: "Usage: `magnet magnet:?xt=urn:btih:...`" });
        expect(await withKey.magnet(inputBuild("magnet", "http://x"))).toMatchObject({
            text: "❌ Invalid magnet link format. Must start with 'magnet:'"
        });
        expect(await withoutKey.magnet(inputBuild("magnet", "magnet:?xt=urn:btih:abc"))).toMatchObject({
            text: DEBRID_KEY_MISSING_TEXT
        });
    });

    it("adds the magnet, starts it and registers a download job", async () => {
        const { options, debrid, downloads } = optionsBuild("test-secret");
        const handlers = magnetCommandsBuild(options);

        const result = await handlers.magnet(inputBuild("magnet", "magnet:?xt=urn:btih:abc"));

        expect(debrid.addMagnet).toHaveBeenCalledWith("test-secret", "magnet:?xt=urn:btih:abc");
        expect(debrid.selectFiles).toHaveBeenCalledWith("test-secret", "T1", "all");
        expect(downloads.submit).toHaveBeenCalledWith({
            torrentId: "T1",
            ownerId: "@alice:example.org",
            roomId: "!room:example.org",
            filename: "ubuntu.iso"
        });
        expect(result.type).toBe("ok");
        expect(result.type === "ok" && result.text.split("\n").slice(0, 4)).toEqual([
            "✅ **Torrent Added Successfully!**",
            "",
            "• **Torrent ID:** `T1`",
            "• **Filename:** ubuntu.iso"
        ]);
    });

    it("reports debrid failures as backend unavailable", async () => {
        const { options, debrid } = optionsBuild("test-secret");
        debrid.addMagnet.mockRejectedValueOnce(new DebridError("invalid_key", 401, "Invalid RealDebrid API key"));

        const result = await magnetCommandsBuild(options).magnet(inputBuild("magnet", "magnet:?xt=urn:btih:abc"));

        expect(result).toEqual({ type: "backend_unavailable", token: "magnet", text: "❌ Invalid RealDebrid API key." });
    });

    it("stores the key in the session", async () => {
        const { options, debridKeySet } = optionsBuild(null);

        const result = await magnetCommandsBuild(options).magnet_config(inputBuild("magnet-config", " test-debrid "));

        expect(debridKeySet).toHaveBeenCalledWith("@alice:example.org", "test-debrid");
        expect(result).toMatchObject({ type: "ok", text: "✅ RealDebrid API key configured successfully!" });
    });

    it("lists torrents with unrestricted links", async () => {
        const { options, debrid } = optionsBuild("test-secret");
        debrid.torrentList.mockResolvedValueOnce([
            { id: "T1", filename: "done.iso", status: "downloaded", links: ["l1", "l2", "l3", "l4"] },
            { id: "T2", filename: "busy.iso", status: "downloading" },
            { id: "T3", filename: "odd.iso", status: "compressing" }
        ]);

        const result = await magnetCommandsBuild(options).magnet_list(inputBuild("magnet-list", ""));

        expect(result.type === "ok" && result.text).toBe(
            [
                "📊 **Your Torrents (3)**",
                "",
                "✅ **done.iso**",
                "  📥 [1.bin](https://cdn.test/1)",
                "  📥 [2.bin](https://cdn.test/2)",
                "  📥 [3.bin](https://cdn.test/3)",
                "  ... and 1 more files",
                "",
                "⏳ **busy.iso** - Status: `downloading`",
                "",
                "📦 **odd.iso** - Status: `compressing`",
                "",
                ""
            ].join("\n")
        );
    });

    it("falls back to the downloads list for magnet-info", async () => {
        const { options, debrid } = optionsBuild("test-secret");
        debrid.torrentInfo.mockRejectedValueOnce(new DebridError("not_found", 404, "Not found"));

        const result = await magnetCommandsBuild(options).magnet_info(inputBuild("magnet-info", "D9"));

        expect(result.type === "ok" && result.text.split("\n")[0]).toBe("✅ **Download Ready (ID: D9)**");
    });

    it("explains when nothing matches the id", async () => {
        const { options, debrid } = optionsBuild("test-secret");
        debrid.torrentInfo.mockRejectedValueOnce(new DebridError("not_found", 404, "Not found"));

        const result = await magnetCommandsBuild(options).magnet_info(inputBuild("magnet-info", "nope"));

        expect(result.type === "ok" && result.text.split("\n")[0]).toBe("❌ **Torrent/Download not found** (ID: `nope`)");
    });
});
