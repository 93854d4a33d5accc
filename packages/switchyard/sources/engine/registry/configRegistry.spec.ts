import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigRegistry } from "./configRegistry.js";
import { ConfigParseError } from "./registryTypes.js";

describe("ConfigRegistry", () => {
    let dir: string;
    let commandsPath: string;
    let usersPath: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "switchyard-registry-"));
        commandsPath = path.join(dir, "commands.json");
        usersPath = path.join(dir, "users.json");
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function writeJson(filePath: string, value: unknown, mtimeSeconds?: number): Promise<void> {
        await fs.writeFile(filePath, JSON.stringify(value), "utf8");
        if (mtimeSeconds !== undefined) {
            await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
        }
    }

    it("creates default tables on first load", async () => {
        const registry = new ConfigRegistry({ commandsPath, usersPath });

        const result = await registry.load();

        expect(result.ok).toBe(true);
        const table = registry.snapshot();
        expect(table["!help"]?.builtin).toBe("help");
        expect(table["!reload"]?.builtin).toBe("reload");
        expect(table["magnet-list"]?.builtin).toBe("magnet_list");
        expect(registry.users()).toEqual({});
        const written = JSON.parse(await fs.readFile(commandsPath, "utf8")) as { commands: Record<string, unknown> };
        expect(Object.keys(written.commands)).toEqual(["!help", "!ping", "!uptime", "!date", "!reload"]);
    });

    it("keeps the previous tables when a reload fails to parse", async () => {
        await writeJson(commandsPath, {
            commands: {
                "!deploy": { description: "Deploy", allowed_users: ["@admin:example.org"], type: "shell", script: "deploy.sh" }
            }
        });
        await writeJson(usersPath, { users: { "@admin:example.org": { ai_enabled: true } } });
        const registry = new ConfigRegistry({ commandsPath, usersPath });
        expect((await registry.reload()).ok).toBe(true);

        const before = registry.snapshot();
        const usersBefore = registry.users();
        expect(registry.isAllowed("@admin:example.org", "!deploy")).toBe(true);
        expect(registry.isAllowed("@eve:example.org", "!deploy")).toBe(false);

        await fs.writeFile(commandsPath, "{ not json", "utf8");
        const result = await registry.reload();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(ConfigParseError);
            expect(result.error.message).toContain("invalid JSON");
        }
        expect(registry.snapshot()).toBe(before);
        expect(registry.users()).toBe(usersBefore);
        expect(registry.isAllowed("@admin:example.org", "!deploy")).toBe(true);
        expect(registry.isAllowed("@eve:example.org", "!deploy")).toBe(false);
    });

    it("rejects tables with unknown builtins or missing scripts", async () => {
        await writeJson(commandsPath, {
            commands: {
                "!launch": { type: "builtin" },
                "!backup": { type: "shell", script: null }
            }
        });
        await writeJson(usersPath, { users: {} });
        const registry = new ConfigRegistry({ commandsPath, usersPath });

        const result = await registry.reload();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.message).toContain("unknown builtin !launch");
            expect(result.error.message).toContain("script is required for shell commands");
        }
        expect(Object.keys(registry.snapshot()).sort()).toEqual(["magnet", "magnet-config", "magnet-info", "magnet-list"]);
    });

    it("normalizes tokens and keeps script command lines as written", async () => {
        await writeJson(commandsPath, {
            commands: { "!Backup": { type: "shell", script: " ./scripts/backup.sh --full ", description: "Run backup" } }
        });
        await writeJson(usersPath, { users: {} });
        const registry = new ConfigRegistry({ commandsPath, usersPath });
        await registry.reload();

        expect(registry.command("!BACKUP")).toEqual({
            token: "!backup",
            description: "Run backup",
            allowedUsers: [],
            kind: "script",
            builtin: null,
            script: "./scripts/backup.sh --full"
        });
    });

    it("reloads only when a table file changed", async () => {
        await writeJson(commandsPath, { commands: {} }, 1_700_000_000);
        await writeJson(usersPath, { users: {} }, 1_700_000_000);
        const registry = new ConfigRegistry({ commandsPath, usersPath });
        await registry.reload();
        const changes: number[] = [];
        registry.onChange((snapshot) => changes.push(Object.keys(snapshot.users).length));

        expect(await registry.reloadIfChanged()).toBeNull();

        await writeJson(usersPath, { users: { "@alice:example.org": {} } }, 1_700_000_100);
        const result = await registry.reloadIfChanged();

        expect(result).toEqual({ ok: true, commandCount: 4, userCount: 1 });
        expect(changes).toEqual([1]);
        expect(registry.user("@alice:example.org")?.aiEnabled).toBe(false);
    });
});
