import { describe, expect, it, vi } from "vitest";

import type { CommandTable, ConfigReloadResult } from "../registry/registryTypes.js";
import { ConfigParseError } from "../registry/registryTypes.js";
import { commandBuiltinsBuild, durationFormat } from "./commandBuiltins.js";
import type { BuiltinHandler, BuiltinInput } from "./commandTypes.js";
import type { MagnetHandlers } from "./magnetCommands.js";

const table: CommandTable = {
    "!ping": { token: "!ping", description: "Check the bot", allowedUsers: [], kind: "builtin", builtin: "ping", script: null },
    "!deploy": {
        token: "!deploy",
        description: "Deploy",
        allowedUsers: ["@admin:example.org"],
        kind: "script",
        builtin: null,
        script: "deploy.sh"
    },
    "!help": { token: "!help", description: "", allowedUsers: [], kind: "builtin", builtin: "help", script: null }
};

function inputBuild(token: string, userId = "@alice:example.org"): BuiltinInput {
    const definition = table[token] ?? table["!help"];
    if (!definition) {
        throw new Error("missing definition");
    }
    return { userId, roomId: null, token, args: "", definition };
}

function builtinsBuild(overrides: { reload?: () => Promise<ConfigReloadResult>; aiEnabled?: boolean } = {}) {
    const unused: BuiltinHandler = async (input) => ({ type: "ok", token: input.token, text: "unused" });
    const magnet: MagnetHandlers = { magnet: unused, magnet_config: unused, magnet_list: unused, magnet_info: unused };
    return commandBuiltinsBuild({
        registry: {
            snapshot: () => table,
            isAllowed: (userId, token) => {
                const definition = table[token];
                return definition !== undefined && (definition.allowedUsers.length === 0 || definition.allowedUsers.includes(userId));
            },
            reload: overrides.reload ?? (async () => ({ ok: true, commandCount: 3, userCount: 0 }))
        },
        aiEnabled: () => overrides.aiEnabled ?? false,
        magnet,
        startedAt: 0,
        now: () => 3_723_000,
        systemUptimeSeconds: () => 90_061,
        diskUsage: async () => "disk"
    });
}

describe("commandBuiltinsBuild", () => {
    it("lists only the commands the user may run", async () => {
        const handlers = builtinsBuild();

        const result = await handlers.help(inputBuild("!help"));

        expect(result).toEqual({
            type: "ok",
            token: "!help",
            text: "**Available Commands:**\n\n• `!help` - No description\n• `!ping` - Check the bot\n"
        });
    });

    it("adds the AI section for AI-enabled users", async () => {
        const handlers = builtinsBuild({ aiEnabled: true });

        const result = await handlers.help(inputBuild("!help", "@admin:example.org"));

        expect(result.type === "ok" && result.text).toBe(
            "**Available Commands:**\n\n• `!deploy` - Deploy\n• `!help` - No description\n• `!ping` - Check the bot\n" +
                "\n**AI Commands:**\n• Just send a message without `!` to chat with AI (if enabled for your user)\n"
        );
    });

    it("reports uptime for the bot and the system", async () => {
        const result = await builtinsBuild().uptime(inputBuild("!help"));

        expect(result.type === "ok" && result.text.split("\n").slice(0, 2)).toEqual([
            "⏱️ **Uptime:** 1 hour 2 minutes 3 seconds",
            "• **System:** 1 day 1 hour 1 minute 1 second"
        ]);
    });

    it("returns a config error when reload fails", async () => {
        const reload = vi.fn(async (): Promise<ConfigReloadResult> => ({
            ok: false,
            error: new ConfigParseError("/etc/commands.json", "invalid JSON")
        }));
        const handlers = builtinsBuild({ reload });

        const result = await handlers.reload(inputBuild("!help"));

        expect(result).toEqual({
            type: "config_parse_error",
            token: "!help",
            text: "❌ Reload failed: /etc/commands.json: invalid JSON"
        });
        expect(reload).toHaveBeenCalledTimes(1);
    });

    it("confirms a successful reload", async () => {
        const result = await builtinsBuild().reload(inputBuild("!help"));

        expect(result).toEqual({ type: "ok", token: "!help", text: "Commands reloaded successfully!" });
    });
});

describe("durationFormat", () => {
    it("formats whole seconds", () => {
        expect(durationFormat(61_900)).toBe("1 minute 1 second");
        expect(durationFormat(0)).toBe("0 seconds");
    });
});
