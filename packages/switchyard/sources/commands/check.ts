import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { ConfigRegistry } from "../engine/registry/configRegistry.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";

export type CheckOptions = {
    settings?: string;
};

/**
 * Validates settings and both tables without connecting anywhere.
 */
export async function checkCommand(options: CheckOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    let lines: string[];
    try {
        lines = await checkRun(settingsPath);
    } catch (error) {
        console.error(`FAIL: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
        return;
    }
    for (const line of lines) {
        console.log(line);
    }
}

export async function checkRun(settingsPath: string): Promise<string[]> {
    const config = await configLoad(settingsPath);
    const registry = new ConfigRegistry({ commandsPath: config.paths.commands, usersPath: config.paths.users });
    const result = await registry.reload();
    if (!result.ok) {
        throw result.error;
    }

    const lines = [
        `Settings: ${config.settingsPath}`,
        `Matrix: ${config.matrix.userId} on ${config.matrix.homeserverUrl}`,
        `Default room: ${config.matrix.defaultRoomId ?? "none"}`,
        `Audit room: ${config.matrix.auditRoomId ?? "default room"}`,
        `Webhook: ${config.webhook.enabled ? `${config.webhook.host}:${config.webhook.port}` : "disabled"}`,
        `Commands: ${result.commandCount}`
    ];
    for (const [token, definition] of Object.entries(registry.snapshot()).sort(([a], [b]) => a.localeCompare(b))) {
        const access = definition.allowedUsers.length === 0 ? "public" : `${definition.allowedUsers.length} user(s)`;
        const target = definition.kind === "builtin" ? `builtin ${definition.builtin ?? "?"}` : `script ${definition.script ?? "?"}`;
        lines.push(`  ${token}: ${target} (${access})`);
    }
    lines.push(`Users: ${result.userCount}`);
    for (const user of Object.values(registry.users())) {
        const triggers = Object.keys(user.triggers);
        const ai = user.aiEnabled ? `AI on (${triggers.length > 0 ? triggers.join(", ") : "no triggers"})` : "AI off";
        lines.push(`  ${user.userId}: ${ai}, debrid key ${user.debridApiKey ? "set" : "not set"}`);
    }
    return lines;
}
