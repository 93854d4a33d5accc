import path from "node:path";

import { freezeDeep } from "../util/freezeDeep.js";
import type { Config, SettingsConfig } from "./configTypes.js";

export const DEFAULT_WEBHOOK_PORT = 23983;
export const DEFAULT_AI_ENDPOINT = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_DEBRID_ENDPOINT = "https://api.real-debrid.com/rest/1.0";

/**
 * Applies defaults to parsed settings and resolves file paths next to the settings file.
 * Expects: settings were produced by configSettingsParse.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const rootDir = path.dirname(resolvedSettingsPath);
    const resolvePath = (value: string | undefined, fallback: string) => path.resolve(rootDir, value ?? fallback);

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        rootDir,
        matrix: {
            homeserverUrl: settings.matrix.homeserverUrl,
            userId: settings.matrix.userId,
            accessToken: settings.matrix.accessToken,
            deviceId: settings.matrix.deviceId ?? null,
            defaultRoomId: settings.matrix.defaultRoomId ?? null,
            auditRoomId: settings.matrix.auditRoomId ?? null,
            autoJoin: settings.matrix.autoJoin ?? true,
            greeting: settings.matrix.greeting ?? "👋 Hi! Send `!help` to see what I can do."
        },
        webhook: {
            enabled: settings.webhook?.enabled ?? true,
            host: settings.webhook?.host ?? "0.0.0.0",
            port: settings.webhook?.port ?? DEFAULT_WEBHOOK_PORT,
            discordToken: settings.webhook?.discordToken ?? null
        },
        dispatcher: {
            queueCapacity: settings.dispatcher?.queueCapacity ?? 256,
            sendAttempts: settings.dispatcher?.sendAttempts ?? 3,
            sendBackoffMs: settings.dispatcher?.sendBackoffMs ?? 1_000,
            shutdownGraceMs: settings.dispatcher?.shutdownGraceMs ?? 5_000,
            partDelay: settings.dispatcher?.partDelay ?? true,
            commandPrefix: settings.dispatcher?.commandPrefix ?? "!",
            auditCommands: settings.dispatcher?.auditCommands ?? false
        },
        ai: {
            defaultTrigger: (settings.ai?.defaultTrigger ?? "subaru").toLowerCase(),
            defaultModel: settings.ai?.defaultModel ?? "gemini-2.0-flash-exp",
            timeoutMs: settings.ai?.timeoutMs ?? 90_000,
            endpoint: settings.ai?.endpoint ?? DEFAULT_AI_ENDPOINT
        },
        downloads: {
            pollIntervalMs: settings.downloads?.pollIntervalMs ?? 30_000,
            maxAgeMs: settings.downloads?.maxAgeMs ?? 86_400_000,
            endpoint: settings.downloads?.endpoint ?? DEFAULT_DEBRID_ENDPOINT
        },
        commands: {
            scriptTimeoutMs: settings.commands?.scriptTimeoutMs ?? 30_000,
            outputLimit: settings.commands?.outputLimit ?? 4_000
        },
        loginMonitor: {
            enabled: settings.loginMonitor?.enabled ?? false,
            path: settings.loginMonitor?.path ?? "/var/log/auth.log",
            intervalMs: settings.loginMonitor?.intervalMs ?? 1_000
        },
        paths: {
            commands: resolvePath(settings.paths?.commands, "commands.json"),
            users: resolvePath(settings.paths?.users, "users.json"),
            sessions: resolvePath(settings.paths?.sessions, "sessions.json"),
            downloads: resolvePath(settings.paths?.downloads, "downloads.json")
        }
    } satisfies Config);
}
