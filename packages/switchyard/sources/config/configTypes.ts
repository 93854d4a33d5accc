import type { z } from "zod";

import type { settingsSchema } from "./configSettingsParse.js";

export type SettingsConfig = z.infer<typeof settingsSchema>;

export type MatrixConfig = {
    homeserverUrl: string;
    userId: string;
    accessToken: string;
    deviceId: string | null;
    defaultRoomId: string | null;
    auditRoomId: string | null;
    autoJoin: boolean;
    greeting: string | null;
};

export type WebhookConfig = {
    enabled: boolean;
    host: string;
    port: number;
    discordToken: string | null;
};

export type DispatcherConfig = {
    queueCapacity: number;
    sendAttempts: number;
    sendBackoffMs: number;
    shutdownGraceMs: number;
    partDelay: boolean;
    commandPrefix: string;
    auditCommands: boolean;
};

export type AiConfig = {
    defaultTrigger: string;
    defaultModel: string;
    timeoutMs: number;
    endpoint: string;
};

export type DownloadsConfig = {
    pollIntervalMs: number;
    maxAgeMs: number;
    endpoint: string;
};

export type CommandsConfig = {
    scriptTimeoutMs: number;
    outputLimit: number;
};

export type LoginMonitorConfig = {
    enabled: boolean;
    path: string;
    intervalMs: number;
};

export type PathsConfig = {
    commands: string;
    users: string;
    sessions: string;
    downloads: string;
};

export type Config = {
    settingsPath: string;
    rootDir: string;
    matrix: MatrixConfig;
    webhook: WebhookConfig;
    dispatcher: DispatcherConfig;
    ai: AiConfig;
    downloads: DownloadsConfig;
    commands: CommandsConfig;
    loginMonitor: LoginMonitorConfig;
    paths: PathsConfig;
};
