export const BUILTIN_KINDS = [
    "help",
    "ping",
    "uptime",
    "date",
    "reload",
    "disk_usage",
    "magnet",
    "magnet_config",
    "magnet_list",
    "magnet_info"
] as const;

export type BuiltinKind = (typeof BUILTIN_KINDS)[number];

export type CommandDefinition = {
    token: string;
    description: string;
    /** Empty means public. */
    allowedUsers: readonly string[];
    kind: "builtin" | "script";
    builtin: BuiltinKind | null;
    script: string | null;
};

export type CommandTable = Readonly<Record<string, CommandDefinition>>;

export type TriggerConfig = {
    apiKey: string | null;
    model: string | null;
    systemPrompt: string | null;
    maxHistory: number;
};

export type UserEntry = {
    userId: string;
    aiEnabled: boolean;
    triggers: Readonly<Record<string, TriggerConfig>>;
    apiKey: string | null;
    debridApiKey: string | null;
};

export type UserTable = Readonly<Record<string, UserEntry>>;

export type RegistrySnapshot = {
    commands: CommandTable;
    users: UserTable;
    loadedAt: number;
};

export type ConfigReloadResult = { ok: true; commandCount: number; userCount: number } | { ok: false; error: ConfigParseError };

/**
 * A command or user table that failed to read or validate.
 */
export class ConfigParseError extends Error {
    readonly filePath: string;

    constructor(filePath: string, message: string) {
        super(`${filePath}: ${message}`);
        this.name = "ConfigParseError";
        this.filePath = filePath;
    }
}
