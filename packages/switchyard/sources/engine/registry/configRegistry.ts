import { promises as fs } from "node:fs";

import { getLogger } from "../../log.js";
import { atomicWrite } from "../../util/atomicWrite.js";
import { freezeDeep } from "../../util/freezeDeep.js";
import { AsyncLock } from "../../util/lock.js";
import { commandTableDefault, commandTableIntrinsic, userTableDefault } from "./commandTableDefault.js";
import { commandTableParse } from "./commandTableParse.js";
import {
    type CommandDefinition,
    type CommandTable,
    ConfigParseError,
    type ConfigReloadResult,
    type RegistrySnapshot,
    type UserEntry,
    type UserTable
} from "./registryTypes.js";
import { userTableParse } from "./userTableParse.js";

export type ConfigRegistryOptions = {
    commandsPath: string;
    usersPath: string;
};

type SnapshotListener = (snapshot: RegistrySnapshot) => void;

const logger = getLogger("config.registry");

/**
 * Holds the live command and user tables as one frozen snapshot.
 * Reads are a single field load; reloads parse both files completely before swapping.
 */
export class ConfigRegistry {
    private readonly commandsPath: string;
    private readonly usersPath: string;
    private readonly intrinsic: CommandTable;
    private readonly reloadLock = new AsyncLock();
    private readonly listeners = new Set<SnapshotListener>();
    private current: RegistrySnapshot;
    private mtimes: { commands: number | null; users: number | null } = { commands: null, users: null };

    constructor(options: ConfigRegistryOptions) {
        this.commandsPath = options.commandsPath;
        this.usersPath = options.usersPath;
        this.intrinsic = commandTableParse(commandTableIntrinsic(), options.commandsPath);
        this.current = freezeDeep({ commands: { ...this.intrinsic }, users: {}, loadedAt: 0 });
    }

    /**
     * Creates missing table files with defaults and performs the first reload.
     * Expects: called once at startup; a parse failure here is fatal for the caller.
     */
    async load(): Promise<ConfigReloadResult> {
        await fileEnsure(this.commandsPath, commandTableDefault());
        await fileEnsure(this.usersPath, userTableDefault());
        return this.reload();
    }

    async reload(): Promise<ConfigReloadResult> {
        return this.reloadLock.inLock(async () => {
            let next: RegistrySnapshot;
            let mtimes: { commands: number | null; users: number | null };
            try {
                const [commandsFile, usersFile] = await Promise.all([
                    jsonFileRead(this.commandsPath),
                    jsonFileRead(this.usersPath)
                ]);
                const commands = commandTableParse(commandsFile.data, this.commandsPath);
                const users = userTableParse(usersFile.data, this.usersPath);
                next = freezeDeep({
                    commands: { ...this.intrinsic, ...commands },
                    users,
                    loadedAt: Date.now()
                });
                mtimes = { commands: commandsFile.mtimeMs, users: usersFile.mtimeMs };
            } catch (error) {
                const parseError =
                    error instanceof ConfigParseError
                        ? error
                        : new ConfigParseError(this.commandsPath, error instanceof Error ? error.message : String(error));
                logger.warn({ error: parseError }, "reload: Config reload rejected, keeping previous tables");
                return { ok: false, error: parseError };
            }

            this.current = next;
            this.mtimes = mtimes;
            const commandCount = Object.keys(next.commands).length;
            const userCount = Object.keys(next.users).length;
            logger.info({ commandCount, userCount }, "reload: Config tables swapped");
            for (const listener of this.listeners) {
                listener(next);
            }
            return { ok: true, commandCount, userCount };
        });
    }

    /**
     * Reloads when either file's mtime moved since the last successful reload.
     * Returns null when nothing changed.
     */
    async reloadIfChanged(): Promise<ConfigReloadResult | null> {
        const [commandsMtime, usersMtime] = await Promise.all([mtimeRead(this.commandsPath), mtimeRead(this.usersPath)]);
        if (commandsMtime === this.mtimes.commands && usersMtime === this.mtimes.users) {
            return null;
        }
        logger.debug({ commandsMtime, usersMtime }, "reload: Table files changed on disk");
        return this.reload();
    }

    snapshot(): CommandTable {
        return this.current.commands;
    }

    users(): UserTable {
        return this.current.users;
    }

    user(userId: string): UserEntry | null {
        return Object.hasOwn(this.current.users, userId) ? (this.current.users[userId] ?? null) : null;
    }

    command(token: string): CommandDefinition | null {
        const key = token.toLowerCase();
        const commands = this.current.commands;
        return Object.hasOwn(commands, key) ? (commands[key] ?? null) : null;
    }

    isAllowed(userId: string, token: string): boolean {
        const definition = this.command(token);
        if (!definition) {
            return false;
        }
        return definition.allowedUsers.length === 0 || definition.allowedUsers.includes(userId);
    }

    onChange(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
}

async function jsonFileRead(filePath: string): Promise<{ data: unknown; mtimeMs: number }> {
    let content: string;
    let mtimeMs: number;
    try {
        const stat = await fs.stat(filePath);
        mtimeMs = stat.mtimeMs;
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        throw new ConfigParseError(filePath, code === "ENOENT" ? "file not found" : `unreadable (${code ?? "unknown"})`);
    }
    try {
        return { data: JSON.parse(content) as unknown, mtimeMs };
    } catch (error) {
        throw new ConfigParseError(filePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }
}

async function mtimeRead(filePath: string): Promise<number | null> {
    try {
        return (await fs.stat(filePath)).mtimeMs;
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") {
            return null;
        }
        throw error;
    }
}

async function fileEnsure(filePath: string, content: Record<string, unknown>): Promise<void> {
    if ((await mtimeRead(filePath)) !== null) {
        return;
    }
    await atomicWrite(filePath, `${JSON.stringify(content, null, 4)}\n`);
    logger.info({ filePath }, "start: Created default table file");
}
