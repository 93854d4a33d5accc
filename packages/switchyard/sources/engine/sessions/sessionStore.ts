import { promises as fs } from "node:fs";

import { z } from "zod";

import { getLogger } from "../../log.js";
import { atomicWrite } from "../../util/atomicWrite.js";
import { freezeDeep } from "../../util/freezeDeep.js";
import { KeyedLock } from "../../util/keyedLock.js";
import { AsyncLock } from "../../util/lock.js";
import type { UserEntry, UserTable } from "../registry/registryTypes.js";
import { DEFAULT_MAX_HISTORY } from "../registry/userTableParse.js";
import { HistoryRing } from "./historyRing.js";
import type { HistoryEntry, Session, SessionHandle, SessionUsage } from "./sessionTypes.js";

export type SessionStoreOptions = {
    /** null keeps sessions in memory only. */
    persistPath: string | null;
    resolveUser: (userId: string) => UserEntry | null;
    now?: () => number;
};

type SessionState = {
    userId: string;
    history: HistoryRing<HistoryEntry>;
    user: UserEntry | null;
    debridApiKeyOverride: string | null;
    usage: SessionUsage;
    createdAt: number;
    updatedAt: number;
};

const persistedSchema = z.object({
    version: z.literal(1),
    sessions: z.record(
        z.object({
            history: z.array(
                z.object({
                    role: z.enum(["user", "assistant"]),
                    text: z.string(),
                    at: z.number()
                })
            ),
            debridApiKey: z.string().nullable(),
            usage: z.object({ aiRequests: z.number().int().min(0), commands: z.number().int().min(0) }),
            createdAt: z.number(),
            updatedAt: z.number()
        })
    )
});

const logger = getLogger("sessions.store");

/**
 * Per-user session state keyed by Matrix user id.
 * Mutations run under a per-user lock so one user's messages serialize while other users proceed.
 */
export class SessionStore {
    private readonly persistPath: string | null;
    private readonly resolveUser: (userId: string) => UserEntry | null;
    private readonly now: () => number;
    private readonly sessions = new Map<string, SessionState>();
    private readonly userLocks = new KeyedLock();
    private readonly persistLock = new AsyncLock();

    constructor(options: SessionStoreOptions) {
        this.persistPath = options.persistPath;
        this.resolveUser = options.resolveUser;
        this.now = options.now ?? Date.now;
    }

    async load(): Promise<number> {
        if (!this.persistPath) {
            return 0;
        }
        let raw: unknown;
        try {
            raw = JSON.parse(await fs.readFile(this.persistPath, "utf8")) as unknown;
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === "ENOENT") {
                return 0;
            }
            throw error;
        }
        const parsed = persistedSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn({ persistPath: this.persistPath }, "start: Ignoring unreadable sessions file");
            return 0;
        }
        for (const [userId, stored] of Object.entries(parsed.data.sessions)) {
            const user = this.resolveUser(userId);
            const history = new HistoryRing<HistoryEntry>(maxHistoryResolve(user));
            for (const entry of stored.history) {
                history.push(entry);
            }
            this.sessions.set(userId, {
                userId,
                history,
                user,
                debridApiKeyOverride: stored.debridApiKey,
                usage: { ...stored.usage },
                createdAt: stored.createdAt,
                updatedAt: stored.updatedAt
            });
        }
        logger.info({ sessions: this.sessions.size }, "start: Sessions loaded");
        return this.sessions.size;
    }

    /**
     * Refreshes credentials of known sessions after a config reload.
     */
    syncUsers(users: UserTable): void {
        for (const state of this.sessions.values()) {
            const user = Object.hasOwn(users, state.userId) ? (users[state.userId] ?? null) : null;
            state.user = user;
            state.history.resize(maxHistoryResolve(user));
        }
    }

    get(userId: string): Session | null {
        const state = this.sessions.get(userId);
        return state ? sessionView(state) : null;
    }

    ensure(userId: string): Session {
        return sessionView(this.stateEnsure(userId));
    }

    /**
     * Runs fn under the user's lock with mutators for that session; persists when fn changed anything.
     * Expects: fn does not call withUser for the same user (the lock is not reentrant).
     */
    async withUser<T>(userId: string, fn: (handle: SessionHandle) => Promise<T> | T): Promise<T> {
        return this.userLocks.inLock(userId, async () => {
            const state = this.stateEnsure(userId);
            let dirty = false;
            const touch = () => {
                dirty = true;
                state.updatedAt = this.now();
            };
            const handle: SessionHandle = {
                get session() {
                    return sessionView(state);
                },
                historyAppend: (entries) => {
                    for (const entry of entries) {
                        state.history.push({ role: entry.role, text: entry.text, at: this.now() });
                    }
                    touch();
                },
                historyReset: () => {
                    state.history.clear();
                    touch();
                },
                usageIncrement: (key) => {
                    state.usage[key] += 1;
                    touch();
                },
                debridKeySet: (apiKey) => {
                    state.debridApiKeyOverride = apiKey;
                    touch();
                }
            };
            try {
                return await fn(handle);
            } finally {
                if (dirty) {
                    await this.persist();
                }
            }
        });
    }

    async historyAppend(userId: string, entries: ReadonlyArray<Pick<HistoryEntry, "role" | "text">>): Promise<void> {
        await this.withUser(userId, (handle) => handle.historyAppend(entries));
    }

    async historyReset(userId: string): Promise<void> {
        await this.withUser(userId, (handle) => handle.historyReset());
    }

    async debridKeySet(userId: string, apiKey: string): Promise<void> {
        await this.withUser(userId, (handle) => handle.debridKeySet(apiKey));
    }

    async usageIncrement(userId: string, key: keyof SessionUsage): Promise<void> {
        await this.withUser(userId, (handle) => handle.usageIncrement(key));
    }

    async persist(): Promise<void> {
        const persistPath = this.persistPath;
        if (!persistPath) {
            return;
        }
        await this.persistLock.inLock(async () => {
            const sessions: Record<string, unknown> = {};
            for (const state of this.sessions.values()) {
                sessions[state.userId] = {
                    history: state.history.toArray(),
                    debridApiKey: state.debridApiKeyOverride,
                    usage: state.usage,
                    createdAt: state.createdAt,
                    updatedAt: state.updatedAt
                };
            }
            await atomicWrite(persistPath, `${JSON.stringify({ version: 1, sessions }, null, 2)}\n`);
        });
    }

    private stateEnsure(userId: string): SessionState {
        const existing = this.sessions.get(userId);
        if (existing) {
            return existing;
        }
        const user = this.resolveUser(userId);
        const createdAt = this.now();
        const state: SessionState = {
            userId,
            history: new HistoryRing<HistoryEntry>(maxHistoryResolve(user)),
            user,
            debridApiKeyOverride: null,
            usage: { aiRequests: 0, commands: 0 },
            createdAt,
            updatedAt: createdAt
        };
        this.sessions.set(userId, state);
        logger.debug({ userId }, "event: Session created");
        return state;
    }
}

function maxHistoryResolve(user: UserEntry | null): number {
    const limits = Object.values(user?.triggers ?? {}).map((trigger) => trigger.maxHistory);
    return limits.length > 0 ? Math.max(...limits) : DEFAULT_MAX_HISTORY;
}

function sessionView(state: SessionState): Session {
    return freezeDeep({
        userId: state.userId,
        history: state.history.toArray(),
        maxHistory: state.history.capacity,
        aiEnabled: state.user?.aiEnabled ?? false,
        triggers: state.user?.triggers ?? {},
        apiKey: state.user?.apiKey ?? null,
        debridApiKey: state.debridApiKeyOverride ?? state.user?.debridApiKey ?? null,
        usage: { ...state.usage },
        createdAt: state.createdAt,
        updatedAt: state.updatedAt
    });
}
