import type { TriggerConfig } from "../registry/registryTypes.js";

export type HistoryRole = "user" | "assistant";

export type HistoryEntry = {
    role: HistoryRole;
    text: string;
    at: number;
};

export type SessionUsage = {
    aiRequests: number;
    commands: number;
};

export type Session = {
    userId: string;
    history: readonly HistoryEntry[];
    maxHistory: number;
    aiEnabled: boolean;
    triggers: Readonly<Record<string, TriggerConfig>>;
    apiKey: string | null;
    debridApiKey: string | null;
    usage: Readonly<SessionUsage>;
    createdAt: number;
    updatedAt: number;
};

/**
 * Mutators handed to code running under a user's session lock.
 */
export type SessionHandle = {
    readonly session: Session;
    historyAppend: (entries: ReadonlyArray<Pick<HistoryEntry, "role" | "text">>) => void;
    historyReset: () => void;
    usageIncrement: (key: keyof SessionUsage) => void;
    debridKeySet: (apiKey: string) => void;
};
