export const DOWNLOAD_TERMINAL_STATES = ["ready", "failed", "expired"] as const;

export type DownloadTerminalState = (typeof DOWNLOAD_TERMINAL_STATES)[number];
export type DownloadState = "submitted" | "in_progress" | DownloadTerminalState;

export type DownloadResult = {
    filename: string;
    links: string[];
};

export type DownloadJob = {
    id: string;
    torrentId: string;
    ownerId: string;
    roomId: string | null;
    filename: string;
    state: DownloadState;
    createdAt: number;
    lastPolledAt: number | null;
    progress: number;
    /** Set only in ready. */
    result: DownloadResult | null;
    /** Set only in failed. */
    error: string | null;
};

/**
 * What one poll learned about a torrent.
 */
export type DownloadObservation =
    | { type: "status"; status: string; progress: number; filename: string | null; links: readonly string[] }
    | { type: "not_found" }
    | { type: "transient"; error: string };

export function downloadStateIsTerminal(state: DownloadState): state is DownloadTerminalState {
    return (DOWNLOAD_TERMINAL_STATES as readonly string[]).includes(state);
}
