import { promises as fs } from "node:fs";

import { getLogger } from "../../log.js";
import type { SecurityEventPayload } from "../events/eventTypes.js";
import { authLogParse } from "./authLogParse.js";

const logger = getLogger("security.auth-log");

const READ_LIMIT_BYTES = 1024 * 1024;
const NEWLINE = 0x0a;

export type AuthLogMonitorOptions = {
    path: string;
    intervalMs: number;
    onEvent: (payload: SecurityEventPayload) => Promise<void>;
};

/**
 * Tails an auth log from the last read offset and reports logins and sudo use.
 * A changed inode or a file shorter than the offset restarts reading from the top.
 */
export class AuthLogMonitor {
    private readonly path: string;
    private readonly intervalMs: number;
    private readonly onEvent: (payload: SecurityEventPayload) => Promise<void>;
    private offset = 0;
    private inode: number | null = null;
    private missingLogged = false;
    private pollTimer: NodeJS.Timeout | null = null;
    private started = false;
    private stopped = false;
    private processing = false;

    constructor(options: AuthLogMonitorOptions) {
        this.path = options.path;
        this.intervalMs = options.intervalMs;
        this.onEvent = options.onEvent;
    }

    /**
     * Skips what the file already holds, then polls every intervalMs.
     */
    async start(): Promise<void> {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        try {
            const stat = await fs.stat(this.path);
            this.inode = stat.ino;
            this.offset = stat.size;
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
                throw error;
            }
            logger.warn({ path: this.path }, "start: Auth log not found, waiting for it");
            this.missingLogged = true;
        }
        logger.info({ path: this.path, offset: this.offset, inode: this.inode }, "start: Auth log monitor started");
        this.schedulePoll(this.intervalMs);
    }

    stop(): void {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        if (this.pollTimer) {
            clearTimeout(this.pollTimer);
            this.pollTimer = null;
        }
        logger.info("stop: Auth log monitor stopped");
    }

    /**
     * Reads complete lines appended since the last call and reports matches.
     * Returns the number of events reported.
     */
    async pollOnce(): Promise<number> {
        let stat: { ino: number; size: number };
        try {
            stat = await fs.stat(this.path);
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
                throw error;
            }
            if (!this.missingLogged) {
                logger.warn({ path: this.path }, "poll: Auth log disappeared");
                this.missingLogged = true;
            }
            return 0;
        }
        this.missingLogged = false;

        if (this.inode !== null && stat.ino !== this.inode) {
            logger.warn({ previous: this.inode, current: stat.ino }, "poll: Auth log rotated, reading from start");
            this.offset = 0;
        } else if (stat.size < this.offset) {
            logger.warn({ offset: this.offset, size: stat.size }, "poll: Auth log truncated, reading from start");
            this.offset = 0;
        }
        this.inode = stat.ino;
        if (stat.size === this.offset) {
            return 0;
        }

        const chunk = await this.read(Math.min(stat.size - this.offset, READ_LIMIT_BYTES));
        const end = chunk.lastIndexOf(NEWLINE);
        if (end === -1) {
            return 0;
        }
        this.offset += end + 1;

        let reported = 0;
        for (const line of chunk.subarray(0, end).toString("utf8").split("\n")) {
            const payload = authLogParse(line);
            if (!payload) {
                continue;
            }
            logger.info({ kind: payload.kind }, "event: Auth log match");
            await this.onEvent(payload);
            reported += 1;
        }
        return reported;
    }

    private async read(length: number): Promise<Buffer> {
        const handle = await fs.open(this.path, "r");
        try {
            const buffer = Buffer.alloc(length);
            const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
            return buffer.subarray(0, bytesRead);
        } finally {
            await handle.close();
        }
    }

    private schedulePoll(delayMs: number): void {
        if (this.stopped) {
            return;
        }
        this.pollTimer = setTimeout(() => {
            this.pollTimer = null;
            void this.poll();
        }, delayMs);
    }

    private async poll(): Promise<void> {
        if (this.stopped || this.processing) {
            return;
        }
        this.processing = true;
        try {
            await this.pollOnce();
        } catch (error) {
            logger.warn({ error, path: this.path }, "error: Auth log poll failed");
        } finally {
            this.processing = false;
            this.schedulePoll(this.intervalMs);
        }
    }
}
