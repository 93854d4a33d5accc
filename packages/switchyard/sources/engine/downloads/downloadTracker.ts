import { promises as fs } from "node:fs";

import { createId } from "@paralleldrive/cuid2";
import { z } from "zod";

import { getLogger } from "../../log.js";
import { atomicWrite } from "../../util/atomicWrite.js";
import { AsyncLock } from "../../util/lock.js";
import { type DebridClient, DebridError } from "./debridClient.js";
import { downloadTransition } from "./downloadTransition.js";
import type { DownloadJob, DownloadObservation } from "./downloadTypes.js";
import { downloadStateIsTerminal } from "./downloadTypes.js";

const logger = getLogger("downloads.tracker");

const DEFAULT_POLL_INTERVAL_MS = 30_000;

export type DownloadTrackerClient = Pick<DebridClient, "torrentInfo" | "selectFiles">;

export type DownloadTrackerOptions = {
    client: DownloadTrackerClient;
    /** null keeps jobs in memory only. */
    persistPath: string | null;
    pollIntervalMs?: number;
    maxAgeMs: number;
    apiKeyResolve: (ownerId: string) => string | null;
    /** Hands a terminal job to the dispatcher; resolves once it is enqueued. */
    onTerminal: (job: DownloadJob) => Promise<void>;
    now?: () => number;
};

export type DownloadSubmit = {
    torrentId: string;
    ownerId: string;
    roomId: string | null;
    filename: string;
};

const persistedSchema = z.object({
    version: z.literal(1),
    jobs: z.array(
        z.object({
            id: z.string(),
            torrentId: z.string(),
            ownerId: z.string(),
            roomId: z.string().nullable(),
            filename: z.string(),
            state: z.enum(["submitted", "in_progress", "ready", "failed", "expired"]),
            createdAt: z.number(),
            lastPolledAt: z.number().nullable(),
            progress: z.number(),
            result: z.object({ filename: z.string(), links: z.array(z.string()) }).nullable(),
            error: z.string().nullable()
        })
    )
});

/**
 * Polls the debrid service for submitted torrents and reports each terminal state once.
 * A job leaves the tracker only when its notification is acknowledged.
 */
export class DownloadTracker {
    private readonly client: DownloadTrackerClient;
    private readonly persistPath: string | null;
    private readonly pollIntervalMs: number;
    private readonly maxAgeMs: number;
    private readonly apiKeyResolve: (ownerId: string) => string | null;
    private readonly onTerminal: (job: DownloadJob) => Promise<void>;
    private readonly now: () => number;

    private readonly jobs = new Map<string, DownloadJob>();
    private readonly notifying = new Set<string>();
    private readonly persistLock = new AsyncLock();
    private pollTimer: NodeJS.Timeout | null = null;
    private started = false;
    private stopped = false;
    private processing = false;

    constructor(options: DownloadTrackerOptions) {
        this.client = options.client;
        this.persistPath = options.persistPath;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.maxAgeMs = options.maxAgeMs;
        this.apiKeyResolve = options.apiKeyResolve;
        this.onTerminal = options.onTerminal;
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
            logger.warn({ persistPath: this.persistPath }, "start: Ignoring unreadable downloads file");
            return 0;
        }
        for (const job of parsed.data.jobs) {
            this.jobs.set(job.id, job);
        }
        logger.info({ jobs: this.jobs.size }, "start: Download jobs loaded");
        return this.jobs.size;
    }

    start(): void {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        this.schedulePoll(0);
        logger.info({ pollIntervalMs: this.pollIntervalMs }, "start: Download tracker started");
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
        logger.info("stop: Download tracker stopped");
    }

    async submit(input: DownloadSubmit): Promise<DownloadJob> {
        const job: DownloadJob = {
            id: createId(),
            torrentId: input.torrentId,
            ownerId: input.ownerId,
            roomId: input.roomId,
            filename: input.filename,
            state: "submitted",
            createdAt: this.now(),
            lastPolledAt: null,
            progress: 0,
            result: null,
            error: null
        };
        this.jobs.set(job.id, job);
        await this.persist();
        logger.info({ jobId: job.id, torrentId: job.torrentId, ownerId: job.ownerId }, "event: Download job submitted");
        return job;
    }

    get(jobId: string): DownloadJob | null {
        return this.jobs.get(jobId) ?? null;
    }

    list(): DownloadJob[] {
        return Array.from(this.jobs.values());
    }

    /**
     * Removes a job whose terminal notification was delivered.
     */
    async acknowledge(jobId: string): Promise<void> {
        this.notifying.delete(jobId);
        if (!this.jobs.delete(jobId)) {
            return;
        }
        await this.persist();
        logger.debug({ jobId }, "event: Download job acknowledged");
    }

    /**
     * Returns a job whose notification was dropped so the next cycle reports it again.
     */
    release(jobId: string): void {
        if (this.notifying.delete(jobId)) {
            logger.warn({ jobId }, "event: Download notification released for retry");
        }
    }

    /**
     * Runs one poll cycle: polls active jobs concurrently, persists changes and reports terminal jobs.
     */
    async pollOnce(): Promise<void> {
        const active = this.list().filter((job) => !downloadStateIsTerminal(job.state));
        const updates = await Promise.all(active.map((job) => this.jobPoll(job)));

        let changed = false;
        for (const next of updates) {
            const current = this.jobs.get(next.id);
            if (!current || current === next) {
                continue;
            }
            this.jobs.set(next.id, next);
            changed = true;
            if (current.state !== next.state) {
                logger.info({ jobId: next.id, from: current.state, to: next.state }, "poll: Download state changed");
            }
        }
        if (changed) {
            await this.persist();
        }

        for (const job of this.list()) {
            if (!downloadStateIsTerminal(job.state) || this.notifying.has(job.id)) {
                continue;
            }
            this.notifying.add(job.id);
            try {
                await this.onTerminal(job);
            } catch (error) {
                this.notifying.delete(job.id);
                logger.warn({ jobId: job.id, error }, "error: Failed to hand off download notification");
            }
        }
    }

    async persist(): Promise<void> {
        const persistPath = this.persistPath;
        if (!persistPath) {
            return;
        }
        await this.persistLock.inLock(async () => {
            const jobs = this.list();
            await atomicWrite(persistPath, `${JSON.stringify({ version: 1, jobs }, null, 2)}\n`);
        });
    }

    private async jobPoll(job: DownloadJob): Promise<DownloadJob> {
        const observation = await this.observe(job);
        return downloadTransition(job, observation, this.now(), this.maxAgeMs);
    }

    private async observe(job: DownloadJob): Promise<DownloadObservation> {
        const apiKey = this.apiKeyResolve(job.ownerId);
        if (!apiKey) {
            logger.debug({ jobId: job.id, ownerId: job.ownerId }, "skip: No debrid key for download owner");
            return { type: "transient", error: "missing api key" };
        }
        try {
            const info = await this.client.torrentInfo(apiKey, job.torrentId);
            if (info.status === "waiting_files_selection") {
                await this.client.selectFiles(apiKey, job.torrentId, "all").catch((error: unknown) => {
                    logger.warn({ jobId: job.id, error }, "error: Failed to select torrent files");
                });
            }
            return {
                type: "status",
                status: info.status,
                progress: info.progress ?? 0,
                filename: info.filename,
                links: info.links ?? []
            };
        } catch (error) {
            if (error instanceof DebridError && error.kind === "not_found") {
                return { type: "not_found" };
            }
            logger.warn({ jobId: job.id, error }, "error: Download poll failed");
            return { type: "transient", error: error instanceof Error ? error.message : String(error) };
        }
    }

    private schedulePoll(delayMs: number): void {
        if (this.stopped) {
            return;
        }
        if (this.pollTimer) {
            clearTimeout(this.pollTimer);
        }
        this.pollTimer = setTimeout(() => {
            this.pollTimer = null;
            void this.poll();
        }, delayMs);
    }

    private async poll(): Promise<void> {
        if (this.stopped) {
            return;
        }
        if (this.processing) {
            this.schedulePoll(this.pollIntervalMs);
            return;
        }
        this.processing = true;
        try {
            await this.pollOnce();
        } catch (error) {
            logger.warn({ error }, "error: Download poll cycle failed");
        } finally {
            this.processing = false;
            this.schedulePoll(this.pollIntervalMs);
        }
    }
}
