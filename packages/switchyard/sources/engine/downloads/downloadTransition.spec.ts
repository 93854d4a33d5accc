import { describe, expect, it } from "vitest";

import { downloadTransition } from "./downloadTransition.js";
import type { DownloadJob } from "./downloadTypes.js";

const MAX_AGE = 60_000;

function jobBuild(overrides: Partial<DownloadJob> = {}): DownloadJob {
    return {
        id: "job-1",
        torrentId: "T1",
        ownerId: "@alice:example.org",
        roomId: "!room:example.org",
        filename: "ubuntu.iso",
        state: "submitted",
        createdAt: 1_000,
        lastPolledAt: null,
        progress: 0,
        result: null,
        error: null,
        ...overrides
    };
}

describe("downloadTransition", () => {
    it("moves to in_progress for working statuses", () => {
        const next = downloadTransition(
            jobBuild(),
            { type: "status", status: "downloading", progress: 42, filename: null, links: [] },
            2_000,
            MAX_AGE
        );

        expect(next).toMatchObject({ state: "in_progress", progress: 42, lastPolledAt: 2_000 });
    });

    it("moves to ready with links", () => {
        const next = downloadTransition(
            jobBuild({ state: "in_progress" }),
            { type: "status", status: "downloaded", progress: 100, filename: "ubuntu-24.iso", links: ["https://d/1"] },
            2_000,
            MAX_AGE
        );

        expect(next.state).toBe("ready");
        expect(next.result).toEqual({ filename: "ubuntu-24.iso", links: ["https://d/1"] });
    });

    it("fails on error statuses and not found", () => {
        for (const status of ["error", "magnet_error", "virus", "dead"]) {
            const next = downloadTransition(
                jobBuild(),
                { type: "status", status, progress: 0, filename: null, links: [] },
                2_000,
                MAX_AGE
            );
            expect(next.state).toBe("failed");
            expect(next.error).toBe(`Torrent status: ${status}`);
        }
        expect(downloadTransition(jobBuild(), { type: "not_found" }, 2_000, MAX_AGE).state).toBe("failed");
    });

    it("keeps state on transient failures", () => {
        const job = jobBuild({ state: "in_progress", progress: 10 });

        const next = downloadTransition(job, { type: "transient", error: "timeout" }, 2_000, MAX_AGE);

        expect(next.state).toBe("in_progress");
        expect(next.progress).toBe(10);
    });

    it("expires jobs older than the max age", () => {
        const next = downloadTransition(
            jobBuild({ state: "in_progress" }),
            { type: "transient", error: "timeout" },
            1_000 + MAX_AGE + 1,
            MAX_AGE
        );

        expect(next.state).toBe("expired");
    });

    it("never leaves a terminal state under duplicate polls", () => {
        const ready = downloadTransition(
            jobBuild(),
            { type: "status", status: "downloaded", progress: 100, filename: null, links: ["https://d/1"] },
            2_000,
            MAX_AGE
        );

        const observations = [
            { type: "status", status: "downloading", progress: 5, filename: null, links: [] },
            { type: "status", status: "error", progress: 0, filename: null, links: [] },
            { type: "not_found" },
            { type: "transient", error: "timeout" }
        ] as const;
        for (const observation of observations) {
            expect(downloadTransition(ready, observation, 1_000 + MAX_AGE * 2, MAX_AGE)).toBe(ready);
        }
    });
});
