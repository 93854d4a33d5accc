import type { DownloadJob, DownloadObservation } from "./downloadTypes.js";
import { downloadStateIsTerminal } from "./downloadTypes.js";

const FAILED_STATUSES = new Set(["error", "magnet_error", "virus", "dead"]);

/**
 * Applies one poll observation to a job.
 * Terminal jobs are returned unchanged; non-terminal jobs past maxAgeMs become expired.
 */
export function downloadTransition(
    job: DownloadJob,
    observation: DownloadObservation,
    now: number,
    maxAgeMs: number
): DownloadJob {
    if (downloadStateIsTerminal(job.state)) {
        return job;
    }

    let next: DownloadJob = { ...job, lastPolledAt: now };
    if (observation.type === "not_found") {
        next = { ...next, state: "failed", error: "Torrent not found" };
    } else if (observation.type === "status") {
        const filename = observation.filename ?? job.filename;
        if (observation.status === "downloaded") {
            next = {
                ...next,
                state: "ready",
                filename,
                progress: 100,
                result: { filename, links: [...observation.links] }
            };
        } else if (FAILED_STATUSES.has(observation.status)) {
            next = { ...next, state: "failed", filename, error: `Torrent status: ${observation.status}` };
        } else {
            next = { ...next, state: "in_progress", filename, progress: observation.progress };
        }
    }

    if (!downloadStateIsTerminal(next.state) && now - job.createdAt > maxAgeMs) {
        next = { ...next, state: "expired" };
    }
    return next;
}
