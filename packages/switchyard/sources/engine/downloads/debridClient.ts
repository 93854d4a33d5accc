import { z } from "zod";

import { getLogger } from "../../log.js";

const logger = getLogger("downloads.debrid");

const DEFAULT_TIMEOUT_MS = 30_000;

export type DebridErrorKind = "invalid_key" | "not_found" | "bad_request" | "http" | "network" | "timeout";

/**
 * A failed debrid API call; status is null when no HTTP response arrived.
 */
export class DebridError extends Error {
    readonly kind: DebridErrorKind;
    readonly status: number | null;

    constructor(kind: DebridErrorKind, status: number | null, message: string) {
        super(message);
        this.name = "DebridError";
        this.kind = kind;
        this.status = status;
    }

    /** Network failures, timeouts and 5xx responses. */
    get transient(): boolean {
        return this.kind === "network" || this.kind === "timeout" || (this.status !== null && this.status >= 500);
    }
}

const addMagnetSchema = z.object({
    id: z.string(),
    uri: z.string().optional()
});

const torrentFileSchema = z.object({
    id: z.number(),
    path: z.string(),
    bytes: z.number(),
    selected: z.number()
});

const torrentSummarySchema = z.object({
    id: z.string(),
    filename: z.string(),
    hash: z.string().optional(),
    bytes: z.number().optional(),
    progress: z.number().optional(),
    status: z.string(),
    added: z.string().optional(),
    links: z.array(z.string()).optional()
});

const torrentInfoSchema = torrentSummarySchema.extend({
    files: z.array(torrentFileSchema).optional()
});

const unrestrictSchema = z.object({
    id: z.string().optional(),
    filename: z.string(),
    filesize: z.number().optional(),
    link: z.string().optional(),
    download: z.string()
});

const downloadSchema = z.object({
    id: z.string(),
    filename: z.string(),
    filesize: z.number().optional(),
    link: z.string(),
    download: z.string(),
    generated: z.string().optional()
});

export type DebridTorrentSummary = z.infer<typeof torrentSummarySchema>;
export type DebridTorrentInfo = z.infer<typeof torrentInfoSchema>;
export type DebridUnrestrictedLink = z.infer<typeof unrestrictSchema>;
export type DebridDownload = z.infer<typeof downloadSchema>;

export type DebridClientOptions = {
    endpoint: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
};

type RequestOptions = {
    method: "GET" | "POST";
    form?: Record<string, string>;
    expect: number;
};

/**
 * REST client for the RealDebrid API. Every call takes the caller's own API key.
 */
export class DebridClient {
    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: DebridClientOptions) {
        this.endpoint = options.endpoint.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async addMagnet(apiKey: string, magnet: string): Promise<{ id: string; uri: string | null }> {
        const body = await this.request(apiKey, "torrents/addMagnet", { method: "POST", form: { magnet }, expect: 201 });
        const parsed = addMagnetSchema.parse(body);
        return { id: parsed.id, uri: parsed.uri ?? null };
    }

    async torrentInfo(apiKey: string, torrentId: string): Promise<DebridTorrentInfo> {
        const body = await this.request(apiKey, `torrents/info/${encodeURIComponent(torrentId)}`, {
            method: "GET",
            expect: 200
        });
        return torrentInfoSchema.parse(body);
    }

    async selectFiles(apiKey: string, torrentId: string, files = "all"): Promise<void> {
        await this.request(apiKey, `torrents/selectFiles/${encodeURIComponent(torrentId)}`, {
            method: "POST",
            form: { files },
            expect: 204
        });
    }

    async torrentList(apiKey: string): Promise<DebridTorrentSummary[]> {
        const body = await this.request(apiKey, "torrents", { method: "GET", expect: 200 });
        return z.array(torrentSummarySchema).parse(body ?? []);
    }

    async unrestrictLink(apiKey: string, link: string): Promise<DebridUnrestrictedLink> {
        const body = await this.request(apiKey, "unrestrict/link", { method: "POST", form: { link }, expect: 200 });
        return unrestrictSchema.parse(body);
    }

    async downloadList(apiKey: string): Promise<DebridDownload[]> {
        const body = await this.request(apiKey, "downloads", { method: "GET", expect: 200 });
        return z.array(downloadSchema).parse(body ?? []);
    }

    private async request(apiKey: string, path: string, options: RequestOptions): Promise<unknown> {
        const url = `${this.endpoint}/${path}`;
        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method: options.method,
                headers: { Authorization: `Bearer ${apiKey}` },
                body: options.form ? new URLSearchParams(options.form) : undefined,
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (error) {
            if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
                throw new DebridError("timeout", null, `Request timeout (${Math.round(this.timeoutMs / 1000)}s)`);
            }
            throw new DebridError("network", null, `Network error: ${error instanceof Error ? error.message : String(error)}`);
        }

        if (response.status === options.expect) {
            if (response.status === 204) {
                return null;
            }
            return (await response.json()) as unknown;
        }

        const detail = await errorDetailRead(response);
        logger.debug({ path, status: response.status, detail }, "error: Debrid request failed");
        if (response.status === 401) {
            throw new DebridError("invalid_key", 401, "Invalid RealDebrid API key");
        }
        if (response.status === 404) {
            throw new DebridError("not_found", 404, "Not found");
        }
        if (response.status === 400) {
            throw new DebridError("bad_request", 400, `Invalid request: ${detail ?? "Unknown error"}`);
        }
        throw new DebridError("http", response.status, `Error (${response.status}): ${detail ?? "Unknown error"}`);
    }
}

/**
 * User-facing text for a failed debrid call.
 */
export function debridErrorText(error: unknown): string {
    if (error instanceof DebridError) {
        if (error.kind === "invalid_key") {
            return "❌ Invalid RealDebrid API key.";
        }
        return `❌ ${error.message}`;
    }
    return `❌ Error: ${error instanceof Error ? error.message : String(error)}`;
}

async function errorDetailRead(response: Response): Promise<string | null> {
    const text = await response.text();
    if (text.length === 0) {
        return null;
    }
    const parsed = z.object({ error: z.string() }).safeParse(jsonParseSafe(text));
    return parsed.success ? parsed.data.error : text.slice(0, 200);
}

function jsonParseSafe(text: string): unknown {
    try {
        return JSON.parse(text) as unknown;
    } catch {
        return null;
    }
}
