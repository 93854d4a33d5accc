import { z } from "zod";

const DEFAULT_TIMEOUT_MS = 90_000;

export type AiBackendErrorKind = "timeout" | "network" | "http" | "format";

export class AiBackendError extends Error {
    readonly kind: AiBackendErrorKind;
    readonly status: number | null;

    constructor(kind: AiBackendErrorKind, status: number | null, message: string) {
        super(message);
        this.name = "AiBackendError";
        this.kind = kind;
        this.status = status;
    }
}

export type GeminiTurn = {
    role: "user" | "assistant";
    text: string;
};

export type GeminiGenerateRequest = {
    apiKey: string;
    model: string;
    systemPrompt: string | null;
    history: readonly GeminiTurn[];
    message: string;
};

export type GeminiClientOptions = {
    endpoint: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
};

const responseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({
                        parts: z.array(z.object({ text: z.string().optional() })).optional()
                    })
                    .optional()
            })
        )
        .optional()
});

const errorSchema = z.object({ error: z.object({ message: z.string() }) });

/**
 * Calls the Gemini generateContent REST endpoint.
 */
export class GeminiClient {
    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: GeminiClientOptions) {
        this.endpoint = options.endpoint.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async generate(request: GeminiGenerateRequest): Promise<string> {
        const contents = [...request.history, { role: "user" as const, text: request.message }].map((turn) => ({
            role: turn.role === "assistant" ? "model" : "user",
            parts: [{ text: turn.text }]
        }));
        const payload: Record<string, unknown> = { contents };
        if (request.systemPrompt) {
            payload.systemInstruction = { parts: [{ text: request.systemPrompt }] };
        }

        let response: Response;
        try {
            response = await this.fetchImpl(`${this.endpoint}/models/${encodeURIComponent(request.model)}:generateContent`, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "x-goog-api-key": request.apiKey
                },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (error) {
            if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
                throw new AiBackendError("timeout", null, `Gemini request timed out after ${this.timeoutMs}ms`);
            }
            throw new AiBackendError("network", null, `Gemini request failed: ${error instanceof Error ? error.message : String(error)}`);
        }

        if (!response.ok) {
            const body = await response.text();
            const parsed = errorSchema.safeParse(jsonParseSafe(body));
            const detail = parsed.success ? parsed.data.error.message : body.slice(0, 200);
            throw new AiBackendError("http", response.status, `Gemini request failed (${response.status}): ${detail}`);
        }

        const parsed = responseSchema.safeParse(await response.json());
        const parts = parsed.success ? (parsed.data.candidates?.[0]?.content?.parts ?? []) : [];
        const text = parts.map((part) => part.text ?? "").join("");
        if (text.trim().length === 0) {
            throw new AiBackendError("format", response.status, "Unexpected response format from AI");
        }
        return text;
    }
}

function jsonParseSafe(text: string): unknown {
    try {
        return JSON.parse(text) as unknown;
    } catch {
        return null;
    }
}
