import { DEFAULT_WEBHOOK_PORT } from "../config/configResolve.js";

export type WebhookSendOptions = {
    url?: string;
    token?: string;
};

export type WebhookSendRequest = {
    url: string;
    token: string;
    target: string;
    message: string;
    fetch?: typeof fetch;
};

const DEFAULT_URL = `http://127.0.0.1:${DEFAULT_WEBHOOK_PORT}`;

export async function webhookSendCommand(target: string, message: string, options: WebhookSendOptions): Promise<void> {
    try {
        await webhookSend({ url: options.url ?? DEFAULT_URL, token: options.token ?? "cli", target, message });
        console.log(`Sent to ${target}`);
    } catch (error) {
        console.error(`FAIL: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}

/**
 * Posts a discord-style webhook; a user id target lands in that user's direct room.
 */
export async function webhookSend(request: WebhookSendRequest): Promise<void> {
    const fetchImpl = request.fetch ?? fetch;
    const base = request.url.replace(/\/+$/, "");
    const url = `${base}/api/webhooks/${encodeURIComponent(request.target)}/${encodeURIComponent(request.token)}`;
    const response = await fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ content: request.message })
    });
    if (response.status !== 204) {
        const detail = await response.text();
        throw new Error(`Webhook returned ${response.status}${detail ? `: ${detail}` : ""}`);
    }
}
