import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";

import { getLogger } from "../../log.js";
import { eventBuild, securityEventBuild } from "../events/eventBuild.js";
import type { InboundEvent } from "../events/eventTypes.js";
import { webhookLogFormat, webhookNotifyFormat } from "./webhookFormat.js";

const logger = getLogger("webhook.server");

export type WebhookAppOptions = {
    /** Hands an event to the dispatcher; a rejection answers 500. */
    submit: (event: InboundEvent) => Promise<void>;
    /** When set, discord-style posts must carry this token. */
    discordToken: string | null;
};

export type WebhookServerOptions = WebhookAppOptions & {
    host: string;
    port: number;
};

export type WebhookServer = {
    address: string;
    close: () => Promise<void>;
};

const MISSING_MESSAGE = { error: "Missing 'message' parameter" };

const messageSchema = z.object({
    message: z.string().optional(),
    room_id: z.string().min(1).optional()
});

const logSchema = z.object({
    level: z.string().optional(),
    message: z.string().optional(),
    source: z.string().optional()
});

const notifySchema = z.object({
    title: z.string().optional(),
    message: z.string().optional(),
    priority: z.string().optional()
});

const discordSchema = z.object({
    content: z.string().optional(),
    username: z.string().optional(),
    embeds: z
        .array(
            z.object({
                title: z.string().optional(),
                description: z.string().optional()
            })
        )
        .optional()
});

/**
 * Builds the webhook HTTP app without listening; tests drive it with inject.
 */
export function webhookAppBuild(options: WebhookAppOptions): FastifyInstance {
    const app = fastify({ logger: false });

    const accept = async (reply: FastifyReply, event: InboundEvent, status: 200 | 204): Promise<void> => {
        try {
            await options.submit(event);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn({ type: event.type, error }, "error: Webhook event rejected by dispatcher");
            reply.status(500).send({ error: message });
            return;
        }
        logger.info({ eventId: event.id, type: event.type }, "receive: Webhook event accepted");
        if (status === 204) {
            reply.status(204).send();
            return;
        }
        reply.status(200).send({ status: "ok" });
    };

    app.get("/webhook/health", async (_request, reply) => {
        return reply.send({ status: "ok" });
    });

    app.route({
        method: ["GET", "POST"],
        url: "/webhook/message",
        handler: async (request, reply) => {
            const payload = parseInput(messageSchema, request, reply);
            if (!payload) {
                return;
            }
            if (!payload.message) {
                reply.status(400).send(MISSING_MESSAGE);
                return;
            }
            await accept(
                reply,
                eventBuild({
                    type: "webhook-message",
                    source: "webhook",
                    target: payload.room_id ? { type: "room", roomId: payload.room_id } : null,
                    payload: { text: payload.message }
                }),
                200
            );
        }
    });

    app.route({
        method: ["GET", "POST"],
        url: "/webhook/log",
        handler: async (request, reply) => {
            const payload = parseInput(logSchema, request, reply);
            if (!payload) {
                return;
            }
            if (!payload.message) {
                reply.status(400).send(MISSING_MESSAGE);
                return;
            }
            const text = webhookLogFormat({
                level: payload.level ?? "INFO",
                source: payload.source ?? "unknown",
                message: payload.message
            });
            await accept(
                reply,
                eventBuild({ type: "webhook-notify", source: "webhook", target: null, payload: { text, kind: "log" } }),
                200
            );
        }
    });

    app.route({
        method: ["GET", "POST"],
        url: "/webhook/notify",
        handler: async (request, reply) => {
            const payload = parseInput(notifySchema, request, reply);
            if (!payload) {
                return;
            }
            if (!payload.message) {
                reply.status(400).send(MISSING_MESSAGE);
                return;
            }
            const text = webhookNotifyFormat({
                title: payload.title ?? "Notification",
                message: payload.message,
                priority: payload.priority ?? "medium"
            });
            await accept(
                reply,
                eventBuild({ type: "webhook-notify", source: "webhook", target: null, payload: { text, kind: "notify" } }),
                200
            );
        }
    });

    app.post<{ Params: { id: string; token: string } }>("/api/webhooks/:id/:token", async (request, reply) => {
        const { id, token } = request.params;
        if (options.discordToken !== null && token !== options.discordToken) {
            logger.warn({ webhookId: id, ip: request.ip }, "skip: Webhook token rejected");
            try {
                await options.submit(
                    securityEventBuild("webhook", {
                        kind: "webhook_token_rejected",
                        severity: "warning",
                        title: "Webhook Token Rejected",
                        details: [
                            { label: "Webhook", value: id },
                            { label: "Remote", value: request.ip }
                        ]
                    })
                );
            } catch (error) {
                logger.warn({ error }, "error: Security event for rejected token not queued");
            }
            reply.status(401).send({ error: "Invalid webhook token" });
            return;
        }

        const payload = parseInput(discordSchema, request, reply);
        if (!payload) {
            return;
        }
        const content = payload.content ?? "";
        const embeds = payload.embeds ?? [];
        if (content.trim().length === 0 && embeds.length === 0) {
            reply.status(400).send({ error: "Cannot send an empty message: 'content' or 'embeds' is required" });
            return;
        }
        await accept(
            reply,
            eventBuild({
                type: "webhook-discord-compat",
                source: "webhook",
                target: null,
                payload: { targetId: id, content, username: payload.username ?? null, embeds }
            }),
            204
        );
    });

    return app;
}

export async function webhookServerStart(options: WebhookServerOptions): Promise<WebhookServer> {
    const app = webhookAppBuild(options);
    const address = await app.listen({ host: options.host, port: options.port });
    logger.info({ address }, "start: Webhook server listening");
    return {
        address,
        close: async () => {
            await app.close();
            logger.info("stop: Webhook server closed");
        }
    };
}

// GET reads the query string, POST the JSON body.
function parseInput<T>(
    schema: z.ZodSchema<T>,
    request: Pick<FastifyRequest, "method" | "query" | "body">,
    reply: FastifyReply
): T | null {
    const source = request.method === "GET" ? request.query : (request.body ?? {});
    const result = schema.safeParse(source);
    if (result.success) {
        return result.data;
    }
    reply.status(400).send({ error: "Invalid data", details: result.error.flatten() });
    return null;
}
