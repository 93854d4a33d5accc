import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { InboundEvent } from "../events/eventTypes.js";
import { webhookAppBuild } from "./webhookServer.js";

describe("webhookAppBuild", () => {
    const apps: FastifyInstance[] = [];

    afterEach(async () => {
        for (const app of apps.splice(0)) {
            await app.close();
        }
    });

    function appBuild(discordToken: string | null = null, submit?: (event: InboundEvent) => Promise<void>) {
        const events: InboundEvent[] = [];
        const app = webhookAppBuild({
            discordToken,
            submit:
                submit ??
                (async (event) => {
                    events.push(event);
                })
        });
        apps.push(app);
        return { app, events };
    }

    it("answers health checks", async () => {
        const { app } = appBuild();

        const response = await app.inject({ method: "GET", url: "/webhook/health" });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ status: "ok" });
    });

    it("queues messages from a JSON body or the query string", async () => {
        const { app, events } = appBuild();

        const posted = await app.inject({
            method: "POST",
            url: "/webhook/message",
            payload: { message: "backup done", room_id: "!ops:example.org" }
        });
        const fetched = await app.inject({ method: "GET", url: "/webhook/message?message=hello" });

        expect(posted.statusCode).toBe(200);
        expect(posted.json()).toEqual({ status: "ok" });
        expect(fetched.statusCode).toBe(200);
        expect(events.map((event) => [event.type, event.target, event.payload])).toEqual([
            ["webhook-message", { type: "room", roomId: "!ops:example.org" }, { text: "backup done" }],
            ["webhook-message", null, { text: "hello" }]
        ]);
    });

    it("rejects messages without text", async () => {
        const { app, events } = appBuild();

        const response = await app.inject({ method: "POST", url: "/webhook/message", payload: { room_id: "!ops:example.org" } });

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({ error: "Missing 'message' parameter" });
        expect(events).toEqual([]);
    });

    it("formats log and notify payloads", async () => {
        const { app, events } = appBuild();

        await app.inject({ method: "POST", url: "/webhook/log", payload: { level: "error", message: "disk full", source: "nas" } });
        await app.inject({ method: "GET", url: "/webhook/log?message=plain" });
        await app.inject({ method: "POST", url: "/webhook/notify", payload: { title: "Deploy", message: "ok", priority: "high" } });
        await app.inject({ method: "POST", url: "/webhook/notify", payload: { message: "later", priority: "low" } });

        expect(events.map((event) => event.payload)).toEqual([
            { text: "📋 **[ERROR]** nas\ndisk full", kind: "log" },
            { text: "📋 **[INFO]** unknown\nplain", kind: "log" },
            { text: "🔴 **Deploy**\nok", kind: "notify" },
            { text: "🟢 **Notification**\nlater", kind: "notify" }
        ]);
    });

    it("accepts discord-style posts with 204", async () => {
        const { app, events } = appBuild();

        const response = await app.inject({
            method: "POST",
            url: "/api/webhooks/%40alice%3Aexample.org/test-token",
            payload: { content: "Build ok", username: "ci" }
        });

        expect(response.statusCode).toBe(204);
        expect(events).toHaveLength(1);
        expect(events[0]?.type).toBe("webhook-discord-compat");
        expect(events[0]?.payload).toEqual({ targetId: "@alice:example.org", content: "Build ok", username: "ci", embeds: [] });
    });

    it("requires content or embeds on discord-style posts", async () => {
        const { app, events } = appBuild();

        const response = await app.inject({ method: "POST", url: "/api/webhooks/123/test-token", payload: { content: "  " } });

        expect(response.statusCode).toBe(400);
        expect(events).toEqual([]);
    });

    it("rejects a wrong discord token and reports it", async () => {
        const { app, events } = appBuild("test-secret");

        const response = await app.inject({ method: "POST", url: "/api/webhooks/123/wrong", payload: { content: "hi" } });

        expect(response.statusCode).toBe(401);
        expect(events).toHaveLength(1);
        const event = events[0];
        expect(event?.type).toBe("security-event");
        if (event?.type === "security-event") {
            expect(event.payload.kind).toBe("webhook_token_rejected");
            expect(event.payload.severity).toBe("warning");
            expect(event.payload.details[0]).toEqual({ label: "Webhook", value: "123" });
        }
    });

    it("answers 500 when the dispatcher refuses the event", async () => {
        const submit = vi.fn(async () => {
            throw new Error("Queue is closed");
        });
        const { app } = appBuild(null, submit);

        const response = await app.inject({ method: "POST", url: "/webhook/message", payload: { message: "late" } });

        expect(response.statusCode).toBe(500);
        expect(response.json()).toEqual({ error: "Queue is closed" });
    });
});
