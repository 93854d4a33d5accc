import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { configResolve } from "../config/configResolve.js";
import { configSettingsParse } from "../config/configSettingsParse.js";
import { Engine } from "./engine.js";
import type { ChatMessageHandler, ChatTransport, OutboundMessage, RoomJoinedHandler } from "./transport/transportTypes.js";

const ROOM = "!room:example.org";

class TransportFake implements ChatTransport {
    readonly userId = "@bot:example.org";
    readonly maxMessageLength = 16_000;
    readonly sent: Array<{ roomId: string; text: string }> = [];
    private handler: ChatMessageHandler | null = null;
    private joinHandler: RoomJoinedHandler | null = null;

    async start(): Promise<void> {}

    onMessage(handler: ChatMessageHandler): () => void {
        this.handler = handler;
        return () => {
            this.handler = null;
        };
    }

    onRoomJoined(handler: RoomJoinedHandler): () => void {
        this.joinHandler = handler;
        return () => {
            this.joinHandler = null;
        };
    }

    async sendMessage(roomId: string, message: OutboundMessage): Promise<void> {
        this.sent.push({ roomId, text: message.text });
    }

    async directRoomResolve(userId: string): Promise<string> {
        return `!dm-${userId}`;
    }

    async shutdown(): Promise<void> {}

    async emit(senderId: string, text: string): Promise<void> {
        await this.handler?.({ eventId: "$event", roomId: ROOM, senderId, text, timestamp: Date.now() });
    }

    async join(roomId: string): Promise<void> {
        await this.joinHandler?.(roomId);
    }
}

describe("Engine", () => {
    let dir: string;
    let transport: TransportFake;
    let engine: Engine;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "switchyard-engine-"));
        const settingsPath = path.join(dir, "settings.json");
        await fs.writeFile(
            path.join(dir, "commands.json"),
            JSON.stringify({
                commands: {
                    "!ping": { description: "Ping", allowed_users: [], type: "builtin", script: null },
                    "!deploy": { description: "Deploy", allowed_users: ["@admin:example.org"], type: "shell", script: "echo deployed" }
                }
            })
        );
        await fs.writeFile(path.join(dir, "users.json"), JSON.stringify({ users: {} }));
        const config = configResolve(
            configSettingsParse({
                matrix: {
                    homeserverUrl: "https://matrix.example.org",
                    userId: "@bot:example.org",
                    accessToken: "test-secret",
                    defaultRoomId: "!default:example.org",
                    auditRoomId: "!audit:example.org"
                },
                webhook: { enabled: false },
                dispatcher: { shutdownGraceMs: 2_000 }
            }),
            settingsPath
        );
        transport = new TransportFake();
        engine = new Engine({ config, transport });
        await engine.start();
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("answers chat commands in the room they came from", async () => {
        await transport.emit("@alice:example.org", "!ping");
        await engine.shutdown();

        expect(transport.sent).toEqual([{ roomId: ROOM, text: "Pong! 🏓" }]);
        const stored = JSON.parse(await fs.readFile(path.join(dir, "sessions.json"), "utf8")) as {
            sessions: Record<string, { usage: { commands: number } }>;
        };
        expect(stored.sessions["@alice:example.org"]?.usage.commands).toBe(1);
    });

    it("greets rooms it joins through the send queue", async () => {
        await transport.join("!new:example.org");
        await engine.shutdown();

        expect(transport.sent).toEqual([{ roomId: "!new:example.org", text: "👋 Hi! Send `!help` to see what I can do." }]);
    });

    it("denies commands outside the allow-list and alerts the audit room", async () => {
        await transport.emit("@eve:example.org", "!deploy now");
        await vi.waitFor(() => expect(transport.sent).toHaveLength(2));
        await engine.shutdown();

        expect(transport.sent).toContainEqual({ roomId: ROOM, text: "You don't have permission to use !deploy" });
        const alert = transport.sent.find((entry) => entry.roomId === "!audit:example.org");
        expect(alert?.text.startsWith("⚠️ **Command Permission Denied**\n\n• **User:** @eve:example.org\n• **Command:** !deploy")).toBe(
            true
        );
    });
});
