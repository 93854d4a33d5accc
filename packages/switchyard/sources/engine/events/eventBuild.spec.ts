import { describe, expect, it } from "vitest";

import { eventBuild, securityEventBuild } from "./eventBuild.js";

describe("eventBuild", () => {
    it("stamps and freezes events", () => {
        const event = eventBuild(
            {
                type: "chat-message",
                source: "matrix",
                target: { type: "room", roomId: "!room:example.org" },
                payload: { roomId: "!room:example.org", senderId: "@alice:example.org", text: "hello" }
            },
            1_234
        );

        expect(event.id.length).toBeGreaterThan(0);
        expect(event.receivedAt).toBe(1_234);
        expect(Object.isFrozen(event)).toBe(true);
        expect(Object.isFrozen(event.payload)).toBe(true);
    });

    it("gives every event its own id", () => {
        const first = securityEventBuild("commands", { kind: "permission_denied", severity: "warning", title: "t", details: [] });
        const second = securityEventBuild("commands", { kind: "permission_denied", severity: "warning", title: "t", details: [] });

        expect(first.id).not.toBe(second.id);
        expect(first.target).toBeNull();
    });
});
