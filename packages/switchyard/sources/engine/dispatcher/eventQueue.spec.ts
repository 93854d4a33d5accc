import { describe, expect, it } from "vitest";

import { EventQueue } from "./eventQueue.js";

describe("EventQueue", () => {
    it("delivers items in order", async () => {
        const queue = new EventQueue<number>(4);
        await queue.push(1);
        await queue.push(2);

        expect(await queue.shift()).toBe(1);
        expect(await queue.shift()).toBe(2);
    });

    it("blocks pushes while full and never drops", async () => {
        const queue = new EventQueue<number>(1);
        await queue.push(1);
        let pushed = false;
        const blocked = queue.push(2).then(() => {
            pushed = true;
        });
        await Promise.resolve();

        expect(pushed).toBe(false);
        expect(queue.size).toBe(2);
        expect(await queue.shift()).toBe(1);
        await blocked;
        expect(pushed).toBe(true);
        expect(await queue.shift()).toBe(2);
    });

    it("hands items straight to a waiting consumer", async () => {
        const queue = new EventQueue<string>(1);
        const waiting = queue.shift();

        await queue.push("a");

        expect(await waiting).toBe("a");
        expect(queue.size).toBe(0);
    });

    it("drains remaining items after close, then returns null", async () => {
        const queue = new EventQueue<number>(2);
        await queue.push(1);
        queue.close();

        await expect(queue.push(2)).rejects.toThrow("Queue is closed");
        expect(await queue.shift()).toBe(1);
        expect(await queue.shift()).toBeNull();
    });

    it("releases waiting consumers on close", async () => {
        const queue = new EventQueue<number>(1);
        const waiting = queue.shift();

        queue.close();

        expect(await waiting).toBeNull();
    });

    it("returns everything still queued", async () => {
        const queue = new EventQueue<number>(1);
        await queue.push(1);
        const blocked = queue.push(2);

        expect(queue.drainRemaining()).toEqual([1, 2]);
        await blocked;
        expect(queue.size).toBe(0);
    });
});
