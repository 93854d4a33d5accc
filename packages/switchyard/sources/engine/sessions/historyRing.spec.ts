import { describe, expect, it } from "vitest";

import { HistoryRing } from "./historyRing.js";

describe("HistoryRing", () => {
    it("evicts the oldest entries first once full", () => {
        const ring = new HistoryRing<number>(3);
        for (let value = 1; value <= 5; value += 1) {
            ring.push(value);
            expect(ring.length).toBeLessThanOrEqual(3);
        }
        expect(ring.toArray()).toEqual([3, 4, 5]);
    });

    it("keeps nothing with zero capacity", () => {
        const ring = new HistoryRing<string>(0);
        ring.push("hello");
        expect(ring.toArray()).toEqual([]);
        expect(ring.length).toBe(0);
    });

    it("keeps the newest items when shrinking", () => {
        const ring = new HistoryRing<number>(4);
        [1, 2, 3, 4, 5].forEach((value) => ring.push(value));

        ring.resize(2);
        expect(ring.toArray()).toEqual([4, 5]);

        ring.resize(3);
        ring.push(6);
        ring.push(7);
        expect(ring.toArray()).toEqual([5, 6, 7]);
    });

    it("clears without changing capacity", () => {
        const ring = new HistoryRing<number>(2);
        ring.push(1);
        ring.clear();
        ring.push(2);
        expect(ring.toArray()).toEqual([2]);
        expect(ring.capacity).toBe(2);
    });
});
