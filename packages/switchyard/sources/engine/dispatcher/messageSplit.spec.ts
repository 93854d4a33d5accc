import { describe, expect, it } from "vitest";

import { messageHardSplit, messageSplit, partDelayMs } from "./messageSplit.js";

describe("messageSplit", () => {
    it("splits paragraphs", () => {
        expect(messageSplit("First paragraph.\n\n\nSecond\nstill second.\n\n", 1_000)).toEqual([
            "First paragraph.",
            "Second\nstill second."
        ]);
    });

    it("keeps fenced code blocks intact", () => {
        const text = "Here is code:\n```ts\nconst a = 1;\n\nconst b = 2;\n```\n\nDone.";

        expect(messageSplit(text, 1_000)).toEqual(["Here is code:\n```ts\nconst a = 1;\n\nconst b = 2;\n```", "Done."]);
    });

    it("keeps a longer fence open across shorter inner fences", () => {
        const text = "````\n```\nfirst\n\nsecond\n```\n````\n\nDone.";

        expect(messageSplit(text, 1_000)).toEqual(["````\n```\nfirst\n\nsecond\n```\n````", "Done."]);
    });

    it("hard-splits long paragraphs", () => {
        expect(messageSplit("aaaa bbbb cccc", 10)).toEqual(["aaaa bbbb ", "cccc"]);
    });

    it("returns the text when it has no content", () => {
        expect(messageSplit("   ", 10)).toEqual(["   "]);
    });
});

describe("messageHardSplit", () => {
    it("cuts at maxLength without separators", () => {
        expect(messageHardSplit("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
    });

    it("prefers newlines over spaces", () => {
        expect(messageHardSplit("ab cd\nef gh", 9)).toEqual(["ab cd\n", "ef gh"]);
    });
});

describe("partDelayMs", () => {
    it("clamps between two and fifteen seconds", () => {
        expect(partDelayMs("short")).toBe(2_000);
        expect(partDelayMs("x".repeat(250))).toBe(5_000);
        expect(partDelayMs("x".repeat(5_000))).toBe(15_000);
    });
});
