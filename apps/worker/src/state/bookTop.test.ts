import { describe, it, expect } from "vitest";
import { BookTopCache, isSameOrZeroOrAbsent } from "./bookTop.js";
import type { BookTop } from "./types.js";

function top(clock: number, bid: number | null, ask: number | null, synthetic = false): BookTop {
    return { contractId: 1, bid, ask, clock, synthetic };
}

describe("isSameOrZeroOrAbsent", () => {
    it("treats zero, null and undefined as the same empty price", () => {
        expect(isSameOrZeroOrAbsent(0, null)).toBe(true);
        expect(isSameOrZeroOrAbsent(undefined, 0)).toBe(true);
        expect(isSameOrZeroOrAbsent(null, undefined)).toBe(true);
    });

    it("compares real prices exactly", () => {
        expect(isSameOrZeroOrAbsent(1000, 1000)).toBe(true);
        expect(isSameOrZeroOrAbsent(1000, 1100)).toBe(false);
        expect(isSameOrZeroOrAbsent(1000, 0)).toBe(false);
    });
});

describe("BookTopCache", () => {
    it("stores the first top and replaces it only with a higher clock", () => {
        const cache = new BookTopCache();

        expect(cache.reconcile(top(5, 1000, 1200))).toBe("newer");
        expect(cache.reconcile(top(4, 900, 1300))).toBe("older");
        expect(cache.get(1)?.bid).toBe(1000);
        expect(cache.reconcile(top(6, 900, 1300))).toBe("newer");
        expect(cache.get(1)?.bid).toBe(900);
    });

    it("keeps the stored value on an equal-clock mismatch", () => {
        const cache = new BookTopCache();
        cache.reconcile(top(5, 1000, 1200));

        expect(cache.reconcile(top(5, 1000, 1250, true))).toBe("mismatch");
        expect(cache.get(1)).toEqual(top(5, 1000, 1200));
    });

    it("accepts an equal-clock top that only differs by empty sides", () => {
        const cache = new BookTopCache();
        cache.reconcile(top(5, 0, 1200));

        expect(cache.reconcile(top(5, null, 1200, true))).toBe("match");
    });
});
