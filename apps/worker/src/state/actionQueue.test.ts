import { describe, it, expect } from "vitest";
import { ActionQueue } from "./actionQueue.js";
import { makeReport } from "../testing/fakeVenue.js";

describe("ActionQueue", () => {
    it("hands a token only to the opener", () => {
        const queue = new ActionQueue();
        const token = queue.open();

        expect(token).not.toBeNull();
        expect(queue.open()).toBeNull();
        expect(queue.isOpen).toBe(true);
    });

    it("delivers events in arrival order to the token holder", () => {
        const queue = new ActionQueue();
        const token = queue.open() ?? -1;
        queue.append(makeReport(1, 1));
        queue.append(makeReport(1, 2));

        expect(queue.shift(token + 1)).toBeUndefined();
        expect(queue.shift(token)).toMatchObject({ clock: 1 });
        expect(queue.shift(token)).toMatchObject({ clock: 2 });
        expect(queue.shift(token)).toBeUndefined();
        expect(queue.close(token)).toEqual([]);
        expect(queue.isOpen).toBe(false);
    });

    it("refuses appends while closed", () => {
        const queue = new ActionQueue();
        expect(() => queue.append(makeReport(1, 1))).toThrow("closed");
    });

    it("invalidates older tokens on reset", () => {
        const queue = new ActionQueue();
        const first = queue.open() ?? -1;
        queue.append(makeReport(1, 1));
        const second = queue.reset();

        expect(queue.length).toBe(0);
        expect(queue.close(first)).toEqual([]);
        expect(queue.isOpen).toBe(true);
        queue.append(makeReport(1, 2));
        expect(queue.close(second)).toHaveLength(1);
        expect(queue.isOpen).toBe(false);
    });
});
