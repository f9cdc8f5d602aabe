/**
 * Unit tests for position and basis tracking.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ContractRegistry } from "./contracts.js";
import { computeBasis, PositionTracker, venueFee } from "./positions.js";
import { DelayedTaskScheduler } from "./scheduler.js";
import type { Contract, PositionTrade } from "./types.js";
import { FakeSnapshotApi, makeContract, makeReport } from "../testing/fakeVenue.js";

function trade(side: "bid" | "ask", filledSize: number, fee: number, premium: number, rebate = 0): PositionTrade {
    return { contractId: 1, side, filledSize, filledPrice: null, fee, rebate, premium, timestamp: null };
}

function fill(clock: number, isAsk: boolean, filledSize: number, filledPrice = 1000) {
    return makeReport(1, clock, { statusType: 201, isAsk, filledSize, filledPrice, mpid: "M1" });
}

describe("venueFee", () => {
    it("charges 20% of the dollar price per contract, capped at 15 cents", () => {
        expect(venueFee(1000, 3)).toBe(6);
        expect(venueFee(10_000, -2)).toBe(30);
        expect(venueFee(400, 5)).toBe(0);
    });
});

describe("computeBasis", () => {
    it("adds bid costs and subtracts ask premiums", () => {
        expect(computeBasis([trade("bid", 2, 4, 2000)])).toEqual({ size: 2, basis: 2004 });
        expect(computeBasis([trade("bid", 2, 4, 2000), trade("ask", 1, 2, 1200, 1)])).toEqual({
            size: 1,
            basis: 2004 + 2 - 1 - 1200,
        });
    });

    it("resets basis when the position closes", () => {
        expect(computeBasis([trade("bid", 2, 4, 2000), trade("ask", 2, 4, 2500)])).toEqual({ size: 0, basis: 0 });
    });

    it("resets basis when a trade crosses zero", () => {
        expect(computeBasis([trade("bid", 2, 4, 2000), trade("ask", 5, 10, 5000)])).toEqual({
            size: -3,
            basis: 0,
        });
    });

    it("accumulates again after a reset across zero", () => {
        expect(
            computeBasis([trade("bid", 2, 4, 2000), trade("ask", 5, 10, 5000), trade("ask", 1, 2, 600)])
        ).toEqual({ size: -4, basis: -598 });
    });

    it("folds trades in timestamp order when every trade has one", () => {
        const close = { ...trade("ask", 2, 4, 2500), timestamp: 2_000 };
        const open = { ...trade("bid", 2, 4, 2000), timestamp: 1_000 };
        expect(computeBasis([close, open])).toEqual({ size: 0, basis: 0 });
    });

    it("is idempotent", () => {
        const trades = [trade("bid", 3, 6, 3000), trade("ask", 1, 2, 1100)];
        expect(computeBasis(trades)).toEqual(computeBasis(trades));
    });
});

describe("PositionTracker", () => {
    let api: FakeSnapshotApi;
    let registry: ContractRegistry;
    let scheduler: DelayedTaskScheduler;
    let tracker: PositionTracker;
    let contract: Contract;

    async function tick(times = 1) {
        for (let i = 0; i < times; i++) {
            await scheduler.tick();
            await scheduler.settle();
        }
    }

    beforeEach(() => {
        api = new FakeSnapshotApi();
        contract = makeContract(1, { multiplier: 100 });
        api.addContract(contract);
        registry = new ContractRegistry(api);
        registry.add(contract);
        scheduler = new DelayedTaskScheduler(20);
        tracker = new PositionTracker({
            api,
            registry,
            scheduler,
            tuning: { basisDelayTicks: 2, basisRetryTicks: 1, basisMaxRetries: 1 },
            skipExpired: true,
        });
    });

    it("adjusts a known basis in place while the size keeps its side", () => {
        tracker.loadAll([{ contractId: 1, id: 7, size: 2, exercisedSize: 0, basis: 2004 }]);

        tracker.applyFill(fill(5, false, 1), contract);
        expect(tracker.get(1)).toMatchObject({ size: 3, basis: 2016 });

        tracker.applyFill(fill(6, true, 1), contract);
        expect(tracker.get(1)).toMatchObject({ size: 2, basis: 2008 });
        expect(tracker.isScheduled(1)).toBe(false);
    });

    it("marks basis pending when a fill crosses zero", () => {
        tracker.loadAll([{ contractId: 1, id: 7, size: 2, exercisedSize: 0, basis: 2004 }]);

        tracker.applyFill(fill(5, true, 3), contract);
        expect(tracker.getSize(1)).toBe(-1);
        expect(tracker.isBasisPending(1)).toBe(true);
        expect(tracker.isScheduled(1)).toBe(true);
    });

    it("recomputes a pending basis after the delay", async () => {
        api.positions = [{ contractId: 1, id: 7, size: 2, exercisedSize: 0, type: "long" }];
        api.trades.set(7, [trade("bid", 2, 4, 20)]);

        tracker.applyFill(fill(5, false, 2), contract);
        expect(tracker.isBasisPending(1)).toBe(true);

        await tick();
        expect(api.calls.fetchTradesForPosition).toEqual([]);

        await tick();
        expect(api.calls.fetchAllPositions).toBe(1);
        expect(api.calls.fetchTradesForPosition).toEqual([7]);
        expect(tracker.get(1)).toMatchObject({ id: 7, size: 2, basis: 24 });
    });

    it("keeps basis pending after repeated size mismatches", async () => {
        tracker.loadAll([{ contractId: 1, id: 7, size: 2, exercisedSize: 0 }]);
        api.trades.set(7, [trade("bid", 1, 2, 10)]);
        tracker.scheduleRecompute(1, 0, 2);

        await tick(2);
        expect(api.calls.fetchTradesForPosition).toEqual([7]);
        await tick();
        expect(api.calls.fetchTradesForPosition).toEqual([7, 7]);
        await tick(3);
        expect(api.calls.fetchTradesForPosition).toEqual([7, 7]);

        expect(tracker.isBasisPending(1)).toBe(true);
        expect(tracker.sweep(10)).toBe(0);

        tracker.applyFill(fill(9, false, 1), contract);
        expect(tracker.isScheduled(1)).toBe(true);
    });

    it("keeps a known basis across a reload when the size is unchanged", () => {
        tracker.loadAll([{ contractId: 1, id: 7, size: 2, exercisedSize: 0, basis: 2004 }]);

        expect(tracker.loadAll([{ contractId: 1, id: 7, size: 2, exercisedSize: 0 }])).toEqual([]);
        expect(tracker.get(1)?.basis).toBe(2004);

        expect(tracker.loadAll([{ contractId: 1, id: 7, size: 3, exercisedSize: 0 }])).toEqual([1]);
    });

    it("skips positions of expired contracts on load", () => {
        registry.add(makeContract(2));
        registry.markExpired(2);

        tracker.loadAll([{ contractId: 2, id: 8, size: 1, exercisedSize: 0 }]);
        expect(tracker.get(2)).toBeUndefined();
    });

    it("tracks venue position updates", async () => {
        await tracker.onOpenPositions([{ contractId: 1, size: 3, exercisedSize: 0 }]);
        expect(tracker.get(1)).toMatchObject({ size: 3, exercisedSize: 0 });
        expect(tracker.isScheduled(1)).toBe(true);

        await tracker.onOpenPositions([{ contractId: 5, size: 0, exercisedSize: 0 }]);
        expect(tracker.get(5)).toBeUndefined();
    });

    it("sweep schedules pending positions without a task, bounded", () => {
        tracker.loadAll([
            { contractId: 1, id: 7, size: 2, exercisedSize: 0 },
        ]);
        expect(tracker.sweep(0)).toBe(0);
        expect(tracker.sweep(5)).toBe(1);
        expect(tracker.sweep(5)).toBe(0);
    });
});
