import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { HeartbeatOrderingError } from "./errors.js";
import { HeartbeatMonitor, type HeartbeatHooks } from "./heartbeat.js";
import { DelayedTaskScheduler } from "./scheduler.js";
import type { Heartbeat } from "./types.js";

const NOW = 1_700_000_000_000;

function beat(ticks: number, runId = 1, timestampMs = NOW): Heartbeat {
    return { type: "heartbeat", ticks, runId, timestamp: timestampMs * 1_000_000 };
}

describe("HeartbeatMonitor", () => {
    let scheduler: DelayedTaskScheduler;
    let resyncing: boolean;
    let onRestart: Mock<[], Promise<undefined>>;
    let reconcile: Mock<[], Promise<undefined>>;
    let monitor: HeartbeatMonitor;

    beforeEach(() => {
        scheduler = new DelayedTaskScheduler(10);
        resyncing = false;
        onRestart = vi.fn(async () => undefined);
        reconcile = vi.fn(async () => undefined);
        const hooks: HeartbeatHooks = {
            onRestart: async () => {
                await onRestart();
            },
            reconcile: async () => {
                await reconcile();
            },
            isResyncing: () => resyncing,
        };
        monitor = new HeartbeatMonitor(scheduler, hooks, 2_000, () => NOW);
    });

    it("reconciles on consecutive current heartbeats", async () => {
        expect(await monitor.onHeartbeat(beat(10))).toBe("first");
        expect(await monitor.onHeartbeat(beat(11))).toBe("reconciled");
        expect(reconcile).toHaveBeenCalledTimes(2);
        expect(monitor.lastHeartbeat?.ticks).toBe(11);
    });

    it("advances the task scheduler once per heartbeat", async () => {
        const run = vi.fn(async () => undefined);
        scheduler.schedule("task", 2, run);

        await monitor.onHeartbeat(beat(1));
        expect(run).not.toHaveBeenCalled();
        await monitor.onHeartbeat(beat(2));
        expect(run).toHaveBeenCalledTimes(1);
    });

    it("raises an ordering fault on a skipped tick", async () => {
        await monitor.onHeartbeat(beat(10));

        const failure = monitor.onHeartbeat(beat(12));
        await expect(failure).rejects.toBeInstanceOf(HeartbeatOrderingError);
        await expect(monitor.onHeartbeat(beat(12))).rejects.toThrow(
            "Heartbeat out of order: expected tick 11, got 12 (run 1)"
        );
        expect(monitor.lastHeartbeat?.ticks).toBe(10);
    });

    it("raises an ordering fault on a repeated tick", async () => {
        await monitor.onHeartbeat(beat(10));
        await expect(monitor.onHeartbeat(beat(10))).rejects.toBeInstanceOf(HeartbeatOrderingError);
    });

    it("treats a new run id as a venue restart", async () => {
        await monitor.onHeartbeat(beat(500, 1));

        expect(await monitor.onHeartbeat(beat(1, 2))).toBe("restart");
        expect(onRestart).toHaveBeenCalledTimes(1);
        expect(await monitor.onHeartbeat(beat(2, 2))).toBe("reconciled");
    });

    it("skips reconciliation while resyncing", async () => {
        await monitor.onHeartbeat(beat(1));
        resyncing = true;

        expect(await monitor.onHeartbeat(beat(2))).toBe("resyncing");
        expect(reconcile).toHaveBeenCalledTimes(1);
    });

    it("skips reconciliation for a late heartbeat", async () => {
        await monitor.onHeartbeat(beat(1));

        expect(await monitor.onHeartbeat(beat(2, 1, NOW - 2_500))).toBe("late");
        expect(await monitor.onHeartbeat(beat(3, 1, NOW - 1_500))).toBe("reconciled");
        expect(reconcile).toHaveBeenCalledTimes(2);
    });

    it("accepts any tick after a reset", async () => {
        await monitor.onHeartbeat(beat(10));
        monitor.reset();

        expect(await monitor.onHeartbeat(beat(40))).toBe("first");
    });
});
