import { createChildLogger } from "../log/logger.js";
import { HeartbeatOrderingError } from "./errors.js";
import type { DelayedTaskScheduler } from "./scheduler.js";
import type { Heartbeat } from "./types.js";

const logger = createChildLogger({ module: "heartbeat" });

const NS_PER_MS = 1_000_000;

export interface HeartbeatHooks {
    /** Venue restarted (run id changed): reload everything. */
    onRestart(): Promise<void>;
    /** Periodic reconciliation work. */
    reconcile(): Promise<void>;
    /** True while a resync window is open. */
    isResyncing(): boolean;
}

export type HeartbeatOutcome = "first" | "restart" | "resyncing" | "late" | "reconciled";

/**
 * Validates heartbeat ordering and drives time-based work: advances the
 * delayed task scheduler and, when the stream is current, runs the bounded
 * reconciliation sweeps.
 */
export class HeartbeatMonitor {
    private last: Heartbeat | null = null;

    constructor(
        private scheduler: DelayedTaskScheduler,
        private hooks: HeartbeatHooks,
        private lateHeartbeatMs = 2_000,
        private now: () => number = Date.now
    ) {}

    get lastHeartbeat(): Heartbeat | null {
        return this.last;
    }

    async onHeartbeat(heartbeat: Heartbeat): Promise<HeartbeatOutcome> {
        const previous = this.last;
        if (previous && previous.runId !== heartbeat.runId) {
            logger.warn({ previousRun: previous.runId, runId: heartbeat.runId }, "Venue run changed; reloading");
            this.last = heartbeat;
            await this.hooks.onRestart();
            return "restart";
        }
        if (previous && heartbeat.ticks !== previous.ticks + 1) {
            logger.error(
                { previousTicks: previous.ticks, ticks: heartbeat.ticks, runId: heartbeat.runId },
                "Heartbeat out of order"
            );
            throw new HeartbeatOrderingError(previous, heartbeat);
        }
        this.last = heartbeat;

        await this.scheduler.tick();

        if (this.hooks.isResyncing()) {
            logger.debug({ ticks: heartbeat.ticks }, "Skipping reconciliation during resync");
            return previous ? "resyncing" : "first";
        }
        const delayMs = this.now() - heartbeat.timestamp / NS_PER_MS;
        if (delayMs > this.lateHeartbeatMs) {
            logger.warn({ ticks: heartbeat.ticks, delayMs: Math.round(delayMs) }, "Late heartbeat; skipping reconciliation");
            return "late";
        }
        await this.hooks.reconcile();
        return previous ? "reconciled" : "first";
    }

    reset(): void {
        this.last = null;
    }
}
