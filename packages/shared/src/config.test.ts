import { describe, it, expect } from "vitest";
import { DEFAULT_RECONCILE_TUNING, parseReconcileTuning } from "./config.js";

describe("parseReconcileTuning", () => {
    it("returns defaults for empty input", () => {
        expect(parseReconcileTuning(undefined)).toEqual(DEFAULT_RECONCILE_TUNING);
        expect(parseReconcileTuning("  ")).toEqual(DEFAULT_RECONCILE_TUNING);
        expect(DEFAULT_RECONCILE_TUNING.basisDelayTicks).toBe(3);
        expect(DEFAULT_RECONCILE_TUNING.maxReloadsPerHeartbeat).toBe(100);
        expect(DEFAULT_RECONCILE_TUNING.lateHeartbeatMs).toBe(2000);
        expect(DEFAULT_RECONCILE_TUNING.reloadOnTopMismatch).toBe(false);
    });

    it("merges overrides onto defaults", () => {
        const tuning = parseReconcileTuning('{"basisDelayTicks": 1, "reloadOnTopMismatch": true}');
        expect(tuning.basisDelayTicks).toBe(1);
        expect(tuning.reloadOnTopMismatch).toBe(true);
        expect(tuning.basisRetryTicks).toBe(5);
    });

    it("rejects invalid values", () => {
        expect(() => parseReconcileTuning('{"basisDelayTicks": 0}')).toThrow();
        expect(() => parseReconcileTuning("not json")).toThrow();
    });
});
