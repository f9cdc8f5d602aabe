import { z } from "zod";

/**
 * Reconciliation tuning schema.
 * Tick counts are heartbeats (one per second on the venue stream).
 */
export const ReconcileTuningSchema = z.object({
    // Basis recomputation
    /** Heartbeats to wait after a fill before recomputing basis (default: 3) */
    basisDelayTicks: z.number().int().min(1).default(3),
    /** Heartbeats between recompute attempts after a size mismatch (default: 5) */
    basisRetryTicks: z.number().int().min(1).default(5),
    /** Recompute attempts before giving up until the size changes (default: 3) */
    basisMaxRetries: z.number().int().min(0).default(3),

    // Per-heartbeat bounds
    /** Max contract reloads started by one staleness sweep (default: 100) */
    maxReloadsPerHeartbeat: z.number().int().min(1).default(100),
    /** Max basis recomputations scheduled by one position sweep (default: 100) */
    maxBasisUpdatesPerHeartbeat: z.number().int().min(1).default(100),

    // Timing
    /** Heartbeats older than this skip heavy reconciliation (default: 2000) */
    lateHeartbeatMs: z.number().int().min(0).default(2_000),
    /** Max wait for tasks started by one scheduler tick (default: 50) */
    taskTimeoutMs: z.number().int().min(0).default(50),
    /** Seconds before expiry at which a contract counts as expired (default: 15) */
    expiryMarginSeconds: z.number().int().min(0).default(15),

    /** Flag a reload when an equal-clock top disagrees with the book */
    reloadOnTopMismatch: z.boolean().default(false),
});

export type ReconcileTuning = z.infer<typeof ReconcileTuningSchema>;

export const DEFAULT_RECONCILE_TUNING: ReconcileTuning = ReconcileTuningSchema.parse({});

/**
 * Parse tuning overrides from a JSON string (e.g. an env var).
 * Empty input yields the defaults; invalid input throws.
 */
export function parseReconcileTuning(json: string | undefined): ReconcileTuning {
    if (!json || json.trim() === "") {
        return DEFAULT_RECONCILE_TUNING;
    }
    const raw: unknown = JSON.parse(json);
    return ReconcileTuningSchema.parse(raw);
}
