import Bottleneck from "bottleneck";
import { logger } from "../log/logger.js";
import { VenueApiError } from "./errors.js";

/** Retries of a rate-limited (429) request before giving up */
export const MAX_RATE_LIMIT_RETRIES = 5;
const INITIAL_RETRY_DELAY_MS = 1_000;
const MAX_RETRY_DELAY_MS = 10_000;

/**
 * Delay before retry number `retryCount` (0-based) of a rate-limited request:
 * 1s doubling, capped at 10s.
 */
export function rateLimitRetryDelay(retryCount: number): number {
    return Math.min(INITIAL_RETRY_DELAY_MS * 2 ** retryCount, MAX_RETRY_DELAY_MS);
}

/**
 * Attach the 429 retry policy to a limiter: Bottleneck re-runs a failed job
 * when the "failed" listener returns a delay.
 */
export function withRateLimitRetry(limiter: Bottleneck, name: string): Bottleneck {
    limiter.on("failed", (error: unknown, jobInfo) => {
        if (error instanceof VenueApiError && error.isRateLimited && jobInfo.retryCount < MAX_RATE_LIMIT_RETRIES) {
            const delay = rateLimitRetryDelay(jobInfo.retryCount);
            logger.warn(
                { limiter: name, jobId: jobInfo.options.id, retry: jobInfo.retryCount + 1, delayMs: delay },
                "Rate limited; retrying"
            );
            return delay;
        }
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.warn({ limiter: name, error: errorMessage, jobId: jobInfo.options.id }, "Venue API request failed");
        return undefined;
    });
    return limiter;
}

/**
 * Snapshot API limiter. Resync bursts (one request per contract) are spread
 * over time instead of tripping the venue's rate limit.
 */
export function createVenueLimiter(): Bottleneck {
    return withRateLimitRetry(
        new Bottleneck({
            maxConcurrent: 10,
            minTime: 50, // ~20 rps
            reservoir: 40, // Burst capacity
            reservoirRefreshAmount: 20,
            reservoirRefreshInterval: 1000,
        }),
        "venue"
    );
}
