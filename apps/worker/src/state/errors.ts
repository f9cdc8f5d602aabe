import type { Heartbeat } from "./types.js";

/**
 * Raised when heartbeats of one run arrive out of sequence. The stream can no
 * longer be trusted; the transport reconnects and the state is reloaded.
 */
export class HeartbeatOrderingError extends Error {
    constructor(
        readonly previous: Heartbeat,
        readonly received: Heartbeat
    ) {
        super(
            `Heartbeat out of order: expected tick ${previous.ticks + 1}, got ${received.ticks} (run ${received.runId})`
        );
        this.name = "HeartbeatOrderingError";
    }
}
