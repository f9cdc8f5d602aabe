import { parseReconcileTuning, type ReconcileTuning } from "@venue-state/shared";
import { env } from "./config/env.js";
import { startHealthServer } from "./health/server.js";
import { IndicatorCache } from "./indicators/IndicatorCache.js";
import { logger } from "./log/logger.js";
import { MarketState } from "./state/marketState.js";
import { VenueApiClient } from "./venue/client.js";
import { VenueWsClient } from "./ws/VenueWsClient.js";

function loadTuning(): ReconcileTuning {
    try {
        return parseReconcileTuning(env.RECONCILE_TUNING_JSON);
    } catch (err) {
        logger.fatal({ err }, "Invalid RECONCILE_TUNING_JSON");
        process.exit(1);
    }
}

async function main() {
    logger.info("Worker starting...");

    const tuning = loadTuning();

    const api = new VenueApiClient({ baseUrl: env.VENUE_API_BASE_URL, apiKey: env.VENUE_API_KEY });
    const indicators = new IndicatorCache({ bitvol: (asset) => api.fetchBitvol(asset) });
    const state = new MarketState(api, { tuning, skipExpired: env.SKIP_EXPIRED, indicators });

    // websocket_starting on connect triggers the full market load
    const ws = new VenueWsClient((event) => state.handle(event), {
        wsUrl: env.VENUE_WS_URL,
        apiKey: env.VENUE_API_KEY,
    });

    const server = startHealthServer({
        marketStats: () => state.stats(),
        wsStatus: () => ws.getStatus(),
    });

    await ws.start();

    // Graceful shutdown
    const shutdown = () => {
        logger.info("Shutting down...");
        ws.stop();
        state.stop();
        server.close(() => {
            logger.info("Shutdown complete");
            process.exit(0);
        });
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
}

main().catch((err) => {
    logger.fatal({ err }, "Worker crashed");
    process.exit(1);
});
