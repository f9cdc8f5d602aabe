import { createServer, IncomingMessage, ServerResponse, type Server } from "http";
import { env } from "../config/env.js";
import { logger } from "../log/logger.js";
import type { MarketStateStats } from "../state/marketState.js";
import type { VenueWsStatus } from "../ws/VenueWsClient.js";

export interface HealthSources {
    marketStats(): MarketStateStats;
    wsStatus(): VenueWsStatus;
}

export interface HealthStatus {
    status: "ok" | "degraded" | "unhealthy";
    timestamp: string;
    wsConnected: boolean;
    stream: VenueWsStatus["metrics"];
    market: MarketStateStats;
}

export function getHealthStatus(sources: HealthSources): HealthStatus {
    const ws = sources.wsStatus();
    const market = sources.marketStats();

    // Determine overall status
    let status: HealthStatus["status"] = "ok";
    if (!ws.connected) {
        status = "unhealthy";
    } else if (!market.active || market.queueOpen || market.unloaded > 0) {
        status = "degraded";
    }

    return {
        status,
        timestamp: new Date().toISOString(),
        wsConnected: ws.connected,
        stream: ws.metrics,
        market,
    };
}

function createHandler(sources: HealthSources) {
    return (req: IncomingMessage, res: ServerResponse) => {
        if (req.url === "/health" && req.method === "GET") {
            try {
                const status = getHealthStatus(sources);
                const statusCode = status.status === "unhealthy" ? 503 : 200;
                res.writeHead(statusCode, { "Content-Type": "application/json" });
                res.end(JSON.stringify(status));
            } catch (err) {
                logger.error({ err }, "Health check failed");
                res.writeHead(500, { "Content-Type": "application/json" });
                res.end(JSON.stringify({ status: "error", error: String(err) }));
            }
        } else {
            res.writeHead(404);
            res.end("Not Found");
        }
    };
}

export function startHealthServer(sources: HealthSources, port = env.WORKER_PORT): Server {
    const server = createServer(createHandler(sources));
    server.listen(port, () => {
        logger.info({ port }, "Health server started");
    });
    return server;
}
