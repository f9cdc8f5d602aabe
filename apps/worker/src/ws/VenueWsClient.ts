/**
 * Venue market-data WebSocket client.
 *
 * Features:
 * - Automatic reconnection with exponential backoff and jitter
 * - Ping/pong keepalive
 * - Frames decoded into typed events and handed to a sink
 * - Synthetic websocket_starting / websocket_exception events
 * - Reconnects when the sink reports a heartbeat ordering fault
 */

import WebSocket from "ws";
import { createChildLogger } from "../log/logger.js";
import { HeartbeatOrderingError } from "../state/errors.js";
import type { VenueEvent } from "../state/types.js";
import { decodeFrame } from "./events.js";

const logger = createChildLogger({ module: "venue-ws" });

export type EventSink = (event: VenueEvent) => Promise<boolean>;

/**
 * Client configuration.
 */
export interface VenueWsConfig {
    /** WebSocket endpoint URL */
    wsUrl: string;

    /** API key sent as the token query parameter, when set */
    apiKey?: string;

    /** Initial reconnect backoff (ms). Default: 1000 */
    initialBackoffMs: number;

    /** Maximum reconnect backoff (ms). Default: 60000 */
    maxBackoffMs: number;

    /** Backoff multiplier. Default: 2 */
    backoffMultiplier: number;

    /** Ping interval (ms). Default: 10000 */
    pingIntervalMs: number;

    /** Connection timeout (ms). Default: 30000 */
    connectionTimeoutMs: number;

    /** Pong timeout - disconnect if no pong received (ms). Default: 5000 */
    pongTimeoutMs: number;
}

export const DEFAULT_WS_CONFIG: Omit<VenueWsConfig, "wsUrl"> = {
    initialBackoffMs: 1000,
    maxBackoffMs: 60_000,
    backoffMultiplier: 2,
    pingIntervalMs: 10_000,
    connectionTimeoutMs: 30_000,
    pongTimeoutMs: 5_000,
};

export interface VenueWsStatus {
    connected: boolean;
    metrics: {
        connectCount: number;
        disconnectCount: number;
        messageCount: number;
        droppedCount: number;
        errorCount: number;
        faultCount: number;
        lastConnectedAt: number | null;
        lastDisconnectedAt: number | null;
        lastMessageAt: number | null;
    };
}

export class VenueWsClient {
    private config: VenueWsConfig;
    private ws: WebSocket | null = null;
    private isRunning = false;
    private currentBackoffMs: number;
    private reconnectTimeout: NodeJS.Timeout | null = null;
    private pingInterval: NodeJS.Timeout | null = null;
    private pongTimeout: NodeJS.Timeout | null = null;
    private awaitingPong = false;

    // Metrics
    private metrics = {
        connectCount: 0,
        disconnectCount: 0,
        messageCount: 0,
        droppedCount: 0,
        errorCount: 0,
        faultCount: 0,
        lastConnectedAt: null as number | null,
        lastDisconnectedAt: null as number | null,
        lastMessageAt: null as number | null,
    };

    constructor(
        private sink: EventSink,
        config: Partial<VenueWsConfig> & Pick<VenueWsConfig, "wsUrl">
    ) {
        this.config = { ...DEFAULT_WS_CONFIG, ...config };
        this.currentBackoffMs = this.config.initialBackoffMs;
    }

    /**
     * Start the WebSocket client.
     */
    async start(): Promise<void> {
        if (this.isRunning) {
            logger.warn("Venue WS client already running");
            return;
        }

        this.isRunning = true;
        logger.info({ wsUrl: this.config.wsUrl }, "Starting venue WebSocket client");

        await this.connect();
    }

    /**
     * Stop the WebSocket client. No events are delivered afterwards.
     */
    stop(): void {
        this.isRunning = false;
        this.clearTimers();
        this.closeSocket(1000, "Client stopping");
        logger.info("Venue WebSocket client stopped");
    }

    get isConnected(): boolean {
        return this.ws?.readyState === WebSocket.OPEN;
    }

    /**
     * Get connection status and metrics for health checks.
     */
    getStatus(): VenueWsStatus {
        return {
            connected: this.isConnected,
            metrics: { ...this.metrics },
        };
    }

    /**
     * Hand an event to the sink. Events are not serialised here: the sink
     * decides synchronously whether to queue or apply.
     */
    deliver(event: VenueEvent): void {
        if (!this.isRunning) {
            return;
        }
        this.sink(event).catch((err: unknown) => this.handleSinkError(err, event));
    }

    private handleSinkError(err: unknown, event: VenueEvent): void {
        if (err instanceof HeartbeatOrderingError) {
            this.metrics.faultCount++;
            logger.error({ err }, "Stream ordering fault; reconnecting");
            this.currentBackoffMs = this.config.initialBackoffMs;
            this.closeSocket(4000, "Heartbeat ordering fault");
            this.handleDisconnect();
            return;
        }
        this.metrics.errorCount++;
        logger.error({ err, type: event.type }, "Event handling failed");
    }

    private endpoint(): string {
        const url = new URL(this.config.wsUrl);
        if (this.config.apiKey) {
            url.searchParams.set("token", this.config.apiKey);
        }
        return url.toString();
    }

    private async connect(): Promise<void> {
        logger.info("Connecting to venue WebSocket...");

        try {
            await this.createConnection();

            // Reset backoff on successful connection
            this.currentBackoffMs = this.config.initialBackoffMs;
            this.metrics.connectCount++;
            this.metrics.lastConnectedAt = Date.now();
            this.startPingInterval();

            logger.info("Venue WebSocket connected");
            this.deliver({ type: "websocket_starting" });
        } catch (err) {
            const errorMessage = err instanceof Error ? err.message : String(err);
            logger.error({ err: errorMessage }, "Failed to connect to venue WebSocket");

            if (this.isRunning) {
                this.scheduleReconnect();
            }
        }
    }

    private createConnection(): Promise<void> {
        return new Promise((resolve, reject) => {
            let settled = false;
            let timeout: NodeJS.Timeout | null = null;

            const ws = new WebSocket(this.endpoint());
            this.ws = ws;

            const settle = (fn: () => void) => {
                if (settled) return;
                settled = true;
                if (timeout) {
                    clearTimeout(timeout);
                    timeout = null;
                }
                fn();
            };

            ws.on("open", () => {
                settle(() => resolve());
            });

            ws.on("error", (err) => {
                if (!settled) {
                    settle(() => reject(err));
                    return;
                }
                if (this.ws !== ws) return;
                logger.error({ err: err.message }, "WebSocket error");
                this.deliver({ type: "websocket_exception", message: err.message });
                this.closeSocket(1011, "Socket error");
                this.handleDisconnect();
            });

            ws.on("close", (code, reason) => {
                if (!settled) {
                    settle(() => reject(new Error(`WebSocket closed: ${code} ${reason.toString()}`)));
                    return;
                }
                if (this.ws !== ws) return;
                logger.warn({ code, reason: reason.toString() }, "WebSocket closed");
                this.ws = null;
                this.handleDisconnect();
            });

            ws.on("message", (data) => {
                if (this.ws !== ws) return;
                this.handleMessage(data.toString());
            });

            ws.on("pong", () => {
                this.handlePong();
            });

            // Connection timeout
            timeout = setTimeout(() => {
                settle(() => {
                    ws.terminate();
                    reject(new Error("Connection timeout"));
                });
            }, this.config.connectionTimeoutMs);
        });
    }

    private handleMessage(text: string): void {
        this.metrics.messageCount++;
        this.metrics.lastMessageAt = Date.now();
        const event = decodeFrame(text);
        if (!event) {
            this.metrics.droppedCount++;
            return;
        }
        this.deliver(event);
    }

    /**
     * Detach the current socket first so its close/error events are ignored.
     */
    private closeSocket(code: number, reason: string): void {
        const ws = this.ws;
        this.ws = null;
        if (!ws) return;
        try {
            ws.close(code, reason);
        } catch (err) {
            logger.debug({ err }, "Error while closing socket");
            ws.terminate();
        }
    }

    private handleDisconnect(): void {
        this.clearTimers();
        this.metrics.disconnectCount++;
        this.metrics.lastDisconnectedAt = Date.now();
        this.ws = null;

        if (this.isRunning) {
            this.scheduleReconnect();
        }
    }

    private scheduleReconnect(): void {
        if (this.reconnectTimeout) {
            clearTimeout(this.reconnectTimeout);
        }

        // Add jitter
        const jitter = this.currentBackoffMs * 0.1 * (Math.random() - 0.5);
        const actualBackoff = Math.floor(this.currentBackoffMs + jitter);

        logger.info({ backoffMs: actualBackoff }, "Scheduling reconnect");

        this.reconnectTimeout = setTimeout(() => {
            this.reconnectTimeout = null;
            void this.connect();
        }, actualBackoff);

        this.currentBackoffMs = Math.min(
            this.currentBackoffMs * this.config.backoffMultiplier,
            this.config.maxBackoffMs
        );
    }

    private clearTimers(): void {
        if (this.reconnectTimeout) {
            clearTimeout(this.reconnectTimeout);
            this.reconnectTimeout = null;
        }
        if (this.pingInterval) {
            clearInterval(this.pingInterval);
            this.pingInterval = null;
        }
        if (this.pongTimeout) {
            clearTimeout(this.pongTimeout);
            this.pongTimeout = null;
        }
        this.awaitingPong = false;
    }

    private startPingInterval(): void {
        if (this.pingInterval) {
            clearInterval(this.pingInterval);
        }

        this.pingInterval = setInterval(() => {
            this.sendPing();
        }, this.config.pingIntervalMs);

        // Don't block process exit
        this.pingInterval.unref();
    }

    private sendPing(): void {
        const ws = this.ws;
        if (!ws || !this.isConnected || this.awaitingPong) {
            return;
        }

        try {
            ws.ping();
            this.awaitingPong = true;

            this.pongTimeout = setTimeout(() => {
                logger.warn("Pong timeout - reconnecting");
                this.closeSocket(4001, "Pong timeout");
                this.handleDisconnect();
            }, this.config.pongTimeoutMs);
        } catch (err) {
            logger.error({ err }, "Failed to send ping");
        }
    }

    private handlePong(): void {
        this.awaitingPong = false;
        if (this.pongTimeout) {
            clearTimeout(this.pongTimeout);
            this.pongTimeout = null;
        }
    }
}
