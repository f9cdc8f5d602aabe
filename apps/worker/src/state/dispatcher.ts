import type { IndicatorCache } from "../indicators/IndicatorCache.js";
import { createChildLogger } from "../log/logger.js";
import type { ActionQueue } from "./actionQueue.js";
import type { AccountBalances } from "./balances.js";
import type { ContractRegistry } from "./contracts.js";
import type { HeartbeatMonitor } from "./heartbeat.js";
import type { OwnOrders } from "./ownOrders.js";
import type { PositionTracker } from "./positions.js";
import type { ReconciliationController, ReplayOptions } from "./reconciler.js";
import type { VenueEvent, VenueEventType } from "./types.js";

const logger = createChildLogger({ module: "dispatcher" });

export interface DispatchTargets {
    queue: ActionQueue;
    reconciler: ReconciliationController;
    heartbeat: HeartbeatMonitor;
    positions: PositionTracker;
    registry: ContractRegistry;
    own: OwnOrders;
    balances: AccountBalances;
    indicators: IndicatorCache;
    /** websocket_starting: discard queued events and reload everything */
    restart(): Promise<void>;
    /** websocket_exception: the view can no longer be trusted */
    deactivate(reason: string): void;
}

/**
 * Single entry point for decoded stream events.
 *
 * While a resync window is open, live events are appended to the action
 * queue; the decision is made synchronously so arrival order is preserved.
 * Forced events (queue drains and stash replays) bypass the queue.
 */
export class ActionDispatcher {
    private counts = new Map<VenueEventType, number>();

    constructor(private targets: DispatchTargets) {
        targets.reconciler.setReplayTarget((event, options) => this.dispatch(event, options));
    }

    /**
     * Route one event. Returns true when it changed state; only a heartbeat
     * ordering fault escapes as an error.
     */
    async dispatch(event: VenueEvent, options: ReplayOptions = {}): Promise<boolean> {
        const t = this.targets;
        if (!options.force && t.queue.isOpen && event.type !== "websocket_starting") {
            t.queue.append(event);
            return false;
        }
        this.counts.set(event.type, (this.counts.get(event.type) ?? 0) + 1);

        switch (event.type) {
            case "heartbeat": {
                logger.debug({ ticks: event.ticks, events: Object.fromEntries(this.counts) }, "Heartbeat");
                this.counts.clear();
                await t.heartbeat.onHeartbeat(event);
                return true;
            }
            case "book_top":
                return t.reconciler.handleBookTop(event);
            case "action_report":
                return t.reconciler.handleActionReport(event, options);
            case "open_positions_update":
                await t.positions.onOpenPositions(event.positions);
                return true;
            case "collateral_balance_update":
                t.balances.update(event.collateral);
                return true;
            case "contract_added":
                return t.registry.add(event.contract);
            case "contract_removed": {
                t.registry.markExpired(event.contractId);
                const evicted = t.own.evictContract(event.contractId);
                logger.info({ contractId: event.contractId, evicted }, "Contract removed");
                return true;
            }
            case "trade_busted":
                logger.warn({ data: event.data }, "Trade busted");
                return false;
            case "websocket_starting":
                logger.warn("Stream (re)starting; reloading market state");
                await t.restart();
                return true;
            case "websocket_exception":
                logger.warn({ message: event.message }, "Stream exception");
                t.deactivate(event.message);
                return true;
            case "bitvol":
            case "brave":
                return t.indicators.record(event.type, event.reading);
        }
    }
}
