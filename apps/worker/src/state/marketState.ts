import { DEFAULT_RECONCILE_TUNING, StatusCodes, type ReconcileTuning } from "@venue-state/shared";
import { IndicatorCache } from "../indicators/IndicatorCache.js";
import { createChildLogger } from "../log/logger.js";
import { ActionQueue } from "./actionQueue.js";
import { AccountBalances } from "./balances.js";
import { ClockedBookStore } from "./bookStore.js";
import { BookTopCache } from "./bookTop.js";
import { ContractRegistry } from "./contracts.js";
import { ActionDispatcher } from "./dispatcher.js";
import { HeartbeatMonitor } from "./heartbeat.js";
import { OutOfOrderStash } from "./outOfOrderStash.js";
import { OwnOrders } from "./ownOrders.js";
import { PositionTracker } from "./positions.js";
import { ReconciliationController, type ReconcilerStats, type ReplayOptions } from "./reconciler.js";
import { DelayedTaskScheduler } from "./scheduler.js";
import type {
    ActionReport,
    BookEntry,
    BookTop,
    ContractId,
    LastTrade,
    Position,
    SnapshotApi,
    VenueEvent,
} from "./types.js";

const logger = createChildLogger({ module: "market-state" });

export interface MarketStateOptions {
    tuning?: Partial<ReconcileTuning>;
    skipExpired?: boolean;
    indicators?: IndicatorCache;
    now?: () => number;
}

export interface MarketStateStats extends ReconcilerStats {
    active: boolean;
    contracts: number;
    positions: number;
    pendingBasis: number;
    openOrders: number;
    queueOpen: boolean;
    queueDepth: number;
    scheduledTasks: number;
    inFlightTasks: number;
    lastHeartbeatTicks: number | null;
}

/**
 * The reconciled market and account view. Owns every component and exposes
 * the event entry point plus read accessors for trading logic.
 */
export class MarketState {
    readonly tuning: ReconcileTuning;
    readonly registry: ContractRegistry;
    readonly own = new OwnOrders();
    readonly store: ClockedBookStore;
    readonly tops = new BookTopCache();
    readonly stash = new OutOfOrderStash();
    readonly queue = new ActionQueue();
    readonly scheduler: DelayedTaskScheduler;
    readonly positions: PositionTracker;
    readonly reconciler: ReconciliationController;
    readonly heartbeat: HeartbeatMonitor;
    readonly balances = new AccountBalances();
    readonly indicators: IndicatorCache;
    private dispatcher: ActionDispatcher;
    private lastTrades = new Map<ContractId, LastTrade>();
    private active = false;
    private needsFullLoad = false;
    private loading: Promise<boolean> | null = null;

    constructor(
        private api: SnapshotApi,
        options: MarketStateOptions = {}
    ) {
        this.tuning = { ...DEFAULT_RECONCILE_TUNING, ...options.tuning };
        const skipExpired = options.skipExpired ?? true;
        this.registry = new ContractRegistry(api, this.tuning.expiryMarginSeconds, options.now);
        this.store = new ClockedBookStore(this.own);
        this.scheduler = new DelayedTaskScheduler(this.tuning.taskTimeoutMs);
        this.indicators = options.indicators ?? new IndicatorCache();
        this.positions = new PositionTracker({
            api,
            registry: this.registry,
            scheduler: this.scheduler,
            tuning: this.tuning,
            skipExpired,
        });
        this.reconciler = new ReconciliationController({
            api,
            registry: this.registry,
            own: this.own,
            store: this.store,
            tops: this.tops,
            stash: this.stash,
            queue: this.queue,
            positions: this.positions,
            tuning: this.tuning,
            onFill: (report, mine) => this.recordTrade(report, mine),
        });
        this.heartbeat = new HeartbeatMonitor(
            this.scheduler,
            {
                onRestart: async () => {
                    await this.loadMarket();
                },
                reconcile: () => this.reconcile(),
                isResyncing: () => this.queue.isOpen,
            },
            this.tuning.lateHeartbeatMs,
            options.now
        );
        this.dispatcher = new ActionDispatcher({
            queue: this.queue,
            reconciler: this.reconciler,
            heartbeat: this.heartbeat,
            positions: this.positions,
            registry: this.registry,
            own: this.own,
            balances: this.balances,
            indicators: this.indicators,
            restart: async () => {
                await this.loadMarket();
            },
            deactivate: (reason) => this.deactivate(reason),
        });
    }

    get isActive(): boolean {
        return this.active;
    }

    handle(event: VenueEvent, options?: ReplayOptions): Promise<boolean> {
        return this.dispatcher.dispatch(event, options);
    }

    /**
     * Full load: contracts, open orders, positions, every live book, then
     * basis for every position. Live events queue up meanwhile and are
     * replayed at the end. Concurrent callers share the load in progress.
     */
    loadMarket(): Promise<boolean> {
        if (this.loading) {
            return this.loading;
        }
        this.loading = this.runLoad().finally(() => {
            this.loading = null;
        });
        return this.loading;
    }

    /** Forget every book, position and balance. Contracts stay known. */
    clear(): void {
        this.reconciler.clear();
        this.scheduler.clear();
        this.positions.clear();
        this.balances.clear();
        this.lastTrades.clear();
        this.heartbeat.reset();
    }

    stop(): void {
        this.deactivate("stopped");
        this.scheduler.clear();
    }

    getBookTop(contractId: ContractId): BookTop | undefined {
        return this.tops.get(contractId);
    }

    getBookState(contractId: ContractId): ReadonlyMap<string, BookEntry> {
        return this.store.getBookState(contractId);
    }

    getContractClock(contractId: ContractId): number | undefined {
        return this.reconciler.getContractClock(contractId);
    }

    nextBestEntry(contractId: ContractId, targetPrice: number, isAsk: boolean, includeMine = false): BookEntry | null {
        return this.store.nextBestEntry(contractId, targetPrice, isAsk, includeMine);
    }

    getPosition(contractId: ContractId): Position | undefined {
        return this.positions.get(contractId);
    }

    getAvailable(asset: string): number {
        return this.balances.getAvailable(asset);
    }

    getLastTrade(contractId: ContractId): LastTrade | undefined {
        return this.lastTrades.get(contractId);
    }

    isMyOrder(mid: string): boolean {
        return this.own.isMine(mid);
    }

    stats(): MarketStateStats {
        return {
            ...this.reconciler.stats(),
            active: this.active,
            contracts: this.registry.size,
            positions: this.positions.all().length,
            pendingBasis: this.positions.pendingIds().length,
            openOrders: this.own.openCount,
            queueOpen: this.queue.isOpen,
            queueDepth: this.queue.length,
            scheduledTasks: this.scheduler.pending,
            inFlightTasks: this.scheduler.inFlight,
            lastHeartbeatTicks: this.heartbeat.lastHeartbeat?.ticks ?? null,
        };
    }

    private async runLoad(): Promise<boolean> {
        const start = Date.now();
        const token = this.queue.reset();
        this.reconciler.clear();
        this.scheduler.clear();
        logger.info("Loading market");

        try {
            const contracts = await this.api.fetchAllContracts();
            for (const contract of contracts) {
                this.registry.add(contract);
            }

            const openOrders = await this.api.fetchOpenOrders();
            this.own.resetOpen();
            for (const order of openOrders) {
                this.own.classify(order);
                this.own.markOpen(order.mid);
            }

            const positions = await this.api.fetchAllPositions();
            const pending = this.positions.loadAll(positions);

            const loaded = await this.reconciler.loadAllBooks(this.registry.activeIds());
            await Promise.all(pending.map((contractId) => this.positions.recompute(contractId)));

            this.active = true;
            this.needsFullLoad = false;
            logger.info(
                {
                    contracts: this.registry.size,
                    books: loaded,
                    openOrders: this.own.openCount,
                    positions: positions.length,
                    durationMs: Date.now() - start,
                },
                "Market loaded"
            );
        } catch (err) {
            this.needsFullLoad = true;
            const dropped = this.queue.close(token);
            logger.error({ err, dropped: dropped.length }, "Failed to load market; will retry");
            return false;
        }
        await this.reconciler.drainQueue(token);
        return true;
    }

    private async reconcile(): Promise<void> {
        if (this.needsFullLoad) {
            await this.loadMarket();
            return;
        }
        const scheduled = this.positions.sweep(this.tuning.maxBasisUpdatesPerHeartbeat);
        const reloaded = await this.reconciler.runStaleSweep(this.tuning.maxReloadsPerHeartbeat);
        if (scheduled > 0 || reloaded > 0) {
            logger.debug({ scheduled, reloaded }, "Heartbeat reconciliation");
        }
    }

    private recordTrade(report: ActionReport, mine: boolean): void {
        if (report.statusType !== StatusCodes.FILLED || !report.filledSize) {
            return;
        }
        const timestamp = report.updatedTime ?? null;
        const previous = this.lastTrades.get(report.contractId);
        if (previous && previous.timestamp !== null && timestamp !== null && previous.timestamp > timestamp) {
            return;
        }
        this.lastTrades.set(report.contractId, {
            contractId: report.contractId,
            filledPrice: report.filledPrice ?? report.price,
            filledSize: report.filledSize,
            side: report.isAsk ? "ask" : "bid",
            timestamp,
            mine,
        });
    }

    private deactivate(reason: string): void {
        if (this.active) {
            logger.warn({ reason }, "Market state inactive");
        }
        this.active = false;
    }
}
