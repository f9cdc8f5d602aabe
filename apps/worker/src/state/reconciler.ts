import { StatusCodes, isRejectStatus, type ReconcileTuning } from "@venue-state/shared";
import { createChildLogger } from "../log/logger.js";
import type { ActionQueue } from "./actionQueue.js";
import type { ClockedBookStore } from "./bookStore.js";
import type { BookTopCache } from "./bookTop.js";
import type { ContractRegistry } from "./contracts.js";
import type { OutOfOrderStash } from "./outOfOrderStash.js";
import type { OwnOrders } from "./ownOrders.js";
import type { PositionTracker } from "./positions.js";
import type {
    ActionReport,
    BookSnapshot,
    BookTop,
    BookTopEvent,
    Contract,
    ContractId,
    SnapshotApi,
    VenueEvent,
} from "./types.js";

const logger = createChildLogger({ module: "reconciler" });

/** Numeric contract clock reported while a reload is in progress */
export const LOADING_CLOCK = -2;

export type ContractPhase = "unloaded" | "loading" | "live";

type ClockState = { phase: "loading"; prior: ClockState | undefined } | { phase: "live"; clock: number };

export interface ReplayOptions {
    force?: boolean;
    allowStash?: boolean;
}

export type ReplayTarget = (event: VenueEvent, options: ReplayOptions) => Promise<boolean>;

export interface ReconcilerDeps {
    api: Pick<SnapshotApi, "fetchBookStates">;
    registry: ContractRegistry;
    own: OwnOrders;
    store: ClockedBookStore;
    tops: BookTopCache;
    stash: OutOfOrderStash;
    queue: ActionQueue;
    positions: PositionTracker;
    tuning: Pick<ReconcileTuning, "reloadOnTopMismatch">;
    /** Called for every applied fill */
    onFill?: (report: ActionReport, mine: boolean) => void;
}

export interface ReconcilerStats {
    unloaded: number;
    loading: number;
    live: number;
    stashed: number;
    pendingReloads: number;
    reloads: number;
    failedReloads: number;
}

/**
 * Keeps each contract's book consistent with the stream.
 *
 * Every action report is gated on the contract clock: only the event right
 * after the current clock is applied; older ones are dropped and gaps trigger
 * a snapshot reload. While any reload is in flight the action queue holds live
 * events, which are replayed in arrival order once the window closes.
 */
export class ReconciliationController {
    private clocks = new Map<ContractId, ClockState>();
    private pendingReloads = new Set<ContractId>();
    private previousStale = new Map<ContractId, number>();
    private replay: ReplayTarget | null = null;
    private epoch = 0;
    private reloads = 0;
    private failedReloads = 0;

    constructor(private deps: ReconcilerDeps) {}

    /** Where buffered events are re-dispatched; set once by the dispatcher. */
    setReplayTarget(target: ReplayTarget): void {
        this.replay = target;
    }

    phase(contractId: ContractId): ContractPhase {
        return this.clocks.get(contractId)?.phase ?? "unloaded";
    }

    /** Contract clock; LOADING_CLOCK while reloading, undefined when unloaded. */
    getContractClock(contractId: ContractId): number | undefined {
        const state = this.clocks.get(contractId);
        if (!state) {
            return undefined;
        }
        return state.phase === "live" ? state.clock : LOADING_CLOCK;
    }

    requestReload(contractId: ContractId): void {
        this.pendingReloads.add(contractId);
    }

    stats(): ReconcilerStats {
        let loading = 0;
        let live = 0;
        for (const state of this.clocks.values()) {
            if (state.phase === "loading") {
                loading++;
            } else {
                live++;
            }
        }
        return {
            unloaded: Math.max(0, this.deps.registry.activeIds().length - live - loading),
            loading,
            live,
            stashed: this.deps.stash.total,
            pendingReloads: this.pendingReloads.size,
            reloads: this.reloads,
            failedReloads: this.failedReloads,
        };
    }

    /**
     * Gate an action report against the contract clock. Returns true only when
     * the report was applied.
     */
    async handleActionReport(report: ActionReport, options: ReplayOptions = {}): Promise<boolean> {
        const allowStash = options.allowStash ?? true;
        const force = options.force ?? false;
        const known = this.deps.registry.get(report.contractId);
        // Live events for the same book must queue behind the contract fetch.
        let token = known || force ? null : this.deps.queue.open();
        try {
            const contract = known ?? (await this.deps.registry.ensure(report.contractId));
            if (!contract) {
                logger.warn({ contractId: report.contractId, mid: report.mid }, "Action report for unavailable contract");
                return false;
            }
            const mine = this.deps.own.classify(report);

            let current = report;
            if (mine && allowStash) {
                switch (this.deps.stash.classify(report)) {
                    case "confirms": {
                        const stashed = this.deps.stash.shift(report.contractId);
                        if (stashed) {
                            current = stashed;
                        }
                        break;
                    }
                    case "extends":
                        this.deps.stash.push(report);
                        logger.debug({ contractId: report.contractId, clock: report.clock }, "Extended stash");
                        return false;
                    case "inconsistent":
                        if (token === null) {
                            token = this.deps.queue.open();
                        }
                        await this.flushStash(contract);
                        break;
                    case "behind":
                    case null:
                        break;
                }
            }
            return await this.gate(current, contract, mine, { force, allowStash });
        } finally {
            if (token !== null) {
                await this.drainQueue(token);
            }
        }
    }

    async handleBookTop(event: BookTopEvent): Promise<boolean> {
        if (!this.deps.registry.has(event.contractId)) {
            logger.warn({ contractId: event.contractId }, "Top of book for unknown contract");
            const contract = await this.deps.registry.ensure(event.contractId);
            if (contract && this.phase(contract.id) !== "loading") {
                this.requestReload(contract.id);
            }
            return false;
        }
        const verdict = this.deps.tops.reconcile({
            contractId: event.contractId,
            bid: event.bid,
            ask: event.ask,
            clock: event.clock,
            synthetic: false,
        });
        if (verdict === "mismatch") {
            this.onTopMismatch(event.contractId);
        }
        return verdict === "newer";
    }

    /**
     * Reload one contract's book inside a resync window.
     */
    async loadBooks(contractId: ContractId): Promise<boolean> {
        const token = this.deps.queue.open();
        try {
            return await this.reloadContract(contractId);
        } finally {
            if (token !== null) {
                await this.drainQueue(token);
            }
        }
    }

    /**
     * Reload many books concurrently in one resync window. When the window was
     * already open its owner drains it.
     */
    async loadAllBooks(contractIds: ContractId[]): Promise<number> {
        const token = this.deps.queue.open();
        try {
            const results = await Promise.all(contractIds.map((id) => this.reloadContract(id)));
            return results.filter(Boolean).length;
        } finally {
            if (token !== null) {
                await this.drainQueue(token);
            }
        }
    }

    /**
     * Merge a snapshot into the store and make the contract live at the
     * snapshot clock. Returns the synthetic top.
     */
    mergeSnapshot(snapshot: BookSnapshot): BookTop {
        const top = this.deps.store.replaceAll(snapshot.contractId, snapshot.entries, snapshot.clock);
        const clock = snapshot.clock ?? top.clock;
        this.clocks.set(snapshot.contractId, { phase: "live", clock });
        this.crossValidate(top);
        this.drainStash(snapshot.contractId);
        return top;
    }

    /**
     * Replay queued events with forced-apply semantics until the queue is
     * empty, then close it.
     */
    async drainQueue(token: number): Promise<number> {
        let count = 0;
        try {
            for (;;) {
                const event = this.deps.queue.shift(token);
                if (!event) {
                    break;
                }
                await this.dispatch(event, { force: true });
                count++;
            }
        } finally {
            const dropped = this.deps.queue.close(token);
            if (dropped.length > 0) {
                logger.warn({ dropped: dropped.length }, "Closed action queue with events left");
            }
        }
        if (count > 0) {
            logger.info({ events: count }, "Drained action queue");
        }
        return count;
    }

    /**
     * Contracts to reload this heartbeat: unloaded, flagged or requested ones
     * always; ones whose top is missing or ahead of the clock only after the
     * same clock was seen stale on the previous heartbeat.
     */
    selectStale(max: number): ContractId[] {
        const seen = new Map<ContractId, number>();
        const stale: ContractId[] = [];
        for (const id of this.deps.registry.activeIds()) {
            if (stale.length >= max) {
                break;
            }
            const state = this.clocks.get(id);
            if (state?.phase === "loading") {
                continue;
            }
            if (!state || this.pendingReloads.has(id) || this.deps.store.hasReloadFlag(id)) {
                stale.push(id);
                continue;
            }
            const top = this.deps.tops.get(id);
            if (!top || top.clock > state.clock) {
                seen.set(id, state.clock);
                if (this.previousStale.get(id) === state.clock) {
                    stale.push(id);
                }
            }
        }
        this.previousStale = seen;
        return stale;
    }

    async runStaleSweep(max: number): Promise<number> {
        const stale = this.selectStale(max);
        if (stale.length === 0) {
            return 0;
        }
        logger.info({ contracts: stale.length }, "Reloading stale books");
        return this.loadAllBooks(stale);
    }

    clear(): void {
        this.epoch++;
        this.clocks.clear();
        this.pendingReloads.clear();
        this.previousStale.clear();
        this.deps.store.clear();
        this.deps.tops.clear();
        this.deps.stash.clear();
    }

    private async gate(
        report: ActionReport,
        contract: Contract,
        mine: boolean,
        options: Required<ReplayOptions>
    ): Promise<boolean> {
        const state = this.clocks.get(contract.id);
        const canStash = mine && options.allowStash && report.mpid !== undefined;

        if (state?.phase === "loading") {
            if (canStash && this.deps.stash.push(report)) {
                logger.debug({ contractId: contract.id, clock: report.clock }, "Stashed own event during reload");
            } else if (!options.force && this.deps.queue.isOpen) {
                this.deps.queue.append(report);
                logger.debug({ contractId: contract.id, clock: report.clock }, "Queued event during reload");
            } else {
                logger.debug({ contractId: contract.id, clock: report.clock }, "Ignoring event during reload");
            }
            return false;
        }

        if (state?.phase === "live") {
            if (report.clock <= state.clock) {
                logger.debug(
                    { contractId: contract.id, clock: report.clock, contractClock: state.clock, mine },
                    "Ignoring stale event"
                );
                return false;
            }
            if (report.clock === state.clock + 1) {
                this.apply(report, contract, mine);
                this.drainStash(contract.id);
                return true;
            }
            if (canStash && !this.deps.stash.has(contract.id)) {
                this.deps.stash.push(report);
                logger.info(
                    { contractId: contract.id, clock: report.clock, contractClock: state.clock },
                    "Stashed own event ahead of the book"
                );
                return false;
            }
            logger.warn(
                { contractId: contract.id, label: contract.label, clock: report.clock, contractClock: state.clock },
                "Clock gap; reloading book"
            );
        } else {
            logger.info({ contractId: contract.id, label: contract.label }, "Loading book on first event");
        }

        const token = this.deps.queue.open();
        try {
            await this.reloadContract(contract.id);
            const after = this.clocks.get(contract.id);
            if (after?.phase === "live" && report.clock === after.clock + 1) {
                this.apply(report, contract, mine);
                this.drainStash(contract.id);
                return true;
            }
            logger.debug(
                { contractId: contract.id, clock: report.clock, contractClock: this.getContractClock(contract.id) },
                "Event not applicable after reload"
            );
            return false;
        } finally {
            if (token !== null) {
                await this.drainQueue(token);
            }
        }
    }

    private apply(report: ActionReport, contract: Contract, mine: boolean): void {
        this.clocks.set(contract.id, { phase: "live", clock: report.clock });
        const store = this.deps.store;

        switch (report.statusType) {
            case StatusCodes.INSERTED:
                store.insert(report);
                break;
            case StatusCodes.FILLED:
                if (mine) {
                    this.deps.positions.applyFill(report, contract);
                }
                store.replace(report);
                this.deps.onFill?.(report, mine);
                break;
            case StatusCodes.NOT_FILLED:
                logger.warn({ contractId: contract.id, mid: report.mid, mine }, "Market order not filled");
                break;
            case StatusCodes.CANCELLED:
                store.remove(report);
                break;
            case StatusCodes.CANCEL_REPLACED:
                store.remove(report);
                store.insert(report);
                break;
            case StatusCodes.ACKNOWLEDGED:
                logger.debug({ contractId: contract.id, mid: report.mid }, "Order acknowledged");
                break;
            default:
                if (isRejectStatus(report.statusType)) {
                    if (report.statusType === StatusCodes.EXPIRED) {
                        logger.info({ contractId: contract.id, mid: report.mid }, "Order expired");
                    } else {
                        logger.warn(
                            { contractId: contract.id, mid: report.mid, status: report.statusType, mine },
                            "Order rejected"
                        );
                    }
                    store.remove(report);
                } else {
                    logger.warn({ contractId: contract.id, status: report.statusType }, "Unhandled status");
                }
        }

        const top = store.getTop(contract.id);
        if (top) {
            this.crossValidate(top);
        }
    }

    private async reloadContract(contractId: ContractId): Promise<boolean> {
        const contract = await this.deps.registry.ensure(contractId);
        if (!contract) {
            return false;
        }
        if (this.deps.registry.isExpired(contractId)) {
            logger.debug({ contractId }, "Skipping reload of expired contract");
            this.pendingReloads.delete(contractId);
            return false;
        }
        const prior = this.clocks.get(contractId);
        if (prior?.phase === "loading") {
            return false;
        }

        const epoch = this.epoch;
        this.clocks.set(contractId, { phase: "loading", prior });
        this.pendingReloads.delete(contractId);
        this.reloads++;
        try {
            const snapshot = await this.deps.api.fetchBookStates(contractId);
            if (epoch !== this.epoch) {
                logger.info({ contractId }, "Discarding snapshot fetched before reset");
                return false;
            }
            this.mergeSnapshot({ ...snapshot, contractId });
            logger.debug(
                { contractId, clock: this.getContractClock(contractId), entries: snapshot.entries.length },
                "Book reloaded"
            );
            return true;
        } catch (err) {
            if (epoch !== this.epoch) {
                return false;
            }
            this.failedReloads++;
            if (prior) {
                this.clocks.set(contractId, prior);
            } else {
                this.clocks.delete(contractId);
            }
            this.pendingReloads.add(contractId);
            logger.warn({ err, contractId, label: contract.label }, "Book snapshot temporarily unavailable");
            return false;
        }
    }

    /**
     * Drop stashed events the clock already covers, then apply the head while
     * it is the next event.
     */
    private drainStash(contractId: ContractId): void {
        const stash = this.deps.stash;
        if (!stash.has(contractId)) {
            return;
        }
        const contract = this.deps.registry.get(contractId);
        const state = this.clocks.get(contractId);
        if (!contract || state?.phase !== "live") {
            return;
        }
        stash.prune(contractId, state.clock);
        let clock = state.clock;
        for (;;) {
            const head = stash.first(contractId);
            if (!head || head.clock !== clock + 1) {
                break;
            }
            stash.shift(contractId);
            this.apply(head, contract, true);
            clock = head.clock;
        }
    }

    /**
     * Replay the stash without stashing, then force a reload of the book.
     */
    private async flushStash(contract: Contract): Promise<void> {
        const entries = this.deps.stash.take(contract.id);
        logger.warn(
            { contractId: contract.id, label: contract.label, stashed: entries.length },
            "Inconsistent stash; replaying and reloading"
        );
        for (const entry of entries) {
            await this.dispatch(entry, { force: true, allowStash: false });
        }
        await this.reloadContract(contract.id);
    }

    private crossValidate(top: BookTop): void {
        const state = this.clocks.get(top.contractId);
        if (state?.phase === "live" && state.clock < top.clock) {
            logger.warn(
                { contractId: top.contractId, topClock: top.clock, contractClock: state.clock },
                "Book top ahead of contract clock"
            );
        }
        if (this.deps.tops.reconcile(top) === "mismatch") {
            this.onTopMismatch(top.contractId);
        }
    }

    private onTopMismatch(contractId: ContractId): void {
        if (this.deps.tuning.reloadOnTopMismatch) {
            this.deps.store.flagReload(contractId, "top-mismatch");
        }
    }

    private dispatch(event: VenueEvent, options: ReplayOptions): Promise<boolean> {
        if (this.replay) {
            return this.replay(event, options);
        }
        if (event.type === "action_report") {
            return this.handleActionReport(event, options);
        }
        return Promise.resolve(false);
    }
}
