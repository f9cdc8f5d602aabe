import type { ReconcileTuning } from "@venue-state/shared";
import { createChildLogger } from "../log/logger.js";
import type { ContractRegistry } from "./contracts.js";
import type { DelayedTaskScheduler, TaskHandle } from "./scheduler.js";
import type { ActionReport, Contract, ContractId, Position, PositionTrade, PositionUpdate, SnapshotApi } from "./types.js";

const logger = createChildLogger({ module: "positions" });

/** Cents per dollar, the unit of prices and basis */
const CENTS_PER_USD = 100;
const MAX_FEE_PER_CONTRACT = 15;

/**
 * Venue fee: 20% of the price in dollars per contract, capped at 15 cents.
 */
export function venueFee(price: number, size: number): number {
    const perContract = Math.min(MAX_FEE_PER_CONTRACT, Math.floor(price / (5 * CENTS_PER_USD)));
    return Math.abs(size) * perContract;
}

export interface BasisResult {
    size: number;
    basis: number;
}

/**
 * Fold a position's trade history into size and basis. Basis resets to 0
 * whenever the running size reaches or crosses zero.
 */
export function computeBasis(trades: PositionTrade[]): BasisResult {
    const ordered = trades.every((trade) => trade.timestamp !== null)
        ? [...trades].sort((a, b) => (a.timestamp ?? 0) - (b.timestamp ?? 0))
        : trades;

    let size = 0;
    let basis = 0;
    for (const trade of ordered) {
        const sign = trade.side === "bid" ? 1 : -1;
        const cost = trade.fee - trade.rebate + sign * trade.premium;
        const next = size + sign * trade.filledSize;
        if (next === 0 || (size !== 0 && Math.sign(next) !== Math.sign(size))) {
            basis = 0;
        } else {
            basis += cost;
        }
        size = next;
    }
    return { size, basis };
}

export interface PositionTrackerDeps {
    api: Pick<SnapshotApi, "fetchAllPositions" | "fetchTradesForPosition">;
    registry: ContractRegistry;
    scheduler: DelayedTaskScheduler;
    tuning: Pick<ReconcileTuning, "basisDelayTicks" | "basisRetryTicks" | "basisMaxRetries">;
    skipExpired: boolean;
}

/**
 * Positions with an immediately-updated size and an eventually-consistent
 * basis. A basis that cannot be adjusted in place is marked pending and
 * recomputed from the venue's trade history a few heartbeats later.
 */
export class PositionTracker {
    private positions = new Map<ContractId, Position>();
    private scheduled = new Map<ContractId, TaskHandle>();
    private gaveUp = new Set<ContractId>();
    private epoch = 0;

    constructor(private deps: PositionTrackerDeps) {}

    get(contractId: ContractId): Position | undefined {
        return this.positions.get(contractId);
    }

    getSize(contractId: ContractId): number {
        return this.positions.get(contractId)?.size ?? 0;
    }

    all(): Position[] {
        return [...this.positions.values()];
    }

    isBasisPending(contractId: ContractId): boolean {
        const position = this.positions.get(contractId);
        return position !== undefined && position.basis === undefined;
    }

    pendingIds(): ContractId[] {
        return [...this.positions.values()]
            .filter((position) => position.basis === undefined)
            .map((position) => position.contractId);
    }

    isScheduled(contractId: ContractId): boolean {
        return this.scheduled.has(contractId);
    }

    /**
     * Own fill: move the size now, adjust basis in place when it stays on the
     * same side of zero, otherwise leave it pending for a recomputation.
     */
    applyFill(report: ActionReport, contract: Contract): void {
        const filled = report.filledSize ?? 0;
        if (filled === 0) {
            return;
        }
        const sign = report.isAsk ? -1 : 1;
        let position = this.positions.get(contract.id);
        if (!position) {
            position = { contractId: contract.id, size: 0, exercisedSize: 0 };
            this.positions.set(contract.id, position);
        }
        const previous = position.size;
        const next = previous + sign * filled;
        const price = report.filledPrice;

        if (
            position.basis !== undefined &&
            price !== undefined &&
            previous !== 0 &&
            next !== 0 &&
            Math.sign(previous) === Math.sign(next)
        ) {
            const premium = Math.round((filled * price) / contract.multiplier);
            position.basis += venueFee(price, filled) + sign * premium;
        } else {
            position.basis = undefined;
        }
        position.size = next;
        this.gaveUp.delete(contract.id);

        logger.info(
            { contractId: contract.id, label: contract.label, size: next, basis: position.basis ?? null },
            "Own fill applied to position"
        );
        if (position.basis === undefined) {
            this.scheduleRecompute(contract.id, 0, this.deps.tuning.basisDelayTicks);
        }
    }

    async onOpenPositions(updates: PositionUpdate[]): Promise<void> {
        for (const update of updates) {
            const contract = await this.deps.registry.ensure(update.contractId);
            if (!contract) {
                continue;
            }
            const existing = this.positions.get(update.contractId);
            if (existing) {
                const changed = existing.size !== update.size;
                existing.size = update.size;
                existing.exercisedSize = update.exercisedSize;
                if (changed) {
                    existing.basis = undefined;
                    this.gaveUp.delete(update.contractId);
                }
                if (existing.basis === undefined) {
                    this.scheduleRecompute(update.contractId, 0, this.deps.tuning.basisDelayTicks);
                }
            } else if (update.size !== 0 || update.exercisedSize !== 0) {
                this.positions.set(update.contractId, {
                    contractId: update.contractId,
                    size: update.size,
                    exercisedSize: update.exercisedSize,
                });
                this.scheduleRecompute(update.contractId, 0, this.deps.tuning.basisDelayTicks);
            }
        }
    }

    /**
     * Replace the table from the snapshot API. A known basis survives when the
     * size did not change. Returns the contracts whose basis is pending.
     */
    loadAll(positions: Position[]): ContractId[] {
        const previous = this.positions;
        this.positions = new Map();
        for (const position of positions) {
            if (this.deps.skipExpired && this.deps.registry.isExpired(position.contractId)) {
                continue;
            }
            const old = previous.get(position.contractId);
            const basis =
                position.basis ?? (old && old.size === position.size ? old.basis : undefined);
            this.positions.set(position.contractId, { ...position, basis });
        }
        logger.info({ positions: this.positions.size }, "Loaded positions");
        return this.pendingIds();
    }

    scheduleRecompute(contractId: ContractId, attempt: number, ticks: number): void {
        const existing = this.scheduled.get(contractId);
        if (existing) {
            this.deps.scheduler.cancel(existing);
        }
        const handle = this.deps.scheduler.schedule(`basis:${contractId}`, ticks, () =>
            this.recompute(contractId, attempt)
        );
        this.scheduled.set(contractId, handle);
    }

    /**
     * Recompute basis from the full trade history. Never throws; failures and
     * size mismatches reschedule up to the configured attempts.
     */
    async recompute(contractId: ContractId, attempt = 0): Promise<void> {
        this.scheduled.delete(contractId);
        const epoch = this.epoch;
        const contract = this.deps.registry.get(contractId);
        if (!contract || (this.deps.skipExpired && this.deps.registry.isExpired(contractId))) {
            return;
        }
        const position = this.positions.get(contractId);
        if (!position || position.basis !== undefined) {
            return;
        }

        let result: BasisResult;
        try {
            const positionId = position.id ?? (await this.resolvePositionId(contractId));
            if (positionId === undefined) {
                throw new Error(`No venue position for contract ${contractId}`);
            }
            const trades = await this.deps.api.fetchTradesForPosition(positionId);
            result = computeBasis(trades.filter((trade) => trade.contractId === contractId));
        } catch (err) {
            if (epoch !== this.epoch) {
                return;
            }
            logger.warn({ err, contractId, attempt }, "Basis recomputation failed");
            this.retry(contractId, attempt);
            return;
        }

        const live = this.positions.get(contractId);
        if (epoch !== this.epoch || !live || live.basis !== undefined) {
            return;
        }
        if (result.size !== live.size) {
            logger.info(
                { contractId, label: contract.label, computed: result.size, live: live.size, attempt },
                "Trade history does not match live size yet"
            );
            this.retry(contractId, attempt);
            return;
        }
        live.basis = result.basis;
        logger.info(
            { contractId, label: contract.label, size: live.size, basis: live.basis },
            "Position basis recomputed"
        );
    }

    /**
     * Schedule recomputations for pending positions that have none in flight.
     * Returns how many were scheduled.
     */
    sweep(max: number): number {
        let count = 0;
        for (const position of this.positions.values()) {
            if (count >= max) {
                break;
            }
            const id = position.contractId;
            if (position.basis !== undefined || this.scheduled.has(id) || this.gaveUp.has(id)) {
                continue;
            }
            if (this.deps.skipExpired && this.deps.registry.isExpired(id)) {
                continue;
            }
            this.scheduleRecompute(id, 0, this.deps.tuning.basisDelayTicks);
            count++;
        }
        return count;
    }

    clear(): void {
        this.epoch++;
        for (const handle of this.scheduled.values()) {
            this.deps.scheduler.cancel(handle);
        }
        this.scheduled.clear();
        this.gaveUp.clear();
        this.positions.clear();
    }

    private retry(contractId: ContractId, attempt: number): void {
        if (attempt < this.deps.tuning.basisMaxRetries) {
            this.scheduleRecompute(contractId, attempt + 1, this.deps.tuning.basisRetryTicks);
            return;
        }
        this.gaveUp.add(contractId);
        logger.warn(
            { contractId, attempts: attempt + 1 },
            "Basis still inconsistent; leaving it pending until the size changes"
        );
    }

    private async resolvePositionId(contractId: ContractId): Promise<number | undefined> {
        const all = await this.deps.api.fetchAllPositions();
        for (const remote of all) {
            const local = this.positions.get(remote.contractId);
            if (local && local.id === undefined && remote.id !== undefined) {
                local.id = remote.id;
                local.type = remote.type;
            }
        }
        return this.positions.get(contractId)?.id;
    }
}
