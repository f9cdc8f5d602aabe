import { FULL_FILL_REASON, RESTING_STATUSES, StatusCodes } from "@venue-state/shared";
import { createChildLogger } from "../log/logger.js";
import type { OwnOrders } from "./ownOrders.js";
import type { ActionReport, BookEntry, BookTop, ContractId } from "./types.js";

const logger = createChildLogger({ module: "book-store" });

/**
 * Per-contract resting orders keyed by order id.
 *
 * Each book also keeps a clock floor: the clock of the latest removal, so the
 * derived top never reports a clock older than an event already applied.
 */
export class ClockedBookStore {
    private books = new Map<ContractId, Map<string, BookEntry>>();
    private clockFloors = new Map<ContractId, number>();
    private reloadFlags = new Map<ContractId, string>();

    constructor(private own: OwnOrders) {}

    has(contractId: ContractId): boolean {
        return this.books.has(contractId);
    }

    getBookState(contractId: ContractId): ReadonlyMap<string, BookEntry> {
        return this.books.get(contractId) ?? new Map();
    }

    depth(contractId: ContractId): number {
        return this.books.get(contractId)?.size ?? 0;
    }

    insert(report: ActionReport): BookEntry | null {
        if (!RESTING_STATUSES.has(report.statusType)) {
            logger.warn({ mid: report.mid, status: report.statusType }, "Insert with non-resting status");
            return null;
        }
        const book = this.bookFor(report.contractId);
        let price = report.price;
        let size = report.size;
        if (report.statusType === StatusCodes.FILLED) {
            if (report.insertedSize) {
                size = report.insertedSize;
                price = report.insertedPrice ?? price;
            } else if (report.originalSize) {
                size = report.originalSize;
                price = report.originalPrice ?? price;
            }
        }

        const existing = book.get(report.mid);
        if (existing) {
            if (existing.size === size) {
                logger.info({ mid: report.mid, contractId: report.contractId }, "Re-inserting known order");
            } else {
                logger.warn(
                    { mid: report.mid, contractId: report.contractId, stored: existing.size, size },
                    "Re-inserting known order with a different size"
                );
            }
        }

        const entry: BookEntry = {
            mid: report.mid,
            contractId: report.contractId,
            price,
            size,
            isAsk: report.isAsk,
            clock: report.clock,
        };
        book.set(report.mid, entry);
        this.own.markOpen(report.mid);
        return entry;
    }

    remove(report: ActionReport): void {
        const book = this.books.get(report.contractId);
        if (!book?.delete(report.mid)) {
            logger.debug({ mid: report.mid, contractId: report.contractId }, "Remove of untracked order");
        }
        this.raiseFloor(report.contractId, report.clock);
        this.own.markClosed(report.mid);
    }

    /**
     * Apply a fill to a resting order.
     */
    replace(report: ActionReport): void {
        const book = this.bookFor(report.contractId);
        let entry = book.get(report.mid);
        if (!entry) {
            const inserted = this.insert(report);
            if (!inserted) {
                return;
            }
            entry = inserted;
        }

        if (entry.clock > report.clock) {
            logger.warn(
                { mid: report.mid, contractId: report.contractId, stored: entry.clock, clock: report.clock },
                "Ignoring fill older than stored order"
            );
            return;
        }

        let size = report.size;
        if (report.filledSize !== undefined && entry.size > 0) {
            size = entry.size - report.filledSize;
        }
        if (size < 0) {
            logger.warn(
                { mid: report.mid, contractId: report.contractId, stored: entry.size, filled: report.filledSize },
                "Fill larger than resting size"
            );
            this.flagReload(report.contractId, "overfill");
            size = 0;
        }

        if (size === 0) {
            if (report.statusReason !== FULL_FILL_REASON) {
                logger.warn(
                    { mid: report.mid, contractId: report.contractId, reason: report.statusReason },
                    "Order emptied without a full-fill reason"
                );
                this.flagReload(report.contractId, "unexpected-fill-reason");
            }
            this.remove(report);
            return;
        }

        entry.size = size;
        entry.clock = report.clock;
    }

    /**
     * Replace a whole book from a snapshot. Duplicate ids keep the newer clock.
     * Returns the synthetic top of the new book.
     */
    replaceAll(contractId: ContractId, entries: BookEntry[], clock: number | null): BookTop {
        const book = new Map<string, BookEntry>();
        for (const entry of entries) {
            const seen = book.get(entry.mid);
            if (seen && seen.clock >= entry.clock) {
                continue;
            }
            book.set(entry.mid, { ...entry, contractId });
            if (this.own.isMine(entry.mid)) {
                this.own.markOpen(entry.mid);
            }
        }
        this.books.set(contractId, book);
        this.clockFloors.set(contractId, clock ?? -1);
        this.reloadFlags.delete(contractId);
        // getTop cannot be null here: the book was just stored
        return this.getTop(contractId) ?? { contractId, bid: null, ask: null, clock: clock ?? -1, synthetic: true };
    }

    /**
     * Best bid/ask derived from the book. Own orders can be left out to see the
     * market the trader would trade against.
     */
    getTop(contractId: ContractId, excludeMine = false): BookTop | null {
        const book = this.books.get(contractId);
        if (!book) {
            return null;
        }
        let bid: number | null = null;
        let ask: number | null = null;
        let clock = this.clockFloors.get(contractId) ?? -1;
        for (const entry of book.values()) {
            clock = Math.max(clock, entry.clock);
            if (entry.size <= 0 || (excludeMine && this.own.isMine(entry.mid))) {
                continue;
            }
            if (entry.isAsk) {
                ask = ask === null ? entry.price : Math.min(ask, entry.price);
            } else {
                bid = bid === null ? entry.price : Math.max(bid, entry.price);
            }
        }
        return { contractId, bid, ask, clock, synthetic: true };
    }

    /**
     * Best resting entry strictly better than targetPrice for a taker on the
     * other side: the lowest ask above it, or the highest bid below it.
     */
    nextBestEntry(
        contractId: ContractId,
        targetPrice: number,
        isAsk: boolean,
        includeMine = false
    ): BookEntry | null {
        const book = this.books.get(contractId);
        if (!book) {
            return null;
        }
        let best: BookEntry | null = null;
        for (const entry of book.values()) {
            if (entry.isAsk !== isAsk || entry.size <= 0) {
                continue;
            }
            if (!includeMine && this.own.isMine(entry.mid)) {
                continue;
            }
            if (isAsk) {
                if (entry.price > targetPrice && (best === null || entry.price < best.price)) {
                    best = entry;
                }
            } else if (entry.price < targetPrice && (best === null || entry.price > best.price)) {
                best = entry;
            }
        }
        return best;
    }

    flagReload(contractId: ContractId, reason: string): void {
        if (!this.reloadFlags.has(contractId)) {
            logger.info({ contractId, reason }, "Flagged book for reload");
        }
        this.reloadFlags.set(contractId, reason);
    }

    hasReloadFlag(contractId: ContractId): boolean {
        return this.reloadFlags.has(contractId);
    }

    takeReloadFlags(): ContractId[] {
        const ids = [...this.reloadFlags.keys()];
        this.reloadFlags.clear();
        return ids;
    }

    drop(contractId: ContractId): void {
        this.books.delete(contractId);
        this.clockFloors.delete(contractId);
        this.reloadFlags.delete(contractId);
    }

    clear(): void {
        this.books.clear();
        this.clockFloors.clear();
        this.reloadFlags.clear();
    }

    private bookFor(contractId: ContractId): Map<string, BookEntry> {
        let book = this.books.get(contractId);
        if (!book) {
            book = new Map();
            this.books.set(contractId, book);
        }
        return book;
    }

    private raiseFloor(contractId: ContractId, clock: number): void {
        this.clockFloors.set(contractId, Math.max(this.clockFloors.get(contractId) ?? -1, clock));
    }
}
