import { createChildLogger } from "../log/logger.js";
import type { ContractId } from "./types.js";

const logger = createChildLogger({ module: "own-orders" });

interface OrderRef {
    mid: string;
    contractId: ContractId;
    mpid?: string | null;
    cid?: string | null;
}

/**
 * The trader's own orders.
 *
 * The participant id (mpid) is learned from the first event or open order
 * that carries one. Open ids are those still resting; every id ever seen as
 * ours stays in the ever-mine set so that public copies without an mpid are
 * still recognised after the order left the book.
 */
export class OwnOrders {
    private mpid: string | null = null;
    private cid: string | null = null;
    private open = new Set<string>();
    private everMine = new Map<string, ContractId>();

    get participantId(): string | null {
        return this.mpid;
    }

    get customerId(): string | null {
        return this.cid;
    }

    get openCount(): number {
        return this.open.size;
    }

    get everMineCount(): number {
        return this.everMine.size;
    }

    /**
     * Decide whether an order is ours, learning the participant id on first sight.
     */
    classify(order: OrderRef): boolean {
        if (order.mpid) {
            if (this.mpid === null) {
                this.mpid = order.mpid;
                this.cid = order.cid ?? null;
                logger.info({ mpid: this.mpid, cid: this.cid }, "Learned participant id");
            }
            if (order.mpid === this.mpid) {
                if (!this.everMine.has(order.mid)) {
                    this.everMine.set(order.mid, order.contractId);
                }
                return true;
            }
            logger.warn({ mpid: order.mpid, mid: order.mid }, "Order carries a foreign participant id");
            return false;
        }
        return this.everMine.has(order.mid);
    }

    isMine(mid: string): boolean {
        return this.everMine.has(mid);
    }

    isOpen(mid: string): boolean {
        return this.open.has(mid);
    }

    markOpen(mid: string): void {
        if (this.everMine.has(mid)) {
            this.open.add(mid);
        }
    }

    markClosed(mid: string): void {
        this.open.delete(mid);
    }

    /** Forget the open set ahead of a full reload; ever-mine ids are kept. */
    resetOpen(): void {
        this.open.clear();
    }

    /** Drop ids of an expired contract; returns how many were evicted. */
    evictContract(contractId: ContractId): number {
        let evicted = 0;
        for (const [mid, id] of this.everMine) {
            if (id === contractId) {
                this.everMine.delete(mid);
                this.open.delete(mid);
                evicted++;
            }
        }
        return evicted;
    }
}
