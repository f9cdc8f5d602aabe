import type { ActionReport, ContractId } from "./types.js";

/**
 * How an incoming own-order event relates to a non-empty stash:
 * - behind: older than the first buffered event, the gate is still catching up
 * - confirms: the public copy of the first buffered event
 * - extends: the next event after the last buffered one
 * - inconsistent: anything else
 */
export type StashRelation = "behind" | "confirms" | "extends" | "inconsistent";

/**
 * Own-order events that arrived ahead of the contract clock, per contract,
 * in clock order.
 */
export class OutOfOrderStash {
    private buffers = new Map<ContractId, ActionReport[]>();

    get total(): number {
        let total = 0;
        for (const buffer of this.buffers.values()) {
            total += buffer.length;
        }
        return total;
    }

    has(contractId: ContractId): boolean {
        return (this.buffers.get(contractId)?.length ?? 0) > 0;
    }

    size(contractId: ContractId): number {
        return this.buffers.get(contractId)?.length ?? 0;
    }

    first(contractId: ContractId): ActionReport | undefined {
        return this.buffers.get(contractId)?.[0];
    }

    last(contractId: ContractId): ActionReport | undefined {
        return this.buffers.get(contractId)?.at(-1);
    }

    classify(report: ActionReport): StashRelation | null {
        const first = this.first(report.contractId);
        const last = this.last(report.contractId);
        if (!first || !last) {
            return null;
        }
        if (report.clock < first.clock) {
            return "behind";
        }
        if (report.clock === first.clock) {
            return report.statusType === first.statusType && report.mid === first.mid
                ? "confirms"
                : "inconsistent";
        }
        if (report.clock === last.clock + 1 && report.mpid !== undefined) {
            return "extends";
        }
        return "inconsistent";
    }

    /** Append; events at or behind the last buffered clock are refused. */
    push(report: ActionReport): boolean {
        let buffer = this.buffers.get(report.contractId);
        if (!buffer) {
            buffer = [];
            this.buffers.set(report.contractId, buffer);
        }
        const last = buffer.at(-1);
        if (last && last.clock >= report.clock) {
            return false;
        }
        buffer.push(report);
        return true;
    }

    shift(contractId: ContractId): ActionReport | undefined {
        const buffer = this.buffers.get(contractId);
        const head = buffer?.shift();
        if (buffer && buffer.length === 0) {
            this.buffers.delete(contractId);
        }
        return head;
    }

    take(contractId: ContractId): ActionReport[] {
        const buffer = this.buffers.get(contractId) ?? [];
        this.buffers.delete(contractId);
        return buffer;
    }

    /** Drop entries at or below clock; returns how many were dropped. */
    prune(contractId: ContractId, clock: number): number {
        const buffer = this.buffers.get(contractId);
        if (!buffer) {
            return 0;
        }
        const kept = buffer.filter((report) => report.clock > clock);
        if (kept.length === 0) {
            this.buffers.delete(contractId);
        } else {
            this.buffers.set(contractId, kept);
        }
        return buffer.length - kept.length;
    }

    clear(): void {
        this.buffers.clear();
    }
}
