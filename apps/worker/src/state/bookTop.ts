import { createChildLogger } from "../log/logger.js";
import type { BookTop, ContractId } from "./types.js";

const logger = createChildLogger({ module: "book-top" });

/**
 * Equality for top-of-book prices where 0 and absent both mean "no price".
 */
export function isSameOrZeroOrAbsent(a: number | null | undefined, b: number | null | undefined): boolean {
    if (a === b) {
        return true;
    }
    const emptyA = a === null || a === undefined || a === 0;
    const emptyB = b === null || b === undefined || b === 0;
    return emptyA && emptyB;
}

export function topsMatch(a: BookTop, b: BookTop): boolean {
    return isSameOrZeroOrAbsent(a.bid, b.bid) && isSameOrZeroOrAbsent(a.ask, b.ask);
}

export type TopVerdict = "newer" | "older" | "match" | "mismatch";

/**
 * Latest known top-of-book per contract, from the stream or derived from the
 * local book. A candidate only replaces the cached top with a higher clock.
 */
export class BookTopCache {
    private tops = new Map<ContractId, BookTop>();

    get size(): number {
        return this.tops.size;
    }

    get(contractId: ContractId): BookTop | undefined {
        return this.tops.get(contractId);
    }

    delete(contractId: ContractId): void {
        this.tops.delete(contractId);
    }

    clear(): void {
        this.tops.clear();
    }

    reconcile(candidate: BookTop): TopVerdict {
        const cached = this.tops.get(candidate.contractId);
        if (!cached || cached.clock < candidate.clock) {
            this.tops.set(candidate.contractId, { ...candidate });
            return "newer";
        }
        if (cached.clock > candidate.clock) {
            logger.debug(
                { contractId: candidate.contractId, cached: cached.clock, clock: candidate.clock },
                "Ignoring older top"
            );
            return "older";
        }
        if (topsMatch(cached, candidate)) {
            return "match";
        }
        logger.warn(
            {
                contractId: candidate.contractId,
                clock: candidate.clock,
                cached: { bid: cached.bid, ask: cached.ask, synthetic: cached.synthetic },
                candidate: { bid: candidate.bid, ask: candidate.ask, synthetic: candidate.synthetic },
            },
            "Top of book mismatch at equal clock"
        );
        return "mismatch";
    }
}
