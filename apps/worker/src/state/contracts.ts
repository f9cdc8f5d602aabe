import { createChildLogger } from "../log/logger.js";
import type { Contract, ContractId, SnapshotApi } from "./types.js";

const logger = createChildLogger({ module: "contracts" });

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

/**
 * Build the venue's canonical label for a contract, e.g. "BTC-Mini-31DEC2021-50000-Call".
 * Returns "" for unknown derivative types.
 */
export function toContractLabel(
    asset: string,
    dateExpires: number,
    derivativeType: string,
    isCall: boolean | null,
    strikePrice: number | null
): string {
    const date = new Date(dateExpires);
    const day = String(date.getUTCDate()).padStart(2, "0");
    const exp = `${day}${MONTHS[date.getUTCMonth()] ?? ""}${date.getUTCFullYear()}`;
    const name = asset === "CBTC" ? "BTC-Mini" : asset;

    switch (derivativeType) {
        case "future_contract":
            return `${name}-${exp}-Future`;
        case "options_contract": {
            const strike = Math.floor((strikePrice ?? 0) / 100);
            return `${name}-${exp}-${strike}-${isCall ? "Call" : "Put"}`;
        }
        case "day_ahead_swap":
            return `${name}-${exp}-NextDay`;
        default:
            logger.warn({ derivativeType }, "Unknown derivative type");
            return "";
    }
}

/**
 * Contracts by id with their expiry lifecycle and lookup indexes.
 *
 * A contract is never deleted; it moves one way to expired once its expiry
 * (minus a margin) passes or the venue removes it.
 */
export class ContractRegistry {
    private contracts = new Map<ContractId, Contract>();
    private expired = new Set<ContractId>();
    private labelIndex = new Map<string, ContractId>();
    private putCallPairs = new Map<ContractId, ContractId>();
    private strikesByExpiry = new Map<number, Map<string, Set<number>>>();
    private nextDaySwaps = new Map<string, Contract>();
    private inFlight = new Map<ContractId, Promise<Contract | null>>();

    constructor(
        private api: Pick<SnapshotApi, "fetchContract">,
        private expiryMarginSeconds = 15,
        private now: () => number = Date.now
    ) {}

    get size(): number {
        return this.contracts.size;
    }

    has(id: ContractId): boolean {
        return this.contracts.has(id);
    }

    get(id: ContractId): Contract | undefined {
        return this.contracts.get(id);
    }

    getByLabel(label: string): Contract | undefined {
        const id = this.labelIndex.get(label);
        return id === undefined ? undefined : this.contracts.get(id);
    }

    all(): Contract[] {
        return [...this.contracts.values()];
    }

    /**
     * Register a contract. Returns false when it was already known.
     */
    add(contract: Contract): boolean {
        if (this.contracts.has(contract.id)) {
            return false;
        }
        this.contracts.set(contract.id, contract);
        this.labelIndex.set(contract.label, contract.id);

        const expected = toContractLabel(
            contract.underlyingAsset,
            contract.dateExpires,
            contract.derivativeType,
            contract.isCall,
            contract.strikePrice
        );
        if (expected !== contract.label) {
            logger.warn({ label: contract.label, expected }, "Contract label differs from computed label");
        }

        if (this.isExpired(contract.id)) {
            logger.info({ contractId: contract.id, label: contract.label }, "Added expired contract");
            return true;
        }

        this.indexStrike(contract);
        this.pairPutCall(contract);
        if (contract.isNextDay && contract.active) {
            const current = this.nextDaySwaps.get(contract.underlyingAsset);
            if (!current || current.dateExpires < contract.dateExpires || this.isExpired(current.id)) {
                this.nextDaySwaps.set(contract.underlyingAsset, contract);
                logger.info({ asset: contract.underlyingAsset, label: contract.label }, "New next-day swap");
            }
        }
        logger.debug({ contractId: contract.id, label: contract.label }, "Added contract");
        return true;
    }

    /**
     * Known contract, or fetch and register it. Failures return null.
     * Concurrent calls for the same id share one fetch.
     */
    async ensure(id: ContractId): Promise<Contract | null> {
        const known = this.contracts.get(id);
        if (known) {
            return known;
        }
        const pending = this.inFlight.get(id);
        if (pending) {
            return pending;
        }
        const fetch = this.retrieve(id).finally(() => this.inFlight.delete(id));
        this.inFlight.set(id, fetch);
        return fetch;
    }

    private async retrieve(id: ContractId): Promise<Contract | null> {
        try {
            const contract = await this.api.fetchContract(id);
            this.add(contract);
            return this.contracts.get(id) ?? contract;
        } catch (err) {
            logger.warn({ err, contractId: id }, "Contract temporarily unavailable");
            return null;
        }
    }

    markExpired(id: ContractId): void {
        if (this.expired.has(id)) {
            return;
        }
        this.expired.add(id);
        logger.info({ contractId: id, label: this.contracts.get(id)?.label }, "Contract expired");
    }

    isExpired(id: ContractId): boolean {
        if (this.expired.has(id)) {
            return true;
        }
        const contract = this.contracts.get(id);
        if (!contract) {
            return false;
        }
        if (contract.dateExpires - this.now() < this.expiryMarginSeconds * 1000) {
            this.expired.add(id);
            return true;
        }
        return false;
    }

    /** Ids of contracts that have not expired. */
    activeIds(): ContractId[] {
        return [...this.contracts.keys()].filter((id) => !this.isExpired(id));
    }

    /** The call for a put, or the put for a call, on the same strike and expiry. */
    pairedContract(id: ContractId): Contract | undefined {
        const paired = this.putCallPairs.get(id);
        return paired === undefined ? undefined : this.contracts.get(paired);
    }

    expirationDates(): number[] {
        return [...this.strikesByExpiry.keys()].sort((a, b) => a - b);
    }

    strikes(dateExpires: number, asset: string): number[] {
        const strikes = this.strikesByExpiry.get(dateExpires)?.get(asset);
        return strikes ? [...strikes].sort((a, b) => a - b) : [];
    }

    nextDaySwap(asset: string): Contract | undefined {
        const swap = this.nextDaySwaps.get(asset);
        return swap && !this.isExpired(swap.id) ? swap : undefined;
    }

    clear(): void {
        this.contracts.clear();
        this.expired.clear();
        this.labelIndex.clear();
        this.putCallPairs.clear();
        this.strikesByExpiry.clear();
        this.nextDaySwaps.clear();
    }

    private indexStrike(contract: Contract): void {
        if (contract.strikePrice === null) {
            return;
        }
        let byAsset = this.strikesByExpiry.get(contract.dateExpires);
        if (!byAsset) {
            byAsset = new Map();
            this.strikesByExpiry.set(contract.dateExpires, byAsset);
        }
        let strikes = byAsset.get(contract.underlyingAsset);
        if (!strikes) {
            strikes = new Set();
            byAsset.set(contract.underlyingAsset, strikes);
        }
        strikes.add(contract.strikePrice);
    }

    private pairPutCall(contract: Contract): void {
        const label = contract.label;
        const counterpart = label.endsWith("-Put")
            ? label.replace(/-Put$/, "-Call")
            : label.endsWith("-Call")
              ? label.replace(/-Call$/, "-Put")
              : null;
        if (counterpart === null) {
            return;
        }
        const otherId = this.labelIndex.get(counterpart);
        if (otherId !== undefined) {
            this.putCallPairs.set(contract.id, otherId);
            this.putCallPairs.set(otherId, contract.id);
        }
    }
}
