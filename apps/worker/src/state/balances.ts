import type { CollateralBalances } from "./types.js";

/** Venue base units per tradable unit */
export const ASSET_UNITS: Readonly<Record<string, number>> = {
    USD: 100,
    CBTC: 100_000_000,
    ETH: 1_000_000_000,
};

export class AccountBalances {
    private available: Record<string, number> = {};
    private locked: Record<string, number> = {};

    update(collateral: CollateralBalances): void {
        this.available = { ...collateral.availableBalances };
        this.locked = { ...collateral.positionLockedBalances };
    }

    /** Available balance in tradable units (dollars, coins). */
    getAvailable(asset: string): number {
        return (this.available[asset] ?? 0) / (ASSET_UNITS[asset] ?? 1);
    }

    getLocked(asset: string): number {
        return (this.locked[asset] ?? 0) / (ASSET_UNITS[asset] ?? 1);
    }

    clear(): void {
        this.available = {};
        this.locked = {};
    }
}
