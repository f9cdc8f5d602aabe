import { EventEmitter } from "events";
import { createChildLogger } from "../log/logger.js";
import type { IndicatorReading } from "../state/types.js";

const logger = createChildLogger({ module: "indicators" });

export type IndicatorKind = "bitvol" | "brave";

export type IndicatorRefresher = (asset: string) => Promise<IndicatorReading>;

export interface IndicatorCacheConfig {
    /** Readings older than this are refreshed on read */
    ttlMs: number;
}

const DEFAULT_INDICATOR_CONFIG: IndicatorCacheConfig = {
    ttlMs: 120_000,
};

/** Mini contracts share the index of their full-size asset. */
function normalizeAsset(asset: string): string {
    return asset === "CBTC" ? "BTC" : asset;
}

/**
 * Latest auxiliary indicator readings per asset, fed by stream events and
 * refreshed through the API when stale.
 *
 * Events:
 * - 'update': (kind, reading) when a newer reading is stored
 */
export class IndicatorCache extends EventEmitter {
    private readings = new Map<string, IndicatorReading>();
    private config: IndicatorCacheConfig;

    constructor(
        private refreshers: Partial<Record<IndicatorKind, IndicatorRefresher>> = {},
        config: Partial<IndicatorCacheConfig> = {},
        private now: () => number = Date.now
    ) {
        super();
        this.config = { ...DEFAULT_INDICATOR_CONFIG, ...config };
    }

    record(kind: IndicatorKind, reading: IndicatorReading): boolean {
        const key = this.key(kind, reading.asset);
        const current = this.readings.get(key);
        if (current && current.time > reading.time) {
            return false;
        }
        const stored = { ...reading, asset: normalizeAsset(reading.asset) };
        this.readings.set(key, stored);
        this.emit("update", kind, stored);
        return true;
    }

    peek(kind: IndicatorKind, asset: string): IndicatorReading | undefined {
        return this.readings.get(this.key(kind, asset));
    }

    isFresh(reading: IndicatorReading): boolean {
        return this.now() - reading.time <= this.config.ttlMs;
    }

    /**
     * Fresh cached reading, or a refreshed one. Falls back to the stale
     * reading (or null) when the refresh fails.
     */
    async getOrRefresh(kind: IndicatorKind, asset: string): Promise<IndicatorReading | null> {
        const cached = this.peek(kind, asset);
        if (cached && this.isFresh(cached)) {
            return cached;
        }
        const refresher = this.refreshers[kind];
        if (!refresher) {
            return cached ?? null;
        }
        try {
            const reading = await refresher(normalizeAsset(asset));
            this.record(kind, reading);
            return this.peek(kind, asset) ?? reading;
        } catch (err) {
            logger.warn({ err, kind, asset }, "Indicator refresh failed");
            return cached ?? null;
        }
    }

    get size(): number {
        return this.readings.size;
    }

    clear(): void {
        this.readings.clear();
    }

    private key(kind: IndicatorKind, asset: string): string {
        return `${kind}:${normalizeAsset(asset)}`;
    }
}
