import type Bottleneck from "bottleneck";
import { request } from "undici";
import { z } from "zod";
import { VenueApiError } from "../http/errors.js";
import { createVenueLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";
import type {
    BookSnapshot,
    Contract,
    ContractId,
    IndicatorReading,
    OpenOrder,
    Position,
    PositionTrade,
    SnapshotApi,
} from "../state/types.js";
import {
    BitvolWireSchema,
    BookStatesResponseSchema,
    ContractWireSchema,
    OpenOrderWireSchema,
    PositionTradeWireSchema,
    PositionWireSchema,
    itemResponseSchema,
    listResponseSchema,
    toIndicatorReading,
} from "./types.js";

const logger = createChildLogger({ module: "venue-api" });

/** Guard against a server that keeps handing out `next` links */
const MAX_PAGES = 200;
const PAGE_LIMIT = "200";

export interface VenueApiClientConfig {
    baseUrl: string;
    apiKey?: string;
    limiter?: Bottleneck;
}

/**
 * REST client for the venue's snapshot endpoints. Requests go through a
 * Bottleneck limiter that retries rate-limited responses; responses are
 * validated with zod and mapped to domain types.
 */
export class VenueApiClient implements SnapshotApi {
    private limiter: Bottleneck;

    constructor(private config: VenueApiClientConfig) {
        this.limiter = config.limiter ?? createVenueLimiter();
    }

    async fetchAllContracts(): Promise<Contract[]> {
        const contracts = await this.getAllPages("/trading/contracts", ContractWireSchema, { active: "true" });
        logger.info({ count: contracts.length }, "Fetched contracts");
        return contracts;
    }

    fetchContract(id: ContractId): Promise<Contract> {
        return this.get(`/trading/contracts/${id}`, itemResponseSchema(ContractWireSchema));
    }

    fetchBookStates(contractId: ContractId): Promise<BookSnapshot> {
        return this.get(`/trading/book-states/${contractId}`, BookStatesResponseSchema);
    }

    fetchOpenOrders(): Promise<OpenOrder[]> {
        return this.getAllPages("/trading/open-orders", OpenOrderWireSchema);
    }

    fetchAllPositions(): Promise<Position[]> {
        return this.getAllPages("/trading/positions", PositionWireSchema);
    }

    fetchTradesForPosition(positionId: number): Promise<PositionTrade[]> {
        return this.getAllPages(`/trading/positions/${positionId}/trades`, PositionTradeWireSchema);
    }

    async fetchBitvol(asset: string): Promise<IndicatorReading> {
        const page = await this.get("/trading/bitvol", listResponseSchema(BitvolWireSchema), {
            asset,
            limit: "1",
        });
        const latest = page.data[0];
        if (!latest) {
            throw new Error(`No bitvol reading for ${asset}`);
        }
        return toIndicatorReading(asset, latest);
    }

    private url(path: string, params?: Record<string, string>): URL {
        const url = new URL(path, this.config.baseUrl);
        if (params) {
            for (const [key, value] of Object.entries(params)) {
                url.searchParams.set(key, value);
            }
        }
        return url;
    }

    private async get<T>(
        path: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        params?: Record<string, string>
    ): Promise<T> {
        return this.getUrl(this.url(path, params), schema);
    }

    private async getUrl<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const headers: Record<string, string> = { Accept: "application/json" };
        if (this.config.apiKey) {
            headers.Authorization = `JWT ${this.config.apiKey}`;
        }

        return this.limiter.schedule(async () => {
            logger.debug({ url: url.pathname }, "Venue API request");
            const response = await request(url.toString(), { method: "GET", headers });

            if (response.statusCode !== 200) {
                const body = await response.body.text();
                throw new VenueApiError(response.statusCode, body, url.pathname);
            }

            const json = await response.body.json();
            return schema.parse(json);
        });
    }

    /**
     * Follow `meta.next` links until the last page.
     */
    private async getAllPages<T>(
        path: string,
        item: z.ZodType<T, z.ZodTypeDef, unknown>,
        params: Record<string, string> = {}
    ): Promise<T[]> {
        const schema = listResponseSchema(item);
        const items: T[] = [];
        let url: URL | null = this.url(path, { limit: PAGE_LIMIT, ...params });
        for (let page = 0; url && page < MAX_PAGES; page++) {
            const result: z.infer<typeof schema> = await this.getUrl(url, schema);
            items.push(...result.data);
            const next = result.meta?.next;
            url = next ? new URL(next, this.config.baseUrl) : null;
        }
        if (url) {
            logger.warn({ path, pages: MAX_PAGES }, "Stopped paging at the page limit");
        }
        return items;
    }
}
