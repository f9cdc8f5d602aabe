import { z } from "zod";
import type {
    BookEntry,
    BookSnapshot,
    Contract,
    IndicatorReading,
    OpenOrder,
    Position,
    PositionTrade,
} from "../state/types.js";

const VENUE_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse a venue timestamp such as "2021-12-31 21:00:00+0000" to epoch ms.
 * Returns NaN when the string is not in a known format.
 */
export function parseVenueDate(value: string): number {
    const match = VENUE_DATE.exec(value.trim());
    if (!match) {
        return Number.NaN;
    }
    const [, y, mo, d, h = "0", mi = "0", s = "0", zone] = match;
    const utc = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
    if (!zone || zone === "Z") {
        return utc;
    }
    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
    return utc - sign * offsetMinutes * 60_000;
}

const VenueDateSchema = z.string().transform((value, ctx) => {
    const ms = parseVenueDate(value);
    if (Number.isNaN(ms)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable date: ${value}` });
        return z.NEVER;
    }
    return ms;
});

/** Ids arrive as numbers on some endpoints and strings on others */
const IdSchema = z.union([z.number(), z.string()]).transform((v) => String(v));
const IntSchema = z.coerce.number().int();

/**
 * Contract as returned by the contracts endpoints and contract_added events.
 */
export const ContractWireSchema = z
    .object({
        id: IntSchema,
        label: z.string(),
        underlying_asset: z.string(),
        derivative_type: z.string(),
        is_call: z.boolean().nullish(),
        strike_price: z.number().nullish(),
        date_expires: VenueDateSchema,
        date_live: VenueDateSchema.nullish(),
        multiplier: z.number().positive().default(1),
        collateral_asset: z.string().nullish(),
        is_next_day: z.boolean().default(false),
        active: z.boolean().default(true),
    })
    .transform(
        (w): Contract => ({
            id: w.id,
            label: w.label,
            underlyingAsset: w.underlying_asset,
            derivativeType: w.derivative_type,
            isCall: w.is_call ?? null,
            strikePrice: w.strike_price ?? null,
            dateExpires: w.date_expires,
            dateLive: w.date_live ?? null,
            multiplier: w.multiplier,
            collateralAsset: w.collateral_asset ?? null,
            isNextDay: w.is_next_day,
            active: w.active,
        })
    );

const BookStateWireSchema = z
    .object({
        mid: z.string().optional(),
        entry_id: z.string().optional(),
        contract_id: IntSchema.optional(),
        clock: IntSchema,
        is_ask: z.boolean(),
        price: IntSchema,
        size: IntSchema,
    })
    .transform((w, ctx) => {
        const mid = w.mid ?? w.entry_id;
        if (!mid) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Book state without an order id" });
            return z.NEVER;
        }
        return { ...w, mid };
    });

export const BookStatesResponseSchema = z
    .object({
        data: z.object({
            contract_id: IntSchema,
            clock: IntSchema.nullish(),
            book_states: z.array(BookStateWireSchema),
        }),
    })
    .transform(({ data }): BookSnapshot => {
        const entries: BookEntry[] = data.book_states.map((w) => ({
            mid: w.mid,
            contractId: data.contract_id,
            price: w.price,
            size: w.size,
            isAsk: w.is_ask,
            clock: w.clock,
        }));
        return { contractId: data.contract_id, clock: data.clock ?? null, entries };
    });

export const OpenOrderWireSchema = z
    .object({
        mid: z.string(),
        contract_id: IntSchema,
        mpid: IdSchema.nullish(),
        cid: IdSchema.nullish(),
        is_ask: z.boolean(),
        price: IntSchema,
        size: IntSchema,
    })
    .transform(
        (w): OpenOrder => ({
            mid: w.mid,
            contractId: w.contract_id,
            mpid: w.mpid ?? null,
            cid: w.cid ?? null,
            isAsk: w.is_ask,
            price: w.price,
            size: w.size,
        })
    );

export const PositionWireSchema = z
    .object({
        id: IntSchema,
        contract: z.object({ id: IntSchema }),
        size: IntSchema,
        exercised_size: IntSchema.default(0),
        type: z.enum(["long", "short"]).optional(),
    })
    .transform(
        (w): Position => ({
            id: w.id,
            contractId: w.contract.id,
            size: w.type === "short" ? -Math.abs(w.size) : w.size,
            exercisedSize: w.exercised_size,
            type: w.type,
        })
    );

export const PositionTradeWireSchema = z
    .object({
        contract_id: IntSchema,
        side: z.enum(["bid", "ask"]),
        filled_size: IntSchema,
        filled_price: IntSchema.nullish(),
        fee: z.coerce.number().default(0),
        rebate: z.coerce.number().default(0),
        premium: z.coerce.number().default(0),
        timestamp: z.coerce.number().nullish(),
    })
    .transform(
        (w): PositionTrade => ({
            contractId: w.contract_id,
            side: w.side,
            filledSize: w.filled_size,
            filledPrice: w.filled_price ?? null,
            fee: w.fee,
            rebate: w.rebate,
            premium: w.premium,
            // Venue trade timestamps are nanoseconds
            timestamp: w.timestamp === null || w.timestamp === undefined ? null : Math.floor(w.timestamp / 1_000_000),
        })
    );

export const BitvolWireSchema = z.object({
    value: z.coerce.number(),
    time: z.union([z.number(), z.string()]),
});

export function toIndicatorReading(asset: string, w: z.infer<typeof BitvolWireSchema>): IndicatorReading {
    const time = typeof w.time === "number" ? w.time : parseVenueDate(w.time);
    return { asset, value: w.value, time: Number.isNaN(time) ? Date.now() : time };
}

export const PageMetaSchema = z
    .object({
        next: z.string().nullish(),
    })
    .passthrough();

/**
 * List endpoints wrap items in `data` with `meta.next` pointing at the next page.
 */
export function listResponseSchema<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return z.object({
        data: z.array(item),
        meta: PageMetaSchema.optional(),
    });
}

export function itemResponseSchema<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return z.object({ data: item }).transform(({ data }) => data);
}
