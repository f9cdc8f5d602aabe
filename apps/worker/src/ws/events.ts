import { z } from "zod";
import { createChildLogger } from "../log/logger.js";
import type { VenueEvent } from "../state/types.js";
import { ContractWireSchema, parseVenueDate } from "../venue/types.js";

const logger = createChildLogger({ module: "ws-events" });

/** Frames about the session itself; they carry no market state. */
const INFORMATIONAL_TYPES = new Set([
    "auth_success",
    "unauth_success",
    "subscribe",
    "unsubscribe",
    "exposure_reports",
]);

const INFORMATIONAL_PREFIXES = ["contact_", "conversation_"];

const IntSchema = z.coerce.number().int();
const OptionalInt = IntSchema.nullish().transform((v) => v ?? undefined);
const OptionalId = z
    .union([z.number(), z.string()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? undefined : String(v)));
const TimeSchema = z.union([z.number(), z.string()]).transform((v) => (typeof v === "number" ? v : parseVenueDate(v)));

type EventSchema = z.ZodType<VenueEvent, z.ZodTypeDef, unknown>;

const HeartbeatSchema: EventSchema = z
    .object({ ticks: IntSchema, run_id: IntSchema, timestamp: z.coerce.number() })
    .transform((w): VenueEvent => ({ type: "heartbeat", ticks: w.ticks, runId: w.run_id, timestamp: w.timestamp }));

const BookTopSchema: EventSchema = z
    .object({
        contract_id: IntSchema,
        clock: IntSchema,
        bid: IntSchema.nullish(),
        ask: IntSchema.nullish(),
    })
    .transform((w): VenueEvent => ({
        type: "book_top",
        contractId: w.contract_id,
        clock: w.clock,
        bid: w.bid ?? null,
        ask: w.ask ?? null,
    }));

const ActionReportSchema: EventSchema = z
    .object({
        contract_id: IntSchema,
        clock: IntSchema,
        mid: z.string(),
        status_type: IntSchema,
        is_ask: z.boolean(),
        price: IntSchema,
        size: IntSchema,
        filled_size: OptionalInt,
        filled_price: OptionalInt,
        status_reason: OptionalInt,
        mpid: OptionalId,
        cid: OptionalId,
        inserted_size: OptionalInt,
        inserted_price: OptionalInt,
        original_size: OptionalInt,
        original_price: OptionalInt,
        updated_time: z.coerce.number().nullish().transform((v) => v ?? undefined),
        order_type: z.string().nullish().transform((v) => v ?? undefined),
    })
    .transform((w): VenueEvent => ({
        type: "action_report",
        contractId: w.contract_id,
        clock: w.clock,
        mid: w.mid,
        statusType: w.status_type,
        isAsk: w.is_ask,
        price: w.price,
        size: w.size,
        filledSize: w.filled_size,
        filledPrice: w.filled_price,
        statusReason: w.status_reason,
        mpid: w.mpid,
        cid: w.cid,
        insertedSize: w.inserted_size,
        insertedPrice: w.inserted_price,
        originalSize: w.original_size,
        originalPrice: w.original_price,
        updatedTime: w.updated_time,
        orderType: w.order_type,
    }));

const OpenPositionsSchema: EventSchema = z
    .object({
        positions: z.array(
            z.object({
                contract_id: IntSchema,
                size: IntSchema,
                exercised_size: IntSchema.default(0),
                mpid: OptionalId,
            })
        ),
    })
    .transform((w): VenueEvent => ({
        type: "open_positions_update",
        positions: w.positions.map((p) => ({
            contractId: p.contract_id,
            size: p.size,
            exercisedSize: p.exercised_size,
            mpid: p.mpid,
        })),
    }));

const BalancesSchema = z.record(z.string(), z.coerce.number()).default({});

const CollateralSchema: EventSchema = z
    .object({
        collateral: z.object({
            available_balances: BalancesSchema,
            position_locked_balances: BalancesSchema,
        }),
    })
    .transform((w): VenueEvent => ({
        type: "collateral_balance_update",
        collateral: {
            availableBalances: w.collateral.available_balances,
            positionLockedBalances: w.collateral.position_locked_balances,
        },
    }));

const ContractAddedSchema: EventSchema = z
    .object({ data: ContractWireSchema })
    .transform((w): VenueEvent => ({ type: "contract_added", contract: w.data }));

const ContractRemovedSchema: EventSchema = z
    .object({ data: z.object({ id: IntSchema }).passthrough() })
    .transform((w): VenueEvent => ({ type: "contract_removed", contractId: w.data.id }));

const TradeBustedSchema: EventSchema = z
    .object({ data: z.record(z.string(), z.unknown()).default({}) })
    .transform((w): VenueEvent => ({ type: "trade_busted", data: w.data }));

const BitvolSchema: EventSchema = z
    .object({ asset: z.string().default("BTC"), value: z.coerce.number(), time: TimeSchema })
    .transform((w): VenueEvent => ({ type: "bitvol", reading: { asset: w.asset, value: w.value, time: w.time } }));

const BraveSchema: EventSchema = z
    .object({
        asset: z.string().default("BTC"),
        price: z.coerce.number(),
        time: TimeSchema,
        volume: z.coerce.number().nullish(),
    })
    .transform((w): VenueEvent => ({
        type: "brave",
        reading: { asset: w.asset, value: w.price, time: w.time, volume: w.volume ?? undefined },
    }));

const EVENT_SCHEMAS = new Map<string, EventSchema>([
    ["heartbeat", HeartbeatSchema],
    ["book_top", BookTopSchema],
    ["action_report", ActionReportSchema],
    ["open_positions_update", OpenPositionsSchema],
    ["collateral_balance_update", CollateralSchema],
    ["contract_added", ContractAddedSchema],
    ["contract_removed", ContractRemovedSchema],
    ["trade_busted", TradeBustedSchema],
    ["bitvol", BitvolSchema],
    ["brave", BraveSchema],
]);

const FrameSchema = z.object({ type: z.string() }).passthrough();

export function isInformational(type: string): boolean {
    return INFORMATIONAL_TYPES.has(type) || INFORMATIONAL_PREFIXES.some((prefix) => type.startsWith(prefix));
}

/**
 * Decode one stream frame into a typed event. Informational, unknown and
 * malformed frames are logged and yield null.
 */
export function decodeFrame(text: string): VenueEvent | null {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        logger.warn({ err, frame: text.slice(0, 200) }, "Dropping non-JSON frame");
        return null;
    }

    const frame = FrameSchema.safeParse(json);
    if (!frame.success) {
        logger.warn({ frame: text.slice(0, 200) }, "Dropping frame without a type");
        return null;
    }
    const type = frame.data.type;
    if (isInformational(type)) {
        logger.debug({ type }, "Informational frame");
        return null;
    }

    const schema = EVENT_SCHEMAS.get(type);
    if (!schema) {
        logger.warn({ type }, "Dropping unknown frame type");
        return null;
    }
    const result = schema.safeParse(json);
    if (!result.success) {
        logger.warn({ type, issues: result.error.issues }, "Dropping malformed frame");
        return null;
    }
    return result.data;
}
