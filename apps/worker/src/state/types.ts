/**
 * Domain types for the reconciled market/account view.
 * Prices are integer cents, sizes integer contracts, clocks per-contract integers.
 */

export type ContractId = number;

export interface Contract {
    id: ContractId;
    label: string;
    underlyingAsset: string;
    derivativeType: string;
    isCall: boolean | null;
    strikePrice: number | null;
    /** Expiry as epoch milliseconds */
    dateExpires: number;
    dateLive: number | null;
    multiplier: number;
    collateralAsset: string | null;
    isNextDay: boolean;
    active: boolean;
}

export interface BookEntry {
    mid: string;
    contractId: ContractId;
    price: number;
    size: number;
    isAsk: boolean;
    clock: number;
}

export interface BookTop {
    contractId: ContractId;
    bid: number | null;
    ask: number | null;
    clock: number;
    /** Derived from the local book rather than delivered by the stream */
    synthetic: boolean;
}

export interface BookSnapshot {
    contractId: ContractId;
    /** Snapshot clock; absent when the venue omits it */
    clock: number | null;
    entries: BookEntry[];
}

export interface ActionReport {
    type: "action_report";
    contractId: ContractId;
    clock: number;
    mid: string;
    statusType: number;
    isAsk: boolean;
    price: number;
    size: number;
    filledSize?: number;
    filledPrice?: number;
    statusReason?: number;
    mpid?: string;
    cid?: string;
    insertedSize?: number;
    insertedPrice?: number;
    originalSize?: number;
    originalPrice?: number;
    /** Nanoseconds since the epoch */
    updatedTime?: number;
    orderType?: string;
}

export interface Heartbeat {
    type: "heartbeat";
    ticks: number;
    runId: number;
    /** Nanoseconds since the epoch */
    timestamp: number;
}

export interface BookTopEvent {
    type: "book_top";
    contractId: ContractId;
    clock: number;
    bid: number | null;
    ask: number | null;
}

export interface PositionUpdate {
    contractId: ContractId;
    size: number;
    exercisedSize: number;
    mpid?: string;
}

export interface CollateralBalances {
    availableBalances: Record<string, number>;
    positionLockedBalances: Record<string, number>;
}

export interface IndicatorReading {
    asset: string;
    value: number;
    /** Epoch milliseconds */
    time: number;
    volume?: number;
}

export type VenueEvent =
    | Heartbeat
    | BookTopEvent
    | ActionReport
    | { type: "open_positions_update"; positions: PositionUpdate[] }
    | { type: "collateral_balance_update"; collateral: CollateralBalances }
    | { type: "contract_added"; contract: Contract }
    | { type: "contract_removed"; contractId: ContractId }
    | { type: "trade_busted"; data: Record<string, unknown> }
    | { type: "websocket_starting" }
    | { type: "websocket_exception"; message: string }
    | { type: "bitvol"; reading: IndicatorReading }
    | { type: "brave"; reading: IndicatorReading };

export type VenueEventType = VenueEvent["type"];

export interface OpenOrder {
    mid: string;
    contractId: ContractId;
    mpid: string | null;
    cid: string | null;
    isAsk: boolean;
    price: number;
    size: number;
}

export interface Position {
    contractId: ContractId;
    id?: number;
    size: number;
    exercisedSize: number;
    /** Cost basis in cents; undefined while a recomputation is pending */
    basis?: number;
    type?: "long" | "short";
}

export interface PositionTrade {
    contractId: ContractId;
    side: "bid" | "ask";
    filledSize: number;
    filledPrice: number | null;
    fee: number;
    rebate: number;
    premium: number;
    /** Epoch milliseconds, when the venue provides it */
    timestamp: number | null;
}

export interface LastTrade {
    contractId: ContractId;
    filledPrice: number;
    filledSize: number;
    side: "bid" | "ask";
    /** Nanoseconds since the epoch, or null when the report had none */
    timestamp: number | null;
    mine: boolean;
}

/**
 * Fallback snapshot API. Every call may fail; callers treat failures as
 * "temporarily unavailable".
 */
export interface SnapshotApi {
    fetchAllContracts(): Promise<Contract[]>;
    fetchContract(id: ContractId): Promise<Contract>;
    fetchBookStates(contractId: ContractId): Promise<BookSnapshot>;
    fetchOpenOrders(): Promise<OpenOrder[]>;
    fetchAllPositions(): Promise<Position[]>;
    fetchTradesForPosition(positionId: number): Promise<PositionTrade[]>;
    fetchBitvol(asset: string): Promise<IndicatorReading>;
}
