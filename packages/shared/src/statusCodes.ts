/**
 * Order status codes carried by venue action reports.
 */
export const StatusCodes = {
    /** Resting order inserted into the book */
    INSERTED: 200,
    /** Order (partially) filled */
    FILLED: 201,
    /** Market order could not be filled */
    NOT_FILLED: 202,
    /** Order cancelled */
    CANCELLED: 203,
    /** Order cancelled and replaced at a new price/size */
    CANCEL_REPLACED: 204,
    /** Request acknowledged */
    ACKNOWLEDGED: 300,
    /** First reject code; everything at or above is a reject */
    REJECTED: 600,
    /** Order expired with its contract */
    EXPIRED: 610,
} as const;

export type StatusCode = (typeof StatusCodes)[keyof typeof StatusCodes];

/** Status reason on a fill that fully consumed the order */
export const FULL_FILL_REASON = 52;

/** Statuses that leave an order resting in the book */
export const RESTING_STATUSES: ReadonlySet<number> = new Set([
    StatusCodes.INSERTED,
    StatusCodes.FILLED,
    StatusCodes.CANCEL_REPLACED,
]);

export function isRejectStatus(status: number): boolean {
    return status >= StatusCodes.REJECTED;
}
