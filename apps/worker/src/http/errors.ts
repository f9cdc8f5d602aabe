/**
 * Non-success response from the venue's REST API.
 */
export class VenueApiError extends Error {
    constructor(
        readonly statusCode: number,
        readonly body: string,
        readonly path: string
    ) {
        super(`Venue API error ${statusCode} on ${path}: ${body.slice(0, 200)}`);
        this.name = "VenueApiError";
    }

    get isRateLimited(): boolean {
        return this.statusCode === 429;
    }
}
