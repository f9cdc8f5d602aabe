import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Bottleneck from "bottleneck";
import { MockAgent, setGlobalDispatcher } from "undici";
import { VenueApiError } from "../http/errors.js";
import { VenueApiClient } from "./client.js";

const BASE_URL = "https://api.venue.test";

function contractWire(id: number) {
    return {
        id,
        label: `BTC-31DEC2099-${id}-Call`,
        underlying_asset: "CBTC",
        derivative_type: "options_contract",
        is_call: true,
        strike_price: id * 100,
        date_expires: "2099-12-31 21:00:00+0000",
        multiplier: 100,
    };
}

describe("VenueApiClient", () => {
    let agent: MockAgent;
    let client: VenueApiClient;

    beforeEach(() => {
        agent = new MockAgent();
        agent.disableNetConnect();
        setGlobalDispatcher(agent);
        client = new VenueApiClient({ baseUrl: BASE_URL, apiKey: "test-key", limiter: new Bottleneck() });
    });

    afterEach(async () => {
        await agent.close();
    });

    it("follows pagination links", async () => {
        const pool = agent.get(BASE_URL);
        pool.intercept({ path: "/trading/contracts?limit=200&active=true", method: "GET" }).reply(200, {
            data: [contractWire(1)],
            meta: { next: "/trading/contracts?limit=200&active=true&offset=200" },
        });
        pool.intercept({ path: "/trading/contracts?limit=200&active=true&offset=200", method: "GET" }).reply(200, {
            data: [contractWire(2)],
            meta: { next: null },
        });

        const contracts = await client.fetchAllContracts();

        expect(contracts.map((c) => c.id)).toEqual([1, 2]);
        expect(contracts[0]?.dateExpires).toBe(Date.UTC(2099, 11, 31, 21));
    });

    it("maps book states, falling back to entry ids", async () => {
        agent
            .get(BASE_URL)
            .intercept({ path: "/trading/book-states/5", method: "GET" })
            .reply(200, {
                data: {
                    contract_id: 5,
                    clock: 12,
                    book_states: [{ entry_id: "e1", clock: 11, is_ask: false, price: 900, size: 2 }],
                },
            });

        expect(await client.fetchBookStates(5)).toEqual({
            contractId: 5,
            clock: 12,
            entries: [{ mid: "e1", contractId: 5, price: 900, size: 2, isAsk: false, clock: 11 }],
        });
    });

    it("signs short positions", async () => {
        agent
            .get(BASE_URL)
            .intercept({ path: "/trading/positions?limit=200", method: "GET" })
            .reply(200, { data: [{ id: 31, contract: { id: 5 }, size: 3, type: "short" }] });

        expect(await client.fetchAllPositions()).toEqual([
            { id: 31, contractId: 5, size: -3, exercisedSize: 0, type: "short" },
        ]);
    });

    it("raises VenueApiError on a non-success response", async () => {
        agent.get(BASE_URL).intercept({ path: "/trading/book-states/5", method: "GET" }).reply(500, "boom");

        const failure = client.fetchBookStates(5);
        await expect(failure).rejects.toBeInstanceOf(VenueApiError);
        await expect(failure).rejects.toMatchObject({ statusCode: 500, path: "/trading/book-states/5", body: "boom" });
    });
});
