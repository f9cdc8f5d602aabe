import { describe, it, expect } from "vitest";
import { envSchema } from "./env.js";

describe("envSchema", () => {
    it("defaults to placeholder venue hosts", () => {
        const parsed = envSchema.parse({});

        expect(parsed.VENUE_API_BASE_URL).toBe("https://api.example-venue.test");
        expect(parsed.VENUE_WS_URL).toBe("wss://api.example-venue.test/ws");
        expect(parsed.WORKER_PORT).toBe(8081);
        expect(parsed.SKIP_EXPIRED).toBe(true);
    });

    it("reads a disabled flag and a numeric port", () => {
        const parsed = envSchema.parse({ SKIP_EXPIRED: "0", WORKER_PORT: "9000", VENUE_API_KEY: "test-secret" });

        expect(parsed.SKIP_EXPIRED).toBe(false);
        expect(parsed.WORKER_PORT).toBe(9000);
        expect(parsed.VENUE_API_KEY).toBe("test-secret");
    });
});
