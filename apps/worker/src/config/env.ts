import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// Load .env from project root (four levels up from apps/worker/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const booleanFlag = (fallback: "true" | "false") =>
    z
        .string()
        .transform((v) => v.toLowerCase() !== "false" && v !== "0")
        .default(fallback);

export const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
    VENUE_API_BASE_URL: z.string().url().default("https://api.example-venue.test"),
    VENUE_WS_URL: z.string().url().default("wss://api.example-venue.test/ws"),
    VENUE_API_KEY: z.string().min(1).optional(),
    WORKER_PORT: z.coerce.number().default(8081),
    SKIP_EXPIRED: booleanFlag("true"),
    RECONCILE_TUNING_JSON: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
