import dotenv from "dotenv";
import { z } from "zod";

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
dotenv.config();

export const FACADE_MODES = ["range", "today", "today-fallback"] as const;
export type FacadeMode = (typeof FACADE_MODES)[number];

// Page defaults per deployment mode: [default, upper bound]
const MODE_PAGE_DEFAULTS: Record<FacadeMode, [number, number]> = {
    range: [3, 30],
    today: [6, 50],
    "today-fallback": [6, 50],
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
    PORT: positiveInt.default(8080),
    FACADE_MODE: z.enum(FACADE_MODES).default("range"),
    BASE_PATH: z
        .string()
        .regex(/^(\/[\w-]+)*$/, "BASE_PATH must look like /api or be empty")
        .default(""),
    DEFAULT_MAX_PAGES: positiveInt.optional(),
    MAX_PAGES_LIMIT: positiveInt.optional(),
    PAGE_DELAY_MS: z.coerce.number().int().min(0).default(250),
    PAGE_SIZE: positiveInt.default(20),
    REQUEST_TIMEOUT_MS: positiveInt.default(25_000),
    SERVICE_TIMEZONE: z.string().min(1).default("Asia/Kolkata"),
});

export type RawEnv = z.infer<typeof envSchema>;

export interface Env extends Omit<RawEnv, "DEFAULT_MAX_PAGES" | "MAX_PAGES_LIMIT"> {
    DEFAULT_MAX_PAGES: number;
    MAX_PAGES_LIMIT: number;
}

/**
 * Parses `source` (process.env by default) and fills the page bounds
 * from the facade mode when they are not set explicitly.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const raw = envSchema.parse(source);
    const [defaultPages, pageLimit] = MODE_PAGE_DEFAULTS[raw.FACADE_MODE];

    const limit = raw.MAX_PAGES_LIMIT ?? pageLimit;
    const defaults = Math.min(raw.DEFAULT_MAX_PAGES ?? defaultPages, limit);

    return {
        ...raw,
        DEFAULT_MAX_PAGES: defaults,
        MAX_PAGES_LIMIT: limit,
    };
}
