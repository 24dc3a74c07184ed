import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "../application/errors";
import { DEFAULT_RESYNC_INTERVAL } from "./indicators/base";

export interface EngineConfig {
    /** Evictions between full accumulator resyncs in windowed indicators. */
    resyncInterval: number;
    /** Indicator set file, relative to the working directory. */
    indicatorsFile?: string;
}

// Zod schema for environment validation
const envSchema = z.object({
    TA_RESYNC_INTERVAL: z.string().optional()
        .transform(val => (val && val.trim() !== "" ? Number(val) : DEFAULT_RESYNC_INTERVAL))
        .pipe(z.number().int().positive()),
    TA_INDICATORS_FILE: z.string().optional(),
});

let __cachedEngineConfig: EngineConfig | null = null;

/**
 * Read engine settings from the environment (optionally seeded from a dotenv file).
 * The result is cached until resetConfigCache().
 */
export function loadEngineConfig(opts: { envFile?: string } = {}): EngineConfig {
    if (__cachedEngineConfig) return __cachedEngineConfig;
    if (opts.envFile) dotenv.config({ path: opts.envFile });
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const name = issue?.path.join(".") || "env";
        throw new ConfigError(name, `${name}: ${issue?.message ?? "invalid value"}`);
    }
    __cachedEngineConfig = {
        resyncInterval: parsed.data.TA_RESYNC_INTERVAL,
        indicatorsFile: parsed.data.TA_INDICATORS_FILE || undefined,
    };
    return __cachedEngineConfig;
}

/**
 * Test helper: reset cached engine config so subsequent calls re-read env.
 */
export function resetConfigCache() {
    __cachedEngineConfig = null;
}
