import dotenv from "dotenv";
import { z } from "zod";

if (process.env["NODE_ENV"] !== "test") {
  dotenv.config();
}

/**
 * Pick the first non-empty API key among the supported variable names.
 * AI_API_KEY wins; GOOGLE_API_KEY and GEMINI_API_KEY are accepted for
 * compatibility with the Gemini SDK's own conventions.
 */
export function resolveApiKey(env: NodeJS.ProcessEnv): string | undefined {
  for (const name of ["AI_API_KEY", "GOOGLE_API_KEY", "GEMINI_API_KEY"]) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

const configSchema = z.object({
  WEB_SERVER_PORT: z.coerce.number().int().positive().default(5000),
  WEB_SERVER_HOST: z.string().default("0.0.0.0"),
  WORDLIST_PATH: z.string().default("data/wordlist.txt"),
  SAMPLES_PATH: z.string().default("data/samples.json"),
  BRUTE_FORCE_MAX_LENGTH: z.coerce
    .number()
    .int()
    .min(1)
    .max(8, "Brute force ceiling cannot exceed 8 characters")
    .default(6),
  BRUTE_FORCE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5_000_000),
  ATTACKS_PER_MIN: z.coerce.number().int().positive().default(30),
  AI_API_KEY: z.string().min(1).optional(),
  AI_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AI_MAX_CANDIDATES: z.coerce.number().int().positive().default(15),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

/**
 * Application configuration schema derived from environment variables.
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate configuration from environment variables.
 * @throws Error if any variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({ ...env, AI_API_KEY: resolveApiKey(env) });

  if (!result.success) {
    const errors = result.error.issues.map((err) => `${err.path.join(".")}: ${err.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
  }

  return result.data;
}

/**
 * Global configuration instance loaded from environment variables.
 */
export const config = loadConfig();
