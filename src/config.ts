/**
 * Process configuration.
 *
 * Reads `.env` (via dotenv) and the environment once, validates it with
 * zod and hands out a typed, frozen config object. Collaborators receive the
 * pieces they need through their constructors.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { HttpClientConfig } from "./tuna-pipeline/http-client.js";
import { LOG_LEVELS } from "./tuna-pipeline/logger.js";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3031),
  GEMINI_API_KEY: z.string().trim().optional(),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.0-flash"),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  SCRAPER_MIN_DELAY_MS: z.coerce.number().nonnegative().default(2000),
  SCRAPER_MAX_DELAY_MS: z.coerce.number().nonnegative().default(5000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  DATA_DIR: z.string().trim().min(1).default("."),
});

export type AppConfig = Readonly<{
  port: number;
  geminiApiKey?: string;
  geminiModel: string;
  logLevel: (typeof LOG_LEVELS)[number];
  minDelayMs: number;
  maxDelayMs: number;
  httpTimeoutMs: number;
  httpMaxRetries: number;
  dataDir: string;
}>;

/**
 * Parse an environment map into an {@link AppConfig}. Throws a ZodError
 * listing every bad variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.parse(env);
  const minDelayMs = Math.min(parsed.SCRAPER_MIN_DELAY_MS, parsed.SCRAPER_MAX_DELAY_MS);
  return Object.freeze({
    port: parsed.PORT,
    geminiApiKey: parsed.GEMINI_API_KEY || undefined,
    geminiModel: parsed.GEMINI_MODEL,
    logLevel: parsed.LOG_LEVEL,
    minDelayMs,
    maxDelayMs: Math.max(parsed.SCRAPER_MIN_DELAY_MS, parsed.SCRAPER_MAX_DELAY_MS),
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    httpMaxRetries: parsed.HTTP_MAX_RETRIES,
    dataDir: parsed.DATA_DIR,
  });
}

/** Load `.env` into `process.env`, then parse it. */
export function loadConfig(): AppConfig {
  loadDotenv();
  return parseConfig(process.env);
}

export function httpConfigFrom(config: AppConfig): HttpClientConfig {
  return {
    timeoutMs: config.httpTimeoutMs,
    maxRetries: config.httpMaxRetries,
    minDelayMs: config.minDelayMs,
    maxDelayMs: config.maxDelayMs,
  };
}
