// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true");

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: positiveInt(3000),
  LOG_LEVEL: z.string().min(1).default("info"),

  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_MAX_CONNECTIONS: positiveInt(8),

  LOAN_PERIOD_DAYS: positiveInt(14),
  MAX_OPEN_LOANS_PER_READER: positiveInt(3),
  MAX_RENEWALS: nonNegativeInt(2),

  STORE_MAX_RETRIES: nonNegativeInt(2),
  STORE_RETRY_BASE_DELAY_MS: nonNegativeInt(25),

  RATE_LIMIT_ENABLED: flag(true),
  RATE_LIMIT_RPM: positiveInt(120),
  RATE_LIMIT_SEARCH_RPM: positiveInt(60),

  SEED_DIR: z.string().min(1).default("config/network"),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service starts with zero configuration
 * for local development (in-memory store, seed data from `config/network`).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,

    database: {
      url: e.DATABASE_URL ?? null,
      maxConnections: e.DATABASE_MAX_CONNECTIONS,
    },

    circulation: {
      loanPeriodDays: e.LOAN_PERIOD_DAYS,
      maxOpenLoansPerReader: e.MAX_OPEN_LOANS_PER_READER,
      maxRenewals: e.MAX_RENEWALS,
    },

    store: {
      maxRetries: e.STORE_MAX_RETRIES,
      retryBaseDelayMs: e.STORE_RETRY_BASE_DELAY_MS,
    },

    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      requestsPerMinute: e.RATE_LIMIT_RPM,
      searchRpm: e.RATE_LIMIT_SEARCH_RPM,
    },

    seedDir: e.SEED_DIR,
  };
}
