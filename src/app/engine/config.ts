// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Engine Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// All settings are read from environment variables (a local .env file is
// loaded by loadConfigFromEnv). Every variable has a default, so an empty
// environment yields a working configuration.
//
//   NSE_BASE_URL                 Primary deal provider host
//   MUNAFASUTRA_URL              Secondary (HTML) deal page
//   PRICE_API_BASE_URL           Chart API host for OHLCV history
//   REQUEST_TIMEOUT_MS           Per-request timeout
//   DEALS_MAX_ATTEMPTS           Attempts per deal category on the primary
//   DEALS_RETRY_DELAY_MS         Base backoff (doubles per attempt)
//   DEALS_WARMUP_DELAY_MS        Pause after each cookie warm-up request
//   DEALS_CATEGORY_DELAY_MS      Pause between bulk and block requests
//   DEAL_WINDOW_CUTOFF           HH:MM exchange-local time deals become final
//   EXCHANGE_UTC_OFFSET_MINUTES  Exchange time zone offset (IST = 330)
//   PRICE_HISTORY_DAYS           Calendar days of history per symbol
//   PRICE_FETCH_CONCURRENCY      Parallel per-symbol pipelines
//   PRICE_FETCH_DELAY_MS         Politeness delay between batches
//   PRICE_CACHE_TTL_MS           In-memory price history TTL
//   SYMBOL_SUFFIX                Appended to NSE symbols for the price API
//   SCRAPE_MAX_ROWS              Cap on rows taken from the HTML source
//   LOG_LEVEL                    debug | info | warn | error | silent
//
// ═══════════════════════════════════════════════════════════════════════════════

import dotenv from 'dotenv';
import { z } from 'zod';

const CUTOFF_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const EnvSchema = z.object({
  NSE_BASE_URL: z.string().url().default('https://www.nseindia.com'),
  MUNAFASUTRA_URL: z.string().url().default('https://munafasutra.com/nse/FIIDII/'),
  PRICE_API_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DEALS_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(3),
  DEALS_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),
  DEALS_WARMUP_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  DEALS_CATEGORY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_500),

  DEAL_WINDOW_CUTOFF: z.string().regex(CUTOFF_PATTERN, 'expected HH:MM').default('18:30'),
  EXCHANGE_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(330),

  PRICE_HISTORY_DAYS: z.coerce.number().int().min(30).default(185),
  PRICE_FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  PRICE_FETCH_DELAY_MS: z.coerce.number().int().nonnegative().default(400),
  PRICE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(4 * 60 * 60 * 1000),
  SYMBOL_SUFFIX: z.string().default('.NS'),

  SCRAPE_MAX_ROWS: z.coerce.number().int().positive().default(20),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type LogLevelSetting = z.infer<typeof EnvSchema>['LOG_LEVEL'];

/** Exchange-local time of day as minutes since midnight */
export interface CutoffTime {
  hour: number;
  minute: number;
}

export interface EngineConfig {
  nse: {
    baseUrl: string;
    maxAttempts: number;
    retryDelayMs: number;
    warmupDelayMs: number;
    categoryDelayMs: number;
  };
  scrape: {
    url: string;
    maxRows: number;
  };
  price: {
    baseUrl: string;
    historyDays: number;
    concurrency: number;
    delayMs: number;
    cacheTtlMs: number;
    symbolSuffix: string;
  };
  calendar: {
    cutoff: CutoffTime;
    utcOffsetMinutes: number;
  };
  requestTimeoutMs: number;
  logLevel: LogLevelSetting;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseCutoff(value: string): CutoffTime {
  const match = CUTOFF_PATTERN.exec(value);
  if (!match) throw new ConfigError([`DEAL_WINDOW_CUTOFF: expected HH:MM, got "${value}"`]);
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/** Build the engine configuration from an environment map */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  // Treat empty strings as unset so `FOO=` in .env falls back to the default
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    nse: {
      baseUrl: e.NSE_BASE_URL.replace(/\/$/, ''),
      maxAttempts: e.DEALS_MAX_ATTEMPTS,
      retryDelayMs: e.DEALS_RETRY_DELAY_MS,
      warmupDelayMs: e.DEALS_WARMUP_DELAY_MS,
      categoryDelayMs: e.DEALS_CATEGORY_DELAY_MS,
    },
    scrape: {
      url: e.MUNAFASUTRA_URL,
      maxRows: e.SCRAPE_MAX_ROWS,
    },
    price: {
      baseUrl: e.PRICE_API_BASE_URL.replace(/\/$/, ''),
      historyDays: e.PRICE_HISTORY_DAYS,
      concurrency: e.PRICE_FETCH_CONCURRENCY,
      delayMs: e.PRICE_FETCH_DELAY_MS,
      cacheTtlMs: e.PRICE_CACHE_TTL_MS,
      symbolSuffix: e.SYMBOL_SUFFIX,
    },
    calendar: {
      cutoff: parseCutoff(e.DEAL_WINDOW_CUTOFF),
      utcOffsetMinutes: e.EXCHANGE_UTC_OFFSET_MINUTES,
    },
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}

/** Load `.env` (if present) into process.env, then build the configuration */
export function loadConfigFromEnv(): EngineConfig {
  dotenv.config();
  return loadConfig(process.env);
}
