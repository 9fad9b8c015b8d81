// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Central Data Service
// ═══════════════════════════════════════════════════════════════════════════════
//
// The single entry point the reporting layer calls. It wires together:
// Deal-Source Chain + Classifier + Price Provider + Indicator/Signal engines.
//
// ARCHITECTURE:
//   1. Run the deal-source chain and resolve it to per-symbol FII/DII actions
//   2. Fetch the benchmark index summary once (shared read-only)
//   3. Per security, in bounded batches: fetch bars → snapshot → enriched record
//   4. Return one immutable InstitutionalDataset
//
// A failure on one security yields a neutral snapshot for that security only.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  DisclosureWindow,
  EnrichedStock,
  InstitutionalDataset,
  InstitutionalStock,
  MarketSummary,
  PriceBar,
} from '../types/market';
import type { IPriceProvider, ProviderRegistry } from './providers';
import type { EngineConfig } from './config';
import { loadConfigFromEnv } from './config';
import type { Logger } from './logger';
import { createLogger } from './logger';
import type { KeywordMatcher } from './classifier';
import { DealSourceChain, resolveInstitutionalStocks } from './dealSourceChain';
import { computeTechnicalSnapshot, NEUTRAL_SNAPSHOT, round } from './indicators';
import { buildEnrichedStock } from './signalEngine';
import { TradingCalendar } from './tradingCalendar';
import { createLiveRegistry } from './liveProviders';
import { sleep } from './httpSession';
import { holidaySet } from '../data/referenceData';


const DAY_MS = 24 * 60 * 60 * 1000;

export const BENCHMARKS = {
  nifty: '^NSEI',
  sensex: '^BSESN',
} as const;

/** Calendar days of index history requested for the market summary */
export const MARKET_SUMMARY_DAYS = 10;

export const EMPTY_MARKET_SUMMARY: MarketSummary = {
  nifty_price: 0,
  nifty_change_pct: 0,
  sensex_price: 0,
  sensex_change_pct: 0,
  data_ok: false,
};


// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** "INFY" → "INFY.NS". Index symbols and already-suffixed tickers pass through. */
export function toTicker(symbol: string, suffix: string): string {
  const s = symbol.trim().toUpperCase();
  if (s.startsWith('^') || !suffix || s.endsWith(suffix.toUpperCase())) return s;
  return `${s}${suffix}`;
}

/** Last close and % change vs the previous close; null without any bar */
export function lastCloseAndChange(bars: readonly PriceBar[]): { price: number; change_pct: number } | null {
  const closes = bars.map(b => b.close).filter(Number.isFinite);
  if (closes.length === 0) return null;

  const lastClose = closes[closes.length - 1];
  if (closes.length < 2) return { price: round(lastClose, 2), change_pct: 0 };

  const prev = closes[closes.length - 2];
  const change = prev === 0 ? 0 : ((lastClose - prev) / prev) * 100;
  return { price: round(lastClose, 2), change_pct: round(change, 2) };
}

/**
 * Run `task` over `items` in batches of `concurrency`, pausing `delayMs`
 * between batches. Results keep input order. A rejected task yields
 * `onError(item, reason)` in its slot.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  delayMs: number,
  task: (item: T) => Promise<R>,
  onError: (item: T, reason: unknown) => R,
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const out: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(batch.map(item => task(item)));
    settled.forEach((res, idx) => {
      out.push(res.status === 'fulfilled' ? res.value : onError(batch[idx], res.reason));
    });

    if (i + size < items.length) await sleep(delayMs);
  }
  return out;
}


// ═══════════════════════════════════════════════════════════════════════════════
// MARKET SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

export async function fetchMarketSummary(
  price: IPriceProvider,
  now: Date = new Date(),
  logger?: Logger,
): Promise<MarketSummary> {
  const from = new Date(now.getTime() - MARKET_SUMMARY_DAYS * DAY_MS);

  const [nifty, sensex] = await Promise.all([
    price.fetchDailyBars(BENCHMARKS.nifty, from, now),
    price.fetchDailyBars(BENCHMARKS.sensex, from, now),
  ]);

  const n = nifty.ok ? lastCloseAndChange(nifty.data) : null;
  const s = sensex.ok ? lastCloseAndChange(sensex.data) : null;
  if (!n || !s) {
    logger?.warn('Market summary unavailable', {
      nifty: nifty.warnings ?? [],
      sensex: sensex.warnings ?? [],
    });
    return EMPTY_MARKET_SUMMARY;
  }

  return {
    nifty_price: n.price,
    nifty_change_pct: n.change_pct,
    sensex_price: s.price,
    sensex_change_pct: s.change_pct,
    data_ok: true,
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════════════════════

export interface BuildDatasetOptions {
  registry: ProviderRegistry;
  config: EngineConfig;
  logger?: Logger;
  keywords?: KeywordMatcher;
  /** When given, the disclosure window is reported with the dataset */
  calendar?: TradingCalendar;
  now?: () => Date;
}

export async function buildDataset(options: BuildDatasetOptions): Promise<InstitutionalDataset> {
  const { registry, config } = options;
  const log = options.logger ?? createLogger('DataService', config.logLevel);
  const now = options.now ?? (() => new Date());

  // ─── 1. Deals ───
  const chain = new DealSourceChain(registry.dealSources, registry.fallback, log.child('Chain'));
  const dealResult = await chain.fetchDeals();
  const stocks = resolveInstitutionalStocks(dealResult.payload, options.keywords);
  log.info(`Source: '${dealResult.label}' — ${stocks.length} stocks`);

  const window: DisclosureWindow | null = options.calendar
    ? options.calendar.currentWindow(now(), config.calendar.cutoff)
    : null;

  // ─── 2. Market summary ───
  const market = await fetchMarketSummary(registry.price, now(), log);

  // ─── 3. Per-security pipeline ───
  const end = now();
  const start = new Date(end.getTime() - config.price.historyDays * DAY_MS);

  const enrich = async (stock: InstitutionalStock): Promise<EnrichedStock> => {
    const ticker = toTicker(stock.symbol, config.price.symbolSuffix);
    const bars = await registry.price.fetchDailyBars(ticker, start, end);
    const snapshot = bars.ok ? computeTechnicalSnapshot(bars.data) : NEUTRAL_SNAPSHOT;
    if (!snapshot.data_ok) log.warn(`${ticker}: no usable technicals`);
    return buildEnrichedStock(stock, snapshot, ticker);
  };

  const enriched = await mapInBatches(
    stocks,
    config.price.concurrency,
    config.price.delayMs,
    enrich,
    (stock, reason) => {
      const ticker = toTicker(stock.symbol, config.price.symbolSuffix);
      log.error(`${ticker}: pipeline failed`, { error: String(reason) });
      return buildEnrichedStock(stock, NEUTRAL_SNAPSHOT, ticker);
    },
  );

  return {
    stocks: enriched,
    market,
    source: dealResult.label,
    window,
    generated_at: now().toISOString(),
  };
}

/**
 * Load configuration from the environment, build the live registry and
 * produce one dataset.
 */
export async function runInstitutionalFlow(config: EngineConfig = loadConfigFromEnv()): Promise<InstitutionalDataset> {
  const logger = createLogger('Engine', config.logLevel);
  const calendar = new TradingCalendar({
    holidays: holidaySet(),
    utcOffsetMinutes: config.calendar.utcOffsetMinutes,
    logger: logger.child('Calendar'),
  });
  const registry = createLiveRegistry(config, { logger, calendar });
  return buildDataset({ registry, config, logger: logger.child('DataService'), calendar });
}
