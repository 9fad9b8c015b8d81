// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Live Data Provider Implementations
// ═══════════════════════════════════════════════════════════════════════════════
//
//  NseDealsProvider         — bulk + block deals, cookie warm-up, bounded retry
//  MunafaSutraProvider      — public FII/DII HTML table, single attempt
//  YahooChartPriceProvider  — daily OHLCV history for technical analysis
//
// Every provider logs its failures and returns an { ok: false } envelope.
// Nothing here throws to the caller.
//
// ═══════════════════════════════════════════════════════════════════════════════

import * as cheerio from 'cheerio';
import { z } from 'zod';

import type { DealCategory, DealRecord, InstitutionalStock, PriceBar } from '../types/market';
import type { DealSourcePayload, IDealSource, IPriceProvider, ProviderRegistry, ProviderResult } from './providers';
import { StaticFallbackProvider, failedResult, okResult } from './providers';
import type { EngineConfig } from './config';
import type { Logger } from './logger';
import { createLogger } from './logger';
import { TradingCalendar, formatExchangeDate } from './tradingCalendar';
import { BROWSER_USER_AGENT, HttpSession, sleep } from './httpSession';
import type { FetchLike, TextResponse } from './httpSession';
import { renameRow, resolveDealColumns } from './columnMapping';
import { parseCsv } from '../utils/csv';
import { TtlCache } from '../utils/ttlCache';
import { holidaySet, loadFallbackStocks } from '../data/referenceData';


// ═══════════════════════════════════════════════════════════════════════════════
// NSE DEALS PROVIDER — primary source
// ═══════════════════════════════════════════════════════════════════════════════
// Endpoint: /api/historicalOR/bulk-block-short-deals?optionType=<cat>&from=&to=
// The endpoint sits behind bot protection: a session must first load the
// landing page and the deals page to collect cookies. Responses arrive as
// JSON or CSV depending on the day; both are accepted.
// ═══════════════════════════════════════════════════════════════════════════════

const NSE_DEALS_PATH = '/api/historicalOR/bulk-block-short-deals';
const NSE_WARMUP_PATHS = ['/', '/market-data/bulk-block-short-selling-deals'];

const NSE_HEADERS: Record<string, string> = {
  'User-Agent': BROWSER_USER_AGENT,
  'Accept': 'application/json, text/csv, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  'Referer': 'https://www.nseindia.com/',
  'X-Requested-With': 'XMLHttpRequest',
};

const DEAL_CATEGORIES: ReadonlyArray<{ option: string; category: DealCategory }> = [
  { option: 'bulk_deals',  category: 'bulk' },
  { option: 'block_deals', category: 'block' },
];

/** Keys under which the endpoint has been seen to nest its row list */
const JSON_LIST_KEYS = [
  'data', 'Data', 'results', 'bulkDeals', 'blockDeals',
  'deals', 'bulkDealData', 'blockDealData', 'records',
];

type RawRow = Record<string, unknown>;

function isRecord(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function zipColumns(columns: unknown[], values: unknown[]): RawRow {
  const row: RawRow = {};
  columns.forEach((col, idx) => {
    row[String(col)] = values[idx];
  });
  return row;
}

/** Pull the row list out of any of the JSON shapes the endpoint returns */
export function extractJsonRows(raw: unknown): RawRow[] {
  if (Array.isArray(raw)) return raw.filter(isRecord);
  if (!isRecord(raw)) return [];

  const columnsRaw = raw['columns'] ?? raw['Columns'];
  const columns = Array.isArray(columnsRaw) ? columnsRaw : null;

  for (const key of JSON_LIST_KEYS) {
    const list = raw[key];
    if (!Array.isArray(list) || list.length === 0) continue;
    if (columns && !isRecord(list[0])) {
      return list.filter(Array.isArray).map(values => zipColumns(columns, values));
    }
    return list.filter(isRecord);
  }
  return [];
}

/** Why a response cannot be used, or null when it looks like data */
export function responseFailure(res: TextResponse): string | null {
  if (res.body.length === 0) return 'Empty body';
  if (res.body.trimStart().startsWith('<')) return 'HTML returned (bot block)';
  if (res.status !== 200) return `HTTP ${res.status}`;
  return null;
}

/** Parse a JSON or CSV deal body. Throws when the body is not parseable. */
export function parseDealBody(res: TextResponse): RawRow[] {
  const trimmed = res.body.trim();
  const looksJson = res.contentType.includes('json') || trimmed.startsWith('{') || trimmed.startsWith('[');
  if (looksJson) {
    const raw: unknown = JSON.parse(trimmed);
    return extractJsonRows(raw);
  }
  if (!trimmed.includes(',')) {
    throw new Error(`Unrecognised body (${res.contentType || 'no content-type'})`);
  }
  return parseCsv(trimmed);
}

function cell(row: RawRow, column: string): string {
  const value = row[column];
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

function parseNumber(value: string): number | null {
  if (!value) return null;
  const n = Number(value.replace(/,/g, ''));
  return Number.isFinite(n) ? n : null;
}

/**
 * Normalize one category's rows into DealRecords. Columns are resolved over
 * the union of the rows' keys, in first-seen order.
 * Returns null when no column resolves to CLIENT.
 */
export function rowsToDeals(rows: readonly RawRow[], category: DealCategory): DealRecord[] | null {
  const headers: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }

  const rename = resolveDealColumns(headers);
  if (![...rename.values()].includes('CLIENT')) return null;

  const deals: DealRecord[] = [];
  for (const raw of rows) {
    const r = renameRow(raw, rename);
    const symbol = cell(r, 'SYMBOL').toUpperCase();
    const client = cell(r, 'CLIENT');
    if (!symbol || !client) continue;

    deals.push({
      symbol,
      company: cell(r, 'COMPANY') || symbol,
      client,
      buy_sell: cell(r, 'BUYSELL').toUpperCase(),
      quantity: parseNumber(cell(r, 'QTY')),
      price: parseNumber(cell(r, 'PRICE')),
      trade_date: cell(r, 'DATE') || null,
      category,
    });
  }
  return deals;
}

export interface NseDealsProviderOptions {
  baseUrl: string;
  calendar: TradingCalendar;
  cutoff: EngineConfig['calendar']['cutoff'];
  maxAttempts: number;
  retryDelayMs: number;
  warmupDelayMs: number;
  categoryDelayMs: number;
  timeoutMs: number;
  fetchFn?: FetchLike;
  logger: Logger;
  now?: () => Date;
}

export class NseDealsProvider implements IDealSource {
  name = 'nse-deals';
  label = 'NSE Bulk Deals API';

  private readonly opts: NseDealsProviderOptions;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: NseDealsProviderOptions) {
    this.opts = options;
    this.log = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(): Promise<ProviderResult<DealSourcePayload>> {
    const empty: DealSourcePayload = { kind: 'deals', deals: [] };

    try {
      const window = this.opts.calendar.currentWindow(this.now(), this.opts.cutoff);
      if (!window) {
        this.log.warn('No disclosure window available — skipping');
        return failedResult(this.name, empty, ['No trading day in lookback']);
      }
      const from = formatExchangeDate(window.from_date);
      const to = formatExchangeDate(window.to_date);
      this.log.info(`Range: ${from} to ${to}`);

      const session = new HttpSession({
        headers: NSE_HEADERS,
        timeoutMs: this.opts.timeoutMs,
        fetchFn: this.opts.fetchFn,
      });
      await this.warmUp(session);

      const deals: DealRecord[] = [];
      const warnings: string[] = [];
      let categoriesWithRows = 0;
      let unmappedCategories = 0;

      for (const [idx, { option, category }] of DEAL_CATEGORIES.entries()) {
        const url = new URL(NSE_DEALS_PATH, this.opts.baseUrl);
        url.searchParams.set('optionType', option);
        url.searchParams.set('from', from);
        url.searchParams.set('to', to);

        const rows = await this.fetchCategory(session, url.toString(), option);
        if (rows === null) {
          warnings.push(`${option} failed`);
        } else if (rows.length === 0) {
          this.log.info(`[${option}] No data in range`);
        } else {
          categoriesWithRows++;
          const parsed = rowsToDeals(rows, category);
          if (parsed === null) {
            unmappedCategories++;
            this.log.warn(`[${option}] CLIENT column missing`, { columns: Object.keys(rows[0]) });
          } else {
            this.log.info(`[${option}] ${rows.length} rows, ${parsed.length} usable`);
            deals.push(...parsed);
          }
        }

        if (idx < DEAL_CATEGORIES.length - 1) await sleep(this.opts.categoryDelayMs);
      }

      if (categoriesWithRows === 0) {
        this.log.warn('No data from any deal category — falling back');
        return failedResult(this.name, empty, warnings);
      }
      if (unmappedCategories === categoriesWithRows) {
        this.log.warn('CLIENT column missing — abandoning source for this run');
        return failedResult(this.name, empty, [...warnings, 'CLIENT column missing']);
      }

      return okResult<DealSourcePayload>(this.name, { kind: 'deals', deals }, warnings);
    } catch (err) {
      this.log.warn(`Unexpected failure: ${String(err)}`);
      return failedResult(this.name, empty, [String(err)]);
    }
  }

  private async warmUp(session: HttpSession): Promise<void> {
    for (const path of NSE_WARMUP_PATHS) {
      const res = await session.get(new URL(path, this.opts.baseUrl).toString());
      this.log.debug(`Warm-up ${path} HTTP ${res.status}`, { cookies: session.cookieNames() });
      await sleep(this.opts.warmupDelayMs);
    }
  }

  /** Rows for one category, or null once every attempt has failed */
  private async fetchCategory(session: HttpSession, url: string, option: string): Promise<RawRow[] | null> {
    const { maxAttempts, retryDelayMs } = this.opts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const res = await session.get(url);
        const failure = responseFailure(res);
        if (failure === null) return parseDealBody(res);
        this.log.warn(`[${option}] attempt ${attempt}: ${failure}`);
      } catch (err) {
        this.log.warn(`[${option}] attempt ${attempt} error: ${String(err)}`);
      }
      if (attempt < maxAttempts) await sleep(retryDelayMs * 2 ** (attempt - 1));
    }

    this.log.warn(`[${option}] failed after ${maxAttempts} attempts — skipping`);
    return null;
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// MUNAFASUTRA PROVIDER — secondary source (HTML scrape)
// ═══════════════════════════════════════════════════════════════════════════════
// Each stock row links to /nse/stock/<SYMBOL>. The page does not separate FII
// from DII, so a row containing "bought" marks both as buy, otherwise both
// as sell.
// ═══════════════════════════════════════════════════════════════════════════════

/** Extract institutional stocks from the FII/DII page markup */
export function parseMunafaSutraHtml(html: string, maxRows: number): InstitutionalStock[] {
  const $ = cheerio.load(html);
  const stocks: InstitutionalStock[] = [];

  $('a[href*="/nse/stock/"]').each((_, el) => {
    const anchor = $(el);
    const href = anchor.attr('href') ?? '';
    const symbol = (href.replace(/\/+$/, '').split('/').pop() ?? '').trim().toUpperCase();
    const name = anchor.text().replace(/\s+/g, ' ').trim();
    if (!symbol || !name) return;

    const tr = anchor.closest('tr');
    if (tr.length === 0) return;

    const rowText = tr
      .find('td')
      .map((__, td) => $(td).text().replace(/\s+/g, ' ').trim().toLowerCase())
      .get()
      .join(' ');
    const action = rowText.includes('bought') ? 'buy' : 'sell';

    stocks.push({ symbol, name, fii_cash: action, dii_cash: action });
  });

  return stocks.slice(0, maxRows);
}

export interface MunafaSutraProviderOptions {
  url: string;
  maxRows: number;
  timeoutMs: number;
  fetchFn?: FetchLike;
  logger: Logger;
}

export class MunafaSutraProvider implements IDealSource {
  name = 'munafasutra';
  label = 'MunafaSutra';

  private readonly opts: MunafaSutraProviderOptions;
  private readonly log: Logger;

  constructor(options: MunafaSutraProviderOptions) {
    this.opts = options;
    this.log = options.logger;
  }

  async fetch(): Promise<ProviderResult<DealSourcePayload>> {
    const empty: DealSourcePayload = { kind: 'classified', stocks: [] };
    try {
      const session = new HttpSession({
        headers: {
          'User-Agent': BROWSER_USER_AGENT,
          'Accept': 'text/html,application/xhtml+xml,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        timeoutMs: this.opts.timeoutMs,
        fetchFn: this.opts.fetchFn,
      });
      const res = await session.get(this.opts.url);
      if (res.status !== 200) throw new Error(`HTTP ${res.status}`);

      const stocks = parseMunafaSutraHtml(res.body, this.opts.maxRows);
      this.log.info(`${stocks.length} stocks`);
      if (stocks.length === 0) return failedResult(this.name, empty, ['No stock rows found']);
      return okResult<DealSourcePayload>(this.name, { kind: 'classified', stocks });
    } catch (err) {
      this.log.warn(`Scrape failed: ${String(err)}`);
      return failedResult(this.name, empty, [String(err)]);
    }
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// YAHOO CHART PRICE PROVIDER — daily OHLCV
// ═══════════════════════════════════════════════════════════════════════════════
// The chart endpoint nests OHLCV as parallel arrays under
// chart.result[0].indicators.quote[0]; they are flattened here into
// single-level PriceBars. Prices are split/dividend adjusted using the
// adjclose series when present. Rows missing a price field are dropped;
// a missing volume reads as 0 (index series often carry none).
// ═══════════════════════════════════════════════════════════════════════════════

const NullableSeries = z.array(z.number().nullable()).optional();

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({ gmtoffset: z.number().optional() }).passthrough().optional(),
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({
        quote: z.array(z.object({
          open: NullableSeries,
          high: NullableSeries,
          low: NullableSeries,
          close: NullableSeries,
          volume: NullableSeries,
        })),
        adjclose: z.array(z.object({ adjclose: NullableSeries })).optional(),
      }),
    })).nullable(),
  }),
});

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

function finite(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Flatten a parsed chart response into chronological bars */
export function flattenChartResponse(parsed: ChartResponse): PriceBar[] {
  const result = parsed.chart.result?.[0];
  if (!result) return [];

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (!quote) return [];
  const adjclose = result.indicators.adjclose?.[0]?.adjclose;
  const offsetSec = result.meta?.gmtoffset ?? 0;

  const bars: PriceBar[] = [];
  timestamps.forEach((ts, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (!finite(open) || !finite(high) || !finite(low) || !finite(close)) return;
    const rawVolume = quote.volume?.[i];
    const volume = finite(rawVolume) ? rawVolume : 0;

    const adj = adjclose?.[i];
    const factor = finite(adj) && close !== 0 ? adj / close : 1;

    bars.push({
      date: new Date((ts + offsetSec) * 1000).toISOString().slice(0, 10),
      open: open * factor,
      high: high * factor,
      low: low * factor,
      close: close * factor,
      volume,
    });
  });

  return bars;
}

export interface YahooChartPriceProviderOptions {
  baseUrl: string;
  timeoutMs: number;
  cacheTtlMs: number;
  fetchFn?: FetchLike;
  logger: Logger;
}

export class YahooChartPriceProvider implements IPriceProvider {
  name = 'yahoo-chart';

  private readonly opts: YahooChartPriceProviderOptions;
  private readonly log: Logger;
  private readonly fetchFn: FetchLike;
  private readonly cache: TtlCache<PriceBar[]>;

  constructor(options: YahooChartPriceProviderOptions) {
    this.opts = options;
    this.log = options.logger;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.cache = new TtlCache<PriceBar[]>(options.cacheTtlMs);
  }

  async fetchDailyBars(ticker: string, from: Date, to: Date): Promise<ProviderResult<PriceBar[]>> {
    const cacheKey = `${ticker}:${from.toISOString().slice(0, 10)}:${to.toISOString().slice(0, 10)}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return okResult(this.name, cached);

    try {
      const url = new URL(`/v8/finance/chart/${encodeURIComponent(ticker)}`, this.opts.baseUrl);
      url.searchParams.set('period1', String(Math.floor(from.getTime() / 1000)));
      url.searchParams.set('period2', String(Math.floor(to.getTime() / 1000)));
      url.searchParams.set('interval', '1d');
      url.searchParams.set('events', 'history');

      const res = await this.fetchFn(url.toString(), {
        headers: { 'User-Agent': BROWSER_USER_AGENT, 'Accept': 'application/json' },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!res.ok) throw new Error(`Chart ${res.status}`);

      const json: unknown = await res.json();
      const parsed = ChartResponseSchema.safeParse(json);
      if (!parsed.success) throw new Error(`Unexpected chart payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);

      const bars = flattenChartResponse(parsed.data);
      if (bars.length === 0) return failedResult(this.name, [], [`No bars for ${ticker}`]);

      this.cache.set(cacheKey, bars);
      return okResult(this.name, bars);
    } catch (err) {
      this.log.warn(`fetchDailyBars failed for ${ticker}: ${String(err)}`);
      return failedResult(this.name, [], [String(err)]);
    }
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// LIVE REGISTRY FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export interface LiveRegistryDeps {
  fetchFn?: FetchLike;
  logger?: Logger;
  now?: () => Date;
  holidays?: ReadonlySet<string>;
  /** Shared with the data service so both report the same window */
  calendar?: TradingCalendar;
  fallbackStocks?: readonly InstitutionalStock[];
}

/**
 * Creates the live provider registry.
 *
 *  - Deals:    NSE API → MunafaSutra → static fallback (in that order)
 *  - Price:    Yahoo chart API
 */
export function createLiveRegistry(config: EngineConfig, deps: LiveRegistryDeps = {}): ProviderRegistry {
  const root = deps.logger ?? createLogger('Engine', config.logLevel);

  const calendar = deps.calendar ?? new TradingCalendar({
    holidays: deps.holidays ?? holidaySet(),
    utcOffsetMinutes: config.calendar.utcOffsetMinutes,
    logger: root.child('Calendar'),
  });

  return {
    dealSources: [
      new NseDealsProvider({
        baseUrl: config.nse.baseUrl,
        calendar,
        cutoff: config.calendar.cutoff,
        maxAttempts: config.nse.maxAttempts,
        retryDelayMs: config.nse.retryDelayMs,
        warmupDelayMs: config.nse.warmupDelayMs,
        categoryDelayMs: config.nse.categoryDelayMs,
        timeoutMs: config.requestTimeoutMs,
        fetchFn: deps.fetchFn,
        logger: root.child('NSE'),
        now: deps.now,
      }),
      new MunafaSutraProvider({
        url: config.scrape.url,
        maxRows: config.scrape.maxRows,
        timeoutMs: config.requestTimeoutMs,
        fetchFn: deps.fetchFn,
        logger: root.child('MunafaSutra'),
      }),
    ],
    fallback: new StaticFallbackProvider(deps.fallbackStocks ?? loadFallbackStocks()),
    price: new YahooChartPriceProvider({
      baseUrl: config.price.baseUrl,
      timeoutMs: config.requestTimeoutMs,
      cacheTtlMs: config.price.cacheTtlMs,
      fetchFn: deps.fetchFn,
      logger: root.child('Yahoo'),
    }),
  };
}
