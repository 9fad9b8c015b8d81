// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Data Provider Interfaces
// ═══════════════════════════════════════════════════════════════════════════════
//
// STRATEGY: "Provider Interface" pattern
//
// Each data source has a strongly-typed interface. Implementations:
//   - NseDealsProvider        (liveProviders.ts) authenticated deal endpoint
//   - MunafaSutraProvider     (liveProviders.ts) public HTML table
//   - StaticFallbackProvider  (below)            versioned JSON table
//   - YahooChartPriceProvider (liveProviders.ts) daily OHLCV history
//
// This allows:
//   1. Unit testing the chain and the engine with stub providers
//   2. Swapping a source without touching classification or scoring
//   3. Reordering the deal chain by configuration
//
// PROVIDER CONTRACT:
//   Providers never throw. Failures are logged and reported as
//   { ok: false } envelopes so the caller can move on to the next source.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { DealRecord, InstitutionalStock, PriceBar } from '../types/market';


// ═══════════════════════════════════════════════════════════════════════════════
// COMMON TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Standard wrapper for all provider responses */
export interface ProviderResult<T> {
  ok: boolean;
  data: T;
  source: string;
  fetched_at: string;
  /** Partial success: some requests failed */
  warnings?: string[];
}

/**
 * What a deal source hands back.
 *   deals      → raw disclosures, still to be classified
 *   classified → the source already decided FII/DII actions per symbol
 */
export type DealSourcePayload =
  | { kind: 'deals'; deals: DealRecord[] }
  | { kind: 'classified'; stocks: InstitutionalStock[] };

export function payloadSize(payload: DealSourcePayload): number {
  return payload.kind === 'deals' ? payload.deals.length : payload.stocks.length;
}

export function okResult<T>(source: string, data: T, warnings?: string[]): ProviderResult<T> {
  return {
    ok: true,
    data,
    source,
    fetched_at: new Date().toISOString(),
    ...(warnings && warnings.length > 0 ? { warnings } : {}),
  };
}

export function failedResult<T>(source: string, empty: T, warnings?: string[]): ProviderResult<T> {
  return {
    ok: false,
    data: empty,
    source,
    fetched_at: new Date().toISOString(),
    ...(warnings && warnings.length > 0 ? { warnings } : {}),
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Deal Source — one link in the Deal-Source Chain.
 * `label` is the human-readable name reported with the dataset.
 */
export interface IDealSource {
  name: string;
  label: string;

  fetch(): Promise<ProviderResult<DealSourcePayload>>;
}

/**
 * Price Data Provider — daily OHLCV bars, chronological (oldest first).
 */
export interface IPriceProvider {
  name: string;

  fetchDailyBars(ticker: string, from: Date, to: Date): Promise<ProviderResult<PriceBar[]>>;
}

/** Everything the data service needs, injected in one place */
export interface ProviderRegistry {
  dealSources: IDealSource[];
  fallback: StaticFallbackProvider;
  price: IPriceProvider;
}


// ═══════════════════════════════════════════════════════════════════════════════
// STATIC FALLBACK PROVIDER — last link in the chain, never empty
// ═══════════════════════════════════════════════════════════════════════════════

export class StaticFallbackProvider implements IDealSource {
  name = 'static-fallback';
  label = 'Fallback (Known Institutional Stocks)';

  private readonly stocks: readonly InstitutionalStock[];

  constructor(stocks: readonly InstitutionalStock[]) {
    if (stocks.length === 0) {
      throw new Error('StaticFallbackProvider requires at least one stock');
    }
    this.stocks = stocks;
  }

  async fetch(): Promise<ProviderResult<DealSourcePayload>> {
    return okResult<DealSourcePayload>(this.name, { kind: 'classified', stocks: this.stocks.map(s => ({ ...s })) });
  }
}
