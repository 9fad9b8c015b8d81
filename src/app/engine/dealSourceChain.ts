// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Deal-Source Chain
// ═══════════════════════════════════════════════════════════════════════════════
//
// Ordered list of IDealSource strategies, tried one at a time. The first
// source that reports ok with a non-empty payload wins; the static fallback
// closes the chain so the run always has at least one stock to work on.
//
// Sources are never run concurrently: the primary's cookie warm-up is
// stateful and the chain short-circuits on the first success anyway.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { InstitutionalStock } from '../types/market';
import type { DealSourcePayload, IDealSource, StaticFallbackProvider } from './providers';
import { payloadSize } from './providers';
import type { KeywordMatcher } from './classifier';
import { classifyDeals } from './classifier';
import type { Logger } from './logger';
import { silentLogger } from './logger';


export interface DealChainResult {
  payload: DealSourcePayload;
  /** Provider name, e.g. "nse-deals" */
  source: string;
  /** Human-readable source label reported with the dataset */
  label: string;
  /** Warnings collected from every source tried, in order */
  warnings: string[];
}

export class DealSourceChain {
  private readonly sources: readonly IDealSource[];
  private readonly fallback: StaticFallbackProvider;
  private readonly log: Logger;

  constructor(sources: readonly IDealSource[], fallback: StaticFallbackProvider, logger: Logger = silentLogger) {
    this.sources = sources;
    this.fallback = fallback;
    this.log = logger;
  }

  async fetchDeals(): Promise<DealChainResult> {
    const warnings: string[] = [];

    for (const source of this.sources) {
      this.log.info(`Trying ${source.label}`);
      try {
        const result = await source.fetch();
        for (const w of result.warnings ?? []) warnings.push(`${source.name}: ${w}`);

        if (result.ok && payloadSize(result.data) > 0) {
          this.log.info(`${source.label}: ${payloadSize(result.data)} records`);
          return { payload: result.data, source: source.name, label: source.label, warnings };
        }
        this.log.warn(`${source.label} returned nothing usable`);
      } catch (err) {
        warnings.push(`${source.name}: ${String(err)}`);
        this.log.error(`${source.label} threw`, { error: String(err) });
      }
    }

    this.log.warn('All live sources failed, using static fallback');
    const fallback = await this.fallback.fetch();
    return { payload: fallback.data, source: this.fallback.name, label: this.fallback.label, warnings };
  }
}

/** Turn whatever the chain produced into per-symbol institutional stocks */
export function resolveInstitutionalStocks(
  payload: DealSourcePayload,
  keywords?: KeywordMatcher,
): InstitutionalStock[] {
  if (payload.kind === 'classified') return payload.stocks;
  return classifyDeals(payload.deals, keywords);
}
