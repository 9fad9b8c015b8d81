// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Institutional Classifier
// ═══════════════════════════════════════════════════════════════════════════════
//
// Deals → per-symbol FII / DII action.
//
//   1. Client name is matched (case-insensitive substring) against the FII and
//      DII keyword tables. A deal can hit one list, both, or neither.
//   2. Deals are folded in the order given. Each symbol carries two
//      independent last-seen-wins slots; a matching deal overwrites its slot
//      with "buy" ("B…" flag) or "sell".
//   3. A symbol seen only through unmatched deals keeps both slots neutral
//      and lands in the BULK/BLOCK bucket downstream.
//
// Fold order is significant. Use sortDealsByTradeDate first when the
// provider's row order cannot be trusted.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CashAction, DealRecord, InstitutionalStock } from '../types/market';
import type { InstitutionKeywords } from '../data/referenceData';
import { loadInstitutionKeywords } from '../data/referenceData';


export interface InstitutionMatch {
  fii: boolean;
  dii: boolean;
}

/** Keyword lists pre-uppercased once so the fold does not redo it per deal */
export interface KeywordMatcher {
  fii: readonly string[];
  dii: readonly string[];
}

export function buildKeywordMatcher(keywords: InstitutionKeywords): KeywordMatcher {
  const prep = (list: readonly string[]) =>
    list.map(k => k.toUpperCase()).filter(k => k.trim().length > 0);
  return { fii: prep(keywords.fii), dii: prep(keywords.dii) };
}

let defaultMatcher: KeywordMatcher | null = null;

function getDefaultMatcher(): KeywordMatcher {
  if (!defaultMatcher) defaultMatcher = buildKeywordMatcher(loadInstitutionKeywords());
  return defaultMatcher;
}

export function matchInstitution(client: string, matcher: KeywordMatcher = getDefaultMatcher()): InstitutionMatch {
  const name = client.toUpperCase();
  return {
    fii: matcher.fii.some(k => name.includes(k)),
    dii: matcher.dii.some(k => name.includes(k)),
  };
}

/** "BUY", "B", "Bought" → buy; anything else → sell */
export function dealAction(buySell: string): CashAction {
  return buySell.trim().toUpperCase().startsWith('B') ? 'buy' : 'sell';
}

interface FoldSlot {
  name: string;
  fii_cash: CashAction;
  dii_cash: CashAction;
}

/**
 * Fold deals into one InstitutionalStock per symbol, in first-seen order.
 */
export function classifyDeals(
  deals: readonly DealRecord[],
  keywords: KeywordMatcher = getDefaultMatcher(),
): InstitutionalStock[] {
  const bySymbol = new Map<string, FoldSlot>();

  for (const deal of deals) {
    const symbol = deal.symbol.trim().toUpperCase();
    if (!symbol) continue;

    let slot = bySymbol.get(symbol);
    if (!slot) {
      slot = { name: deal.company || symbol, fii_cash: 'neutral', dii_cash: 'neutral' };
      bySymbol.set(symbol, slot);
    }

    const match = matchInstitution(deal.client, keywords);
    const action = dealAction(deal.buy_sell);
    if (match.fii) slot.fii_cash = action;
    if (match.dii) slot.dii_cash = action;
  }

  return [...bySymbol.entries()].map(([symbol, slot]) => ({
    symbol,
    name: slot.name,
    fii_cash: slot.fii_cash,
    dii_cash: slot.dii_cash,
  }));
}


// ─── Trade-date ordering ─────────────────────────────────────────────────────

const MONTHS: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
};

/**
 * Parse the date formats the exchange has used ("16-Feb-2026", "16-02-2026",
 * "2026-02-16") into a sortable YYYYMMDD number. null when unrecognised.
 */
export function tradeDateKey(raw: string | null): number | null {
  if (!raw) return null;
  const value = raw.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (iso) return Number(iso[1]) * 10000 + Number(iso[2]) * 100 + Number(iso[3]);

  const dmy = /^(\d{1,2})[-/ ]([A-Za-z]{3}|\d{1,2})[-/ ](\d{4})$/.exec(value);
  if (!dmy) return null;
  const month = /^\d+$/.test(dmy[2]) ? Number(dmy[2]) : MONTHS[dmy[2].toUpperCase()];
  if (!month) return null;
  return Number(dmy[3]) * 10000 + month * 100 + Number(dmy[1]);
}

/**
 * Stable sort by trade date, oldest first. Deals with an unparseable date
 * keep their relative order and go last.
 */
export function sortDealsByTradeDate(deals: readonly DealRecord[]): DealRecord[] {
  return deals
    .map((deal, idx) => ({ deal, idx, key: tradeDateKey(deal.trade_date) }))
    .sort((a, b) => {
      if (a.key === null && b.key === null) return a.idx - b.idx;
      if (a.key === null) return 1;
      if (b.key === null) return -1;
      return a.key - b.key || a.idx - b.idx;
    })
    .map(e => e.deal);
}
