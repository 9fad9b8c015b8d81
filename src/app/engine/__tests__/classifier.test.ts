// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Institutional Classifier Test Suite
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';

import {
  buildKeywordMatcher,
  classifyDeals,
  dealAction,
  matchInstitution,
  sortDealsByTradeDate,
  tradeDateKey,
} from '../classifier';
import type { DealRecord } from '../../types/market';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function makeDeal(overrides: Partial<DealRecord> = {}): DealRecord {
  return {
    symbol: 'TESTCO',
    company: 'Test Company Ltd',
    client: 'RANDOM TRADER LLP',
    buy_sell: 'BUY',
    quantity: 100_000,
    price: 250.5,
    trade_date: '16-Feb-2026',
    category: 'bulk',
    ...overrides,
  };
}

const SMALL_TABLE = buildKeywordMatcher({
  version: 'test',
  fii: ['FOREIGN', 'ALPHA GLOBAL'],
  dii: ['MUTUAL FUND', 'ALPHA GLOBAL'],
});


// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

describe('matchInstitution (bundled keyword table)', () => {
  it('classifies a domestic mutual fund as DII', () => {
    expect(matchInstitution('HDFC MUTUAL FUND')).toEqual({ fii: false, dii: true });
  });

  it('classifies a foreign bank as FII', () => {
    expect(matchInstitution('Morgan Stanley Asia (Singapore) Pte')).toEqual({ fii: true, dii: false });
  });

  it('matches nothing for an individual trader', () => {
    expect(matchInstitution('RANDOM TRADER LLP')).toEqual({ fii: false, dii: false });
  });

  it('can match both lists', () => {
    expect(matchInstitution('GOLDMAN SACHS MUTUAL FUND')).toEqual({ fii: true, dii: true });
  });
});

describe('matchInstitution (injected table)', () => {
  it('is case-insensitive', () => {
    expect(matchInstitution('some foreign fund', SMALL_TABLE)).toEqual({ fii: true, dii: false });
  });

  it('sets both flags for a keyword present in both lists', () => {
    expect(matchInstitution('ALPHA GLOBAL PARTNERS', SMALL_TABLE)).toEqual({ fii: true, dii: true });
  });
});

describe('dealAction', () => {
  it('maps any B-prefixed flag to buy', () => {
    expect(dealAction('BUY')).toBe('buy');
    expect(dealAction('b')).toBe('buy');
    expect(dealAction(' Bought ')).toBe('buy');
  });

  it('maps everything else to sell', () => {
    expect(dealAction('SELL')).toBe('sell');
    expect(dealAction('S')).toBe('sell');
    expect(dealAction('')).toBe('sell');
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// FOLDING
// ═══════════════════════════════════════════════════════════════════════════════

describe('classifyDeals', () => {
  it('classifies HDFC MUTUAL FUND buying as DII buy', () => {
    const [stock] = classifyDeals([makeDeal({ client: 'HDFC MUTUAL FUND', buy_sell: 'BUY' })]);
    expect(stock).toEqual({ symbol: 'TESTCO', name: 'Test Company Ltd', fii_cash: 'neutral', dii_cash: 'buy' });
  });

  it('keeps independent last-seen-wins slots per category', () => {
    const stocks = classifyDeals([
      makeDeal({ client: 'FOREIGN FUND A', buy_sell: 'BUY' }),
      makeDeal({ client: 'XYZ MUTUAL FUND', buy_sell: 'SELL' }),
      makeDeal({ client: 'FOREIGN FUND B', buy_sell: 'SELL' }),
    ], SMALL_TABLE);
    expect(stocks).toEqual([{ symbol: 'TESTCO', name: 'Test Company Ltd', fii_cash: 'sell', dii_cash: 'sell' }]);
  });

  it('overwrites both slots for a deal matching both lists', () => {
    const [stock] = classifyDeals([
      makeDeal({ client: 'FOREIGN FUND', buy_sell: 'SELL' }),
      makeDeal({ client: 'ALPHA GLOBAL PARTNERS', buy_sell: 'BUY' }),
    ], SMALL_TABLE);
    expect(stock.fii_cash).toBe('buy');
    expect(stock.dii_cash).toBe('buy');
  });

  it('retains unmatched deals as a neutral entry', () => {
    const stocks = classifyDeals([makeDeal({ symbol: 'OTHERCO', company: 'Other Co' })], SMALL_TABLE);
    expect(stocks).toEqual([{ symbol: 'OTHERCO', name: 'Other Co', fii_cash: 'neutral', dii_cash: 'neutral' }]);
  });

  it('does not let an unmatched deal reset an earlier action', () => {
    const [stock] = classifyDeals([
      makeDeal({ client: 'FOREIGN FUND', buy_sell: 'BUY' }),
      makeDeal({ client: 'RANDOM TRADER LLP', buy_sell: 'SELL' }),
    ], SMALL_TABLE);
    expect(stock.fii_cash).toBe('buy');
  });

  it('returns symbols in first-seen order and upper-cases them', () => {
    const stocks = classifyDeals([
      makeDeal({ symbol: 'beta' }),
      makeDeal({ symbol: 'ALPHA' }),
      makeDeal({ symbol: 'BETA', client: 'FOREIGN X' }),
    ], SMALL_TABLE);
    expect(stocks.map(s => s.symbol)).toEqual(['BETA', 'ALPHA']);
    expect(stocks[0].fii_cash).toBe('buy');
  });

  it('falls back to the symbol when the company name is empty', () => {
    const [stock] = classifyDeals([makeDeal({ company: '' })], SMALL_TABLE);
    expect(stock.name).toBe('TESTCO');
  });

  it('returns [] for no deals', () => {
    expect(classifyDeals([], SMALL_TABLE)).toEqual([]);
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// TRADE-DATE ORDERING
// ═══════════════════════════════════════════════════════════════════════════════

describe('tradeDateKey', () => {
  it('parses the exchange date formats', () => {
    expect(tradeDateKey('16-Feb-2026')).toBe(20260216);
    expect(tradeDateKey('16-02-2026')).toBe(20260216);
    expect(tradeDateKey('2026-02-16')).toBe(20260216);
    expect(tradeDateKey('2026-02-16T00:00:00')).toBe(20260216);
  });

  it('returns null for anything else', () => {
    expect(tradeDateKey(null)).toBeNull();
    expect(tradeDateKey('yesterday')).toBeNull();
    expect(tradeDateKey('16-Xyz-2026')).toBeNull();
  });
});

describe('sortDealsByTradeDate', () => {
  it('orders oldest first, keeps ties stable and puts undated deals last', () => {
    const a = makeDeal({ client: 'A', trade_date: '17-Feb-2026' });
    const b = makeDeal({ client: 'B', trade_date: null });
    const c = makeDeal({ client: 'C', trade_date: '13-Feb-2026' });
    const d = makeDeal({ client: 'D', trade_date: '17-02-2026' });
    expect(sortDealsByTradeDate([a, b, c, d]).map(x => x.client)).toEqual(['C', 'A', 'D', 'B']);
  });

  it('changes the fold result when the provider order was reversed', () => {
    const newer = makeDeal({ client: 'FOREIGN NEW', buy_sell: 'SELL', trade_date: '17-Feb-2026' });
    const older = makeDeal({ client: 'FOREIGN OLD', buy_sell: 'BUY', trade_date: '10-Feb-2026' });
    expect(classifyDeals([newer, older], SMALL_TABLE)[0].fii_cash).toBe('buy');
    expect(classifyDeals(sortDealsByTradeDate([newer, older]), SMALL_TABLE)[0].fii_cash).toBe('sell');
  });
});
