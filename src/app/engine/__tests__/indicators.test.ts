// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Indicator Engine Test Suite
// ═══════════════════════════════════════════════════════════════════════════════
//
// Coverage:
//   1. Series primitives (diff, ewm, ema, wilder, rolling, sample std)
//   2. Individual indicators on hand-computable inputs
//   3. Snapshot scenarios (rising, falling, flat, short, gappy series)
//   4. Neutral snapshot contract
//
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';

import {
  MIN_BARS,
  NEUTRAL_SNAPSHOT,
  adxSeries,
  bollinger,
  computeTechnicalSnapshot,
  diff,
  ema,
  ewm,
  pivotLevels,
  rollingMax,
  rollingMin,
  round,
  rsiSeries,
  sampleStd,
  stochasticRsi,
  swingRange,
  wilder,
} from '../indicators';
import type { PriceBar } from '../../types/market';


// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Daily bars with high = close + spread, low = close − spread */
function makeBars(closes: number[], spread = 1): PriceBar[] {
  return closes.map((close, i) => ({
    date: new Date(Date.UTC(2026, 0, 1 + i)).toISOString().slice(0, 10),
    open: close,
    high: close + spread,
    low: close - spread,
    close,
    volume: 1000,
  }));
}

/** n closes evenly spaced from `from` to `to` */
function linear(from: number, to: number, n: number): number[] {
  return Array.from({ length: n }, (_, i) => from + (i * (to - from)) / (n - 1));
}


// ═══════════════════════════════════════════════════════════════════════════════
// 1. SERIES PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════════

describe('series primitives', () => {
  it('diff leaves the first element NaN', () => {
    const d = diff([5, 7, 4]);
    expect(d[0]).toBeNaN();
    expect(d.slice(1)).toEqual([2, -3]);
  });

  it('ewm seeds from the first finite value', () => {
    const out = ewm([NaN, 1, 2], 0.5);
    expect(out[0]).toBeNaN();
    expect(out.slice(1)).toEqual([1, 1.5]);
  });

  it('ewm repeats the previous average over a gap', () => {
    expect(ewm([2, NaN, 4], 0.5)).toEqual([2, 2, 3]);
  });

  it('ema uses alpha = 2 / (span + 1)', () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it('wilder uses alpha = 1 / period', () => {
    const out = wilder([14, 0], 14);
    expect(out[0]).toBe(14);
    expect(out[1]).toBeCloseTo(13, 10);
  });

  it('rolling min/max need a full window', () => {
    const min = rollingMin([3, 1, 2, 5], 2);
    const max = rollingMax([3, 1, 2, 5], 2);
    expect(min[0]).toBeNaN();
    expect(min.slice(1)).toEqual([1, 1, 2]);
    expect(max.slice(1)).toEqual([3, 2, 5]);
  });

  it('sampleStd divides by n − 1', () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(sampleStd([1])).toBeNaN();
  });

  it('round works at 1 and 2 decimals', () => {
    expect(round(92.857142, 1)).toBe(92.9);
    expect(round(0.125, 2)).toBe(0.13);
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// 2. INDICATORS
// ═══════════════════════════════════════════════════════════════════════════════

describe('rsiSeries', () => {
  it('matches a hand-computed two-step series', () => {
    // gains [1, 0] losses [0, 1] → avg gain 13/14, avg loss 1/14 → rs 13
    const rsi = rsiSeries([1, 2, 1]);
    expect(rsi[0]).toBeNaN();
    expect(rsi[1]).toBe(100);
    expect(rsi[2]).toBeCloseTo(100 - 100 / 14, 10);
  });

  it('is 50 on a flat series', () => {
    expect(rsiSeries([10, 10, 10]).slice(1)).toEqual([50, 50]);
  });

  it('is 0 on a strictly falling series', () => {
    expect(rsiSeries([10, 9, 8]).slice(1)).toEqual([0, 0]);
  });
});

describe('stochasticRsi', () => {
  it('returns 0.5 for a flat RSI window', () => {
    expect(stochasticRsi(Array<number>(20).fill(70))).toBe(0.5);
  });

  it('returns 0.5 while the window is not full', () => {
    expect(stochasticRsi([30, 40, 50])).toBe(0.5);
  });

  it('places the latest RSI inside the 14-bar range', () => {
    const rsi = [...Array<number>(13).fill(40), 60, 50];
    // window = last 14 values: twelve 40s, 60, 50 → (50 − 40) / (60 − 40)
    expect(stochasticRsi(rsi)).toBe(0.5);
    expect(stochasticRsi([...Array<number>(13).fill(40), 60, 45])).toBe(0.25);
  });
});

describe('bollinger', () => {
  it('returns null without 20 closes', () => {
    expect(bollinger(linear(1, 19, 19))).toBeNull();
  });

  it('substitutes divisor 1 for a zero-width band', () => {
    const bands = bollinger(Array<number>(20).fill(100));
    expect(bands).not.toBeNull();
    expect(bands?.position).toBe(0);
    expect(bands?.label).toBe('Oversold');
  });

  it('labels a close at the top of a rising window Overbought', () => {
    expect(bollinger(linear(100, 119, 20))?.label).toBe('Overbought');
  });
});

describe('pivotLevels', () => {
  it('computes classic floor pivots', () => {
    expect(pivotLevels(110, 100, 105)).toEqual({ pivot: 105, r1: 110, s1: 100, r2: 115, s2: 95 });
  });
});

describe('swingRange', () => {
  it('only looks at the last 120 bars', () => {
    const high = [...Array<number>(10).fill(999), ...Array<number>(120).fill(50)];
    const low = [...Array<number>(10).fill(1), ...Array<number>(120).fill(40)];
    expect(swingRange(high, low)).toEqual({ high: 50, low: 40 });
  });

  it('uses every bar when fewer than 120 exist', () => {
    expect(swingRange([5, 9, 7], [3, 2, 4])).toEqual({ high: 9, low: 2 });
  });
});

describe('adxSeries', () => {
  it('is 0 when every bar is identical', () => {
    const flat = Array<number>(30).fill(100);
    const adx = adxSeries(flat, flat, flat);
    expect(adx[adx.length - 1]).toBe(0);
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// 3. SNAPSHOT SCENARIOS
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeTechnicalSnapshot — rising series', () => {
  const snap = computeTechnicalSnapshot(makeBars(linear(100, 130, 30)));

  it('is computed', () => {
    expect(snap.data_ok).toBe(true);
  });

  it('is bullish with positive MACD histogram and RSI above 55', () => {
    expect(snap.ema_cross).toBe('bullish');
    expect(snap.macd_histogram).toBeGreaterThan(0);
    expect(snap.rsi).toBeGreaterThan(55);
  });

  it('reports RSI 100 with no losses and neutral stochastic RSI', () => {
    expect(snap.rsi).toBe(100);
    expect(snap.stochastic_rsi).toBe(0.5);
  });

  it('reports maximal ADX on a one-directional trend', () => {
    expect(snap.adx).toBe(100);
  });

  it('derives pivots and swing range from the bars', () => {
    expect(snap.last_price).toBe(130);
    expect(snap.resistance1).toBe(131);
    expect(snap.support1).toBe(129);
    expect(snap.resistance2).toBe(132);
    expect(snap.support2).toBe(128);
    expect(snap.swing_high).toBe(131);
    expect(snap.swing_low).toBe(99);
  });

  it('labels the close Overbought and keeps a 7-close sparkline', () => {
    expect(snap.bollinger_label).toBe('Overbought');
    expect(snap.sparkline).toHaveLength(7);
    expect(snap.sparkline[6]).toBe(130);
  });

  it('scores −2 RSI, +2 MACD, +2 EMA, +1 ADX → BUY', () => {
    expect(snap.composite_score).toBe(3);
    expect(snap.overall_signal).toBe('BUY');
  });
});

describe('computeTechnicalSnapshot — falling series', () => {
  const snap = computeTechnicalSnapshot(makeBars(linear(130, 100, 30)));

  it('is bearish with RSI 0', () => {
    expect(snap.data_ok).toBe(true);
    expect(snap.ema_cross).toBe('bearish');
    expect(snap.macd_histogram).toBeLessThan(0);
    expect(snap.rsi).toBe(0);
    expect(snap.bollinger_label).toBe('Oversold');
  });
});

describe('computeTechnicalSnapshot — flat series', () => {
  const snap = computeTechnicalSnapshot(makeBars(Array<number>(30).fill(100), 0));

  it('resolves every zero-division guard', () => {
    expect(snap.data_ok).toBe(true);
    expect(snap.rsi).toBe(50);
    expect(snap.macd_histogram).toBe(0);
    expect(snap.ema_cross).toBe('bearish');
    expect(snap.bollinger_label).toBe('Oversold');
    expect(snap.adx).toBe(0);
    expect(snap.stochastic_rsi).toBe(0.5);
  });

  it('scores +1 for RSI below 55 only', () => {
    expect(snap.composite_score).toBe(1);
    expect(snap.overall_signal).toBe('NEUTRAL');
  });
});

describe('computeTechnicalSnapshot — insufficient data', () => {
  it('returns the neutral snapshot below 25 bars', () => {
    const snap = computeTechnicalSnapshot(makeBars(linear(100, 124, MIN_BARS - 1)));
    expect(snap).toEqual(NEUTRAL_SNAPSHOT);
    expect(snap.overall_signal).toBe('N/A');
    expect(snap.data_ok).toBe(false);
  });

  it('drops non-finite rows before counting', () => {
    const bars = makeBars(linear(100, 130, 30)).map((bar, i) =>
      i % 5 === 0 ? { ...bar, close: NaN } : bar,
    );
    // 6 of 30 rows dropped → 24 usable
    expect(computeTechnicalSnapshot(bars).data_ok).toBe(false);
  });

  it('accepts exactly 25 bars', () => {
    expect(computeTechnicalSnapshot(makeBars(linear(100, 124, 25))).data_ok).toBe(true);
  });

  it('returns the neutral snapshot for an empty series', () => {
    expect(computeTechnicalSnapshot([])).toBe(NEUTRAL_SNAPSHOT);
  });
});


// ═══════════════════════════════════════════════════════════════════════════════
// 4. NEUTRAL CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

describe('NEUTRAL_SNAPSHOT', () => {
  it('has RSI 50 and every other number 0', () => {
    const { rsi, ...rest } = NEUTRAL_SNAPSHOT;
    expect(rsi).toBe(50);
    for (const value of Object.values(rest)) {
      if (typeof value === 'number') expect(value).toBe(0);
    }
    expect(NEUTRAL_SNAPSHOT.ema_cross).toBe('unknown');
    expect(NEUTRAL_SNAPSHOT.data_ok).toBe(false);
  });
});

describe('bounded outputs', () => {
  it('keeps RSI in [0, 100] and stochastic RSI in [0, 1] on a zig-zag series', () => {
    const closes = Array.from({ length: 60 }, (_, i) => 100 + (i % 7) * 1.5 - (i % 3) * 2);
    const snap = computeTechnicalSnapshot(makeBars(closes));
    expect(snap.data_ok).toBe(true);
    expect(snap.rsi).toBeGreaterThanOrEqual(0);
    expect(snap.rsi).toBeLessThanOrEqual(100);
    expect(snap.stochastic_rsi).toBeGreaterThanOrEqual(0);
    expect(snap.stochastic_rsi).toBeLessThanOrEqual(1);
  });
});
