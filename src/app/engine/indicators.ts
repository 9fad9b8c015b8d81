// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Indicator Engine
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure functions: OHLCV bars in, TechnicalSnapshot out. No I/O.
//
// Smoothing:
//   ewm(α)       recursive average  avg_t = α·x_t + (1−α)·avg_{t−1}
//                seeded with the first finite value (leading NaN skipped)
//   ema(span)    α = 2 / (span + 1)
//   wilder(n)    α = 1 / n           (center-of-mass n − 1)
//
// Indicators:
//   RSI(14)           Wilder-smoothed gain / loss
//   MACD(12,26,9)     ema12 − ema26, signal = ema9(macd)
//   EMA cross         ema20 vs ema50
//   Bollinger(20,2σ)  sample std (n − 1)
//   ADX(14)           Wilder-smoothed TR / ±DM / DX
//   Stochastic RSI    14-bar min/max of the RSI series
//   Pivots            R1/S1/R2/S2 from the latest bar
//   Swing high/low    over min(120, n) bars
//
// Values are rounded only when written into the snapshot.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { BollingerLabel, EmaCross, PriceBar, TechnicalSnapshot } from '../types/market';
import { scoreSnapshot } from './signalEngine';


// ─── PARAMETERS ──────────────────────────────────────────────────────────────

export const MIN_BARS = 25;

export const INDICATOR_PARAMS = {
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  emaShort: 20,
  emaLong: 50,
  bollingerPeriod: 20,
  bollingerWidth: 2,
  bollingerUpper: 0.8,
  bollingerLower: 0.2,
  adxPeriod: 14,
  stochPeriod: 14,
  swingMaxBars: 120,
  sparklineBars: 7,
} as const;

/** Returned whenever a snapshot cannot be computed */
export const NEUTRAL_SNAPSHOT: TechnicalSnapshot = {
  rsi: 50,
  macd: 0,
  macd_histogram: 0,
  ema_cross: 'unknown',
  bollinger_label: 'N/A',
  adx: 0,
  stochastic_rsi: 0,
  resistance1: 0,
  support1: 0,
  resistance2: 0,
  support2: 0,
  swing_high: 0,
  swing_low: 0,
  last_price: 0,
  sparkline: [],
  composite_score: 0,
  overall_signal: 'N/A',
  data_ok: false,
};


// ═══════════════════════════════════════════════════════════════════════════════
// SERIES PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════════

export function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

/** x[i] − x[i−1]; the first element is NaN */
export function diff(values: readonly number[]): number[] {
  return values.map((v, i) => (i === 0 ? NaN : v - values[i - 1]));
}

/**
 * Recursive exponential average. Leading non-finite values stay NaN; a
 * non-finite value after the seed repeats the previous average.
 */
export function ewm(values: readonly number[], alpha: number): number[] {
  const out: number[] = [];
  let prev = NaN;
  for (const x of values) {
    if (Number.isFinite(x)) {
      prev = Number.isNaN(prev) ? x : alpha * x + (1 - alpha) * prev;
    }
    out.push(prev);
  }
  return out;
}

export function ema(values: readonly number[], span: number): number[] {
  return ewm(values, 2 / (span + 1));
}

export function wilder(values: readonly number[], period: number): number[] {
  return ewm(values, 1 / period);
}

function windowAt(values: readonly number[], end: number, size: number): number[] | null {
  if (size <= 0 || end + 1 < size) return null;
  const win = values.slice(end + 1 - size, end + 1);
  return win.every(Number.isFinite) ? win : null;
}

/** Rolling minimum; NaN until a full window of finite values is available */
export function rollingMin(values: readonly number[], size: number): number[] {
  return values.map((_, i) => {
    const win = windowAt(values, i, size);
    return win ? Math.min(...win) : NaN;
  });
}

export function rollingMax(values: readonly number[], size: number): number[] {
  return values.map((_, i) => {
    const win = windowAt(values, i, size);
    return win ? Math.max(...win) : NaN;
  });
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Bessel-corrected standard deviation */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  const ss = values.reduce((s, v) => s + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

function last(values: readonly number[]): number {
  return values.length > 0 ? values[values.length - 1] : NaN;
}


// ═══════════════════════════════════════════════════════════════════════════════
// INDICATORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * RSI series. Zero average loss gives 100, or 50 when the average gain is
 * zero as well (a flat series). The first element is NaN.
 */
export function rsiSeries(close: readonly number[], period: number = INDICATOR_PARAMS.rsiPeriod): number[] {
  const delta = diff(close);
  const avgGain = wilder(delta.map(d => (Number.isNaN(d) ? NaN : Math.max(d, 0))), period);
  const avgLoss = wilder(delta.map(d => (Number.isNaN(d) ? NaN : Math.max(-d, 0))), period);

  return avgGain.map((g, i) => {
    const l = avgLoss[i];
    if (Number.isNaN(g) || Number.isNaN(l)) return NaN;
    if (l === 0) return g === 0 ? 50 : 100;
    return 100 - 100 / (1 + g / l);
  });
}

export interface MacdResult {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macdSeries(
  close: readonly number[],
  fast: number = INDICATOR_PARAMS.macdFast,
  slow: number = INDICATOR_PARAMS.macdSlow,
  signalSpan: number = INDICATOR_PARAMS.macdSignal,
): MacdResult {
  const emaFast = ema(close, fast);
  const emaSlow = ema(close, slow);
  const macd = emaFast.map((f, i) => f - emaSlow[i]);
  const signal = ema(macd, signalSpan);
  return { macd, signal, histogram: macd.map((m, i) => m - signal[i]) };
}

export function emaCross(close: readonly number[]): EmaCross {
  const short = last(ema(close, INDICATOR_PARAMS.emaShort));
  const long = last(ema(close, INDICATOR_PARAMS.emaLong));
  if (!Number.isFinite(short) || !Number.isFinite(long)) return 'unknown';
  return short > long ? 'bullish' : 'bearish';
}

export interface BollingerResult {
  upper: number;
  middle: number;
  lower: number;
  /** Position of the latest close inside the band, 0 = lower, 1 = upper */
  position: number;
  label: BollingerLabel;
}

export function bollinger(close: readonly number[]): BollingerResult | null {
  const { bollingerPeriod, bollingerWidth, bollingerUpper, bollingerLower } = INDICATOR_PARAMS;
  const win = windowAt(close, close.length - 1, bollingerPeriod);
  if (!win) return null;

  const middle = mean(win);
  const sd = sampleStd(win);
  const upper = middle + bollingerWidth * sd;
  const lower = middle - bollingerWidth * sd;
  const position = (last(close) - lower) / (upper - lower || 1);

  const label: BollingerLabel =
    position > bollingerUpper ? 'Overbought' : position < bollingerLower ? 'Oversold' : 'Mid';
  return { upper, middle, lower, position, label };
}

/** Average Directional Index series */
export function adxSeries(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  period: number = INDICATOR_PARAMS.adxPeriod,
): number[] {
  const plusDm = diff(high).map(d => (Number.isNaN(d) ? NaN : Math.max(d, 0)));
  const minusDm = diff(low).map(d => (Number.isNaN(d) ? NaN : Math.max(-d, 0)));

  const tr = high.map((h, i) => {
    const range = h - low[i];
    if (i === 0) return range;
    const prevClose = close[i - 1];
    return Math.max(range, Math.abs(h - prevClose), Math.abs(low[i] - prevClose));
  });

  const atr = wilder(tr, period);
  const smPlus = wilder(plusDm, period);
  const smMinus = wilder(minusDm, period);

  const dx = atr.map((a, i) => {
    if (Number.isNaN(smPlus[i]) || Number.isNaN(smMinus[i])) return NaN;
    const plusDi = a === 0 ? 0 : (100 * smPlus[i]) / a;
    const minusDi = a === 0 ? 0 : (100 * smMinus[i]) / a;
    const sum = plusDi + minusDi;
    return sum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / sum;
  });

  return wilder(dx, period);
}

/**
 * Stochastic RSI at the latest bar, in [0, 1]. A flat RSI window (or one
 * that is not yet full) gives 0.5.
 */
export function stochasticRsi(rsi: readonly number[], period: number = INDICATOR_PARAMS.stochPeriod): number {
  const lo = last(rollingMin(rsi, period));
  const hi = last(rollingMax(rsi, period));
  const range = hi - lo;
  if (!Number.isFinite(range) || range === 0) return 0.5;
  return (last(rsi) - lo) / range;
}

export interface PivotLevels {
  pivot: number;
  r1: number;
  s1: number;
  r2: number;
  s2: number;
}

export function pivotLevels(high: number, low: number, close: number): PivotLevels {
  const pivot = (high + low + close) / 3;
  return {
    pivot,
    r1: 2 * pivot - low,
    s1: 2 * pivot - high,
    r2: pivot + (high - low),
    s2: pivot - (high - low),
  };
}

/** Highest high / lowest low over the last min(120, n) bars */
export function swingRange(high: readonly number[], low: readonly number[]): { high: number; low: number } {
  const n = Math.min(INDICATOR_PARAMS.swingMaxBars, high.length);
  return {
    high: Math.max(...high.slice(high.length - n)),
    low: Math.min(...low.slice(low.length - n)),
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════════════════════

function isUsableBar(bar: PriceBar): boolean {
  return [bar.open, bar.high, bar.low, bar.close, bar.volume].every(Number.isFinite);
}

/**
 * Compute the full technical snapshot for one security.
 * Never throws: insufficient or degenerate data yields NEUTRAL_SNAPSHOT.
 */
export function computeTechnicalSnapshot(bars: readonly PriceBar[]): TechnicalSnapshot {
  const usable = bars.filter(isUsableBar);
  if (usable.length < MIN_BARS) return NEUTRAL_SNAPSHOT;

  const close = usable.map(b => b.close);
  const high = usable.map(b => b.high);
  const low = usable.map(b => b.low);
  const lastClose = last(close);
  const lastHigh = last(high);
  const lastLow = last(low);

  const rsiS = rsiSeries(close);
  const macd = macdSeries(close);
  const bands = bollinger(close);
  const pivots = pivotLevels(lastHigh, lastLow, lastClose);
  const swing = swingRange(high, low);

  const rsi = round(last(rsiS), 1);
  const macdLine = round(last(macd.macd), 2);
  const macdHistogram = round(last(macd.histogram), 2);
  const adx = round(last(adxSeries(high, low, close)), 1);
  const stoch = round(stochasticRsi(rsiS), 2);
  const cross = emaCross(close);

  const numbers = [rsi, macdLine, macdHistogram, adx, stoch, pivots.r1, pivots.s1, swing.high, swing.low];
  if (!bands || cross === 'unknown' || !numbers.every(Number.isFinite)) return NEUTRAL_SNAPSHOT;

  const { score, overall_signal } = scoreSnapshot({
    rsi,
    macd_histogram: macdHistogram,
    ema_cross: cross,
    adx,
    stochastic_rsi: stoch,
  });

  return {
    rsi,
    macd: macdLine,
    macd_histogram: macdHistogram,
    ema_cross: cross,
    bollinger_label: bands.label,
    adx,
    stochastic_rsi: stoch,
    resistance1: round(pivots.r1, 2),
    support1: round(pivots.s1, 2),
    resistance2: round(pivots.r2, 2),
    support2: round(pivots.s2, 2),
    swing_high: round(swing.high, 2),
    swing_low: round(swing.low, 2),
    last_price: round(lastClose, 2),
    sparkline: close.slice(-INDICATOR_PARAMS.sparklineBars).map(c => round(c, 2)),
    composite_score: score,
    overall_signal,
    data_ok: true,
  };
}
