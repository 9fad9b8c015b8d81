// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Signal Contract & Scoring Rules
// ═══════════════════════════════════════════════════════════════════════════════
//
//   Indicator readings → additive rule set → integer score → OverallSignal
//
// Rule parameters are plain data; signalEngine.ts reads them through
// CompositeScoringParams.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { EmaCross, OverallSignal } from './market';


// ═══════════════════════════════════════════════════════════════════════════════
// SCORING INPUT
// ═══════════════════════════════════════════════════════════════════════════════

/** The five readings the composite score depends on */
export interface ScoringInput {
  rsi: number;
  macd_histogram: number;
  ema_cross: EmaCross;
  adx: number;
  stochastic_rsi: number;
}

export interface ScoreResult {
  score: number;
  overall_signal: OverallSignal;
}


// ═══════════════════════════════════════════════════════════════════════════════
// RULE PARAMETERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface CompositeScoringParams {
  rsi: {
    /** rsi < deep → +deepPoints */
    deep: number;
    deepPoints: number;
    /** else rsi < soft → +softPoints */
    soft: number;
    softPoints: number;
    /** else rsi > overbought → overboughtPoints (negative) */
    overbought: number;
    overboughtPoints: number;
  };
  macdPositivePoints: number;
  emaBullishPoints: number;
  adx: { trending: number; points: number };
  stochRsi: { low: number; lowPoints: number; high: number; highPoints: number };
}

export const DEFAULT_COMPOSITE_SCORING: CompositeScoringParams = {
  rsi: { deep: 40, deepPoints: 2, soft: 55, softPoints: 1, overbought: 70, overboughtPoints: -2 },
  macdPositivePoints: 2,
  emaBullishPoints: 2,
  adx: { trending: 25, points: 1 },
  stochRsi: { low: 0.3, lowPoints: 1, high: 0.8, highPoints: -1 },
};

/** Lower bound (inclusive) of each label, evaluated top-down */
export const OVERALL_SIGNAL_THRESHOLDS: ReadonlyArray<{ min: number; label: OverallSignal }> = [
  { min: 5,  label: 'STRONG BUY' },
  { min: 3,  label: 'BUY' },
  { min: 0,  label: 'NEUTRAL' },
  { min: -2, label: 'CAUTION' },
];


// ═══════════════════════════════════════════════════════════════════════════════
// UTILITY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Map an integer score to its label. Anything below the last threshold is SELL. */
export function scoreToOverallSignal(score: number): OverallSignal {
  for (const { min, label } of OVERALL_SIGNAL_THRESHOLDS) {
    if (score >= min) return label;
  }
  return 'SELL';
}

const SIGNAL_RANK: Record<Exclude<OverallSignal, 'N/A'>, number> = {
  'SELL':       0,
  'CAUTION':    1,
  'NEUTRAL':    2,
  'BUY':        3,
  'STRONG BUY': 4,
};

/** Ordinal rank: SELL < CAUTION < NEUTRAL < BUY < STRONG BUY. N/A ranks -1. */
export function signalRank(signal: OverallSignal): number {
  return signal === 'N/A' ? -1 : SIGNAL_RANK[signal];
}
