// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Composite Signal Engine
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure, deterministic functions. No I/O, no global state.
//
//  1. scoreSnapshot            five indicator readings → integer score → label
//  2. classifyInstitutionalFlow FII/DII actions → flow bucket
//  3. buildEnrichedStock        one immutable record per security
//
// Every rule of the composite score is evaluated; none short-circuits.
//
//   RSI        +2 (<40)  | +1 (<55)  | −2 (>70) | 0
//   MACD hist  +2 (>0)
//   EMA cross  +2 (bullish)
//   ADX        +1 (>25)
//   Stoch RSI  +1 (<0.3) | −1 (>0.8) | 0
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  CashAction,
  EnrichedStock,
  InstitutionalFlowSignal,
  InstitutionalStock,
  TechnicalSnapshot,
} from '../types/market';
import type { CompositeScoringParams, ScoreResult, ScoringInput } from '../types/signals';
import { DEFAULT_COMPOSITE_SCORING, scoreToOverallSignal } from '../types/signals';


// ═══════════════════════════════════════════════════════════════════════════════
// 1. COMPOSITE SCORE
// ═══════════════════════════════════════════════════════════════════════════════

export function scoreRsi(rsi: number, params: CompositeScoringParams = DEFAULT_COMPOSITE_SCORING): number {
  const p = params.rsi;
  if (rsi < p.deep) return p.deepPoints;
  if (rsi < p.soft) return p.softPoints;
  if (rsi > p.overbought) return p.overboughtPoints;
  return 0;
}

export function scoreStochRsi(stoch: number, params: CompositeScoringParams = DEFAULT_COMPOSITE_SCORING): number {
  const p = params.stochRsi;
  if (stoch < p.low) return p.lowPoints;
  if (stoch > p.high) return p.highPoints;
  return 0;
}

export function scoreSnapshot(
  input: ScoringInput,
  params: CompositeScoringParams = DEFAULT_COMPOSITE_SCORING,
): ScoreResult {
  let score = 0;
  score += scoreRsi(input.rsi, params);
  score += input.macd_histogram > 0 ? params.macdPositivePoints : 0;
  score += input.ema_cross === 'bullish' ? params.emaBullishPoints : 0;
  score += input.adx > params.adx.trending ? params.adx.points : 0;
  score += scoreStochRsi(input.stochastic_rsi, params);

  return { score, overall_signal: scoreToOverallSignal(score) };
}


// ═══════════════════════════════════════════════════════════════════════════════
// 2. INSTITUTIONAL FLOW
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A buy on one side is reported as that side's BUY whatever the other side
 * did. The remaining sell/neutral mixes fall through to SELL.
 */
export function classifyInstitutionalFlow(fii: CashAction, dii: CashAction): InstitutionalFlowSignal {
  if (fii === 'buy' && dii === 'buy') return 'BOTH BUY';
  if (fii === 'buy') return 'FII BUY';
  if (dii === 'buy') return 'DII BUY';
  if (fii === 'sell' && dii === 'sell') return 'BOTH SELL';
  if (fii === 'neutral' && dii === 'neutral') return 'BULK/BLOCK';
  return 'SELL';
}


// ═══════════════════════════════════════════════════════════════════════════════
// 3. ENRICHED RECORD
// ═══════════════════════════════════════════════════════════════════════════════

export function buildEnrichedStock(
  stock: InstitutionalStock,
  snapshot: TechnicalSnapshot,
  ticker: string,
): EnrichedStock {
  const inst_signal = classifyInstitutionalFlow(stock.fii_cash, stock.dii_cash);
  return {
    ...snapshot,
    sparkline: [...snapshot.sparkline],
    symbol: stock.symbol,
    name: stock.name,
    fii_cash: stock.fii_cash,
    dii_cash: stock.dii_cash,
    ticker,
    inst_signal,
    both_buy: inst_signal === 'BOTH BUY',
    fii_only: inst_signal === 'FII BUY',
    dii_only: inst_signal === 'DII BUY',
  };
}
