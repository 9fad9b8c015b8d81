// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Market Data Model
// ═══════════════════════════════════════════════════════════════════════════════
//
// Records produced and consumed by the engine. Every record is created fresh
// per run and never mutated after construction:
//
//   DealRecord          → one disclosed bulk/block trade (Deal-Source Chain)
//   InstitutionalStock  → per-symbol FII/DII action (Institutional Classifier)
//   PriceBar            → one daily OHLCV bar (Price History Fetch)
//   TechnicalSnapshot   → indicator readings + composite signal (Indicator Engine)
//   EnrichedStock       → everything above, merged once for the reporting layer
//
// ═══════════════════════════════════════════════════════════════════════════════


// ─── ENUMS / UNIONS ──────────────────────────────────────────────────────────

export type DealCategory = 'bulk' | 'block';

export type CashAction = 'buy' | 'sell' | 'neutral';

export type EmaCross = 'bullish' | 'bearish' | 'unknown';

export type BollingerLabel = 'Overbought' | 'Mid' | 'Oversold' | 'N/A';

export type OverallSignal = 'STRONG BUY' | 'BUY' | 'NEUTRAL' | 'CAUTION' | 'SELL' | 'N/A';

export type InstitutionalFlowSignal =
  | 'BOTH BUY'
  | 'FII BUY'
  | 'DII BUY'
  | 'BOTH SELL'
  | 'BULK/BLOCK'
  | 'SELL';


// ─── DEALS ───────────────────────────────────────────────────────────────────

/** A single exchange-disclosed trade, normalized from any provider schema */
export interface DealRecord {
  readonly symbol: string;
  readonly company: string;
  /** Free-text client / party name as disclosed */
  readonly client: string;
  /** Raw buy/sell flag ("BUY", "SELL", "B", "S", ...) */
  readonly buy_sell: string;
  readonly quantity: number | null;
  readonly price: number | null;
  readonly trade_date: string | null;
  readonly category: DealCategory;
}

export interface InstitutionalStock {
  readonly symbol: string;
  readonly name: string;
  readonly fii_cash: CashAction;
  readonly dii_cash: CashAction;
}


// ─── PRICES ──────────────────────────────────────────────────────────────────

export interface PriceBar {
  /** ISO date (YYYY-MM-DD) */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}


// ─── TECHNICALS ──────────────────────────────────────────────────────────────

export interface TechnicalSnapshot {
  readonly rsi: number;
  readonly macd: number;
  readonly macd_histogram: number;
  readonly ema_cross: EmaCross;
  readonly bollinger_label: BollingerLabel;
  readonly adx: number;
  readonly stochastic_rsi: number;
  readonly resistance1: number;
  readonly support1: number;
  readonly resistance2: number;
  readonly support2: number;
  readonly swing_high: number;
  readonly swing_low: number;
  readonly last_price: number;
  /** Last 7 closes, oldest first */
  readonly sparkline: readonly number[];
  readonly composite_score: number;
  readonly overall_signal: OverallSignal;
  readonly data_ok: boolean;
}


// ─── RUN OUTPUT ──────────────────────────────────────────────────────────────

export interface MarketSummary {
  readonly nifty_price: number;
  readonly nifty_change_pct: number;
  readonly sensex_price: number;
  readonly sensex_change_pct: number;
  readonly data_ok: boolean;
}

export interface DisclosureWindow {
  /** ISO date of the first trading day in the window */
  readonly from_date: string;
  /** ISO date of the last completed trading day */
  readonly to_date: string;
  /** Trading days covered, inclusive of both ends */
  readonly trading_days: number;
  /** false when the 30-day lookback ran out before 5 trading-day steps */
  readonly complete: boolean;
  /** "DD-MM-YYYY → DD-MM-YYYY" */
  readonly label: string;
}

export interface EnrichedStock extends InstitutionalStock, TechnicalSnapshot {
  /** Price-provider ticker, e.g. "INFY.NS" */
  readonly ticker: string;
  readonly inst_signal: InstitutionalFlowSignal;
  readonly both_buy: boolean;
  readonly fii_only: boolean;
  readonly dii_only: boolean;
}

export interface InstitutionalDataset {
  readonly stocks: readonly EnrichedStock[];
  readonly market: MarketSummary;
  /** Label of the deal source that produced the stock list */
  readonly source: string;
  readonly window: DisclosureWindow | null;
  readonly generated_at: string;
}
