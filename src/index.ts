// Public surface of the institutional-flow engine.

export type * from './app/types/market';
export type * from './app/types/signals';
export { DEFAULT_COMPOSITE_SCORING, OVERALL_SIGNAL_THRESHOLDS, scoreToOverallSignal, signalRank } from './app/types/signals';

export type { EngineConfig, CutoffTime } from './app/engine/config';
export { ConfigError, loadConfig, loadConfigFromEnv, parseCutoff } from './app/engine/config';
export type { Logger, LogLevel } from './app/engine/logger';
export { createLogger, silentLogger } from './app/engine/logger';

export { TradingCalendar, formatExchangeDate } from './app/engine/tradingCalendar';
export type { DealSourcePayload, IDealSource, IPriceProvider, ProviderRegistry, ProviderResult } from './app/engine/providers';
export { StaticFallbackProvider } from './app/engine/providers';
export { MunafaSutraProvider, NseDealsProvider, YahooChartPriceProvider, createLiveRegistry } from './app/engine/liveProviders';
export type { DealChainResult } from './app/engine/dealSourceChain';
export { DealSourceChain, resolveInstitutionalStocks } from './app/engine/dealSourceChain';
export { normalizeDealHeaders, resolveDealColumns } from './app/engine/columnMapping';
export { buildKeywordMatcher, classifyDeals, matchInstitution, sortDealsByTradeDate } from './app/engine/classifier';
export { NEUTRAL_SNAPSHOT, computeTechnicalSnapshot } from './app/engine/indicators';
export { buildEnrichedStock, classifyInstitutionalFlow, scoreSnapshot } from './app/engine/signalEngine';
export { buildDataset, fetchMarketSummary, runInstitutionalFlow } from './app/engine/dataService';
export { holidaySet, loadFallbackStocks, loadHolidayTable, loadInstitutionKeywords } from './app/data/referenceData';
