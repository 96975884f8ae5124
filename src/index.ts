export type {
  ArticleRecord,
  DateTier,
  ExtractionResult,
  Extractor,
  FailureEvent,
  FailureType,
  ProviderSpec,
  RunSummary,
  SearchCriteria,
  TelemetrySink,
} from './source/adapter.js';
export { normalizeDate } from './source/date.js';
export {
  closeFetcher,
  createFetcherState,
  fetchPage,
  reserveSlot,
  type FetcherOptions,
  type FetcherState,
  type FetchPageResult,
} from './source/fetcher.js';
export { FetchHttpClient, type HttpClient, type HttpResponse } from './source/httpClient.js';
export {
  extractUniversal,
  normalizeLink,
  ExtractionConfigSchema,
  UNTITLED,
  type ExtractionConfig,
} from './source/universal.js';
export { extractRssItem } from './source/rss.js';
export { extractSubstackPost } from './source/substack.js';
export { findCandidates, parseDocument } from './source/dom.js';
export {
  resolveStrategy,
  parseStrategy,
  type ProviderStrategy,
  type StrategyHandler,
} from './source/strategy.js';
export { wrapExtractor, reportFailure, reportSummary, buildFailureEvent } from './source/telemetry.js';
export { collectArticles, collectStep, normalizeTitle, type CollectStep } from './source/collect.js';
export {
  discoverAll,
  processProvider,
  runDiscoveryCycle,
  type DiscoveryReport,
  type ProviderOutcome,
} from './engine/discover.js';
