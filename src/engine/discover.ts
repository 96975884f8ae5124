import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { ArticleRecord, ProviderSpec, TelemetrySink } from '../source/adapter.js';
import { closeFetcher, createFetcherState, fetchPage, type FetcherState } from '../source/fetcher.js';
import { resolveStrategy } from '../source/strategy.js';
import { findCandidates } from '../source/dom.js';
import { buildTitleIndex, collectArticles } from '../source/collect.js';
import { buildFailureEvent, reportFailure, reportSummary } from '../source/telemetry.js';
import {
  insertArticles,
  listArticleTitles,
  SqliteTelemetrySink,
} from '../source/articleDb.js';
import type { HttpClient } from '../source/httpClient.js';
import { logger } from '../shared/logger.js';
import { toErrorInfo } from '../shared/errors.js';
import { withConcurrency } from '../shared/utils.js';

export type DiscoveryLogger = Pick<typeof logger, 'info' | 'warn' | 'error'>;

export type ProviderStatus = 'ok' | 'unknown_strategy' | 'fetch_failed' | 'provider_failed';

export interface ProviderOutcome {
  provider: string;
  status: ProviderStatus;
  articles: ArticleRecord[];
  error?: string;
}

export interface DiscoveryOptions {
  /** Normalized (trim + lowercase) titles already persisted. */
  knownTitles: ReadonlySet<string>;
  sink?: TelemetrySink;
  concurrency?: number;
  log?: DiscoveryLogger;
}

export interface DiscoveryReport {
  articles: ArticleRecord[];
  outcomes: ProviderOutcome[];
  providersProcessed: number;
  providersFailed: number;
  durationMs: number;
}

export const DEFAULT_PROVIDER_CONCURRENCY = 3;

/**
 * Fetch one provider's page and collect its new articles. Never throws:
 * every failure becomes an outcome status and a telemetry event.
 */
export async function processProvider(
  state: FetcherState,
  provider: ProviderSpec,
  options: DiscoveryOptions,
): Promise<ProviderOutcome> {
  const log = options.log ?? logger;
  const { name, url } = provider;

  try {
    const handler = resolveStrategy(name, provider.strategy, provider.element, url, {
      sink: options.sink,
      log,
    });
    if (!handler) {
      log.info({ provider: name, strategy: provider.strategy }, 'No extractor for provider');
      return { provider: name, status: 'unknown_strategy', articles: [] };
    }

    const page = await fetchPage(state, url);
    if (!page.document) {
      log.warn({ provider: name, url, reason: page.reason }, 'Failed to fetch page');
      reportFailure(
        options.sink,
        buildFailureEvent({
          source: name,
          errorType: 'fetch_failed',
          message: `Failed to fetch page for ${name}`,
          url,
          metadata: { http_status: page.status ?? null, reason: page.reason ?? null },
        }),
        log,
      );
      return { provider: name, status: 'fetch_failed', articles: [], error: page.reason };
    }

    const fragments = findCandidates(page.document, handler.criteria);
    const articles = Array.from(
      collectArticles(fragments, handler.extractor, options.knownTitles, name),
    );

    log.info(
      { provider: name, candidates: fragments.length, articles: articles.length },
      'Provider processed',
    );
    return { provider: name, status: 'ok', articles };
  } catch (err) {
    const info = toErrorInfo(err);
    log.error({ provider: name, error: info.message, stack: info.stack }, 'Provider failed');
    reportFailure(
      options.sink,
      buildFailureEvent({
        source: name,
        errorType: 'provider_failed',
        message: `${info.type}: ${info.message}`,
        url,
        metadata: { strategy: provider.strategy ?? 'html', element: provider.element ?? null },
        traceback: info.stack,
      }),
      log,
    );
    return { provider: name, status: 'provider_failed', articles: [], error: info.message };
  }
}

/**
 * Process providers concurrently behind an admission gate, sharing one fetcher.
 * Article order across providers is not meaningful.
 */
export async function discoverAll(
  state: FetcherState,
  providers: readonly ProviderSpec[],
  options: DiscoveryOptions,
): Promise<DiscoveryReport> {
  const startTime = Date.now();
  const concurrency = options.concurrency ?? DEFAULT_PROVIDER_CONCURRENCY;

  const outcomes = await withConcurrency(providers, concurrency, (provider) =>
    processProvider(state, provider, options),
  );

  const failed = outcomes.filter((o) => o.status === 'fetch_failed' || o.status === 'provider_failed');
  return {
    articles: outcomes.flatMap((o) => o.articles),
    outcomes,
    providersProcessed: outcomes.length - failed.length,
    providersFailed: failed.length,
    durationMs: Date.now() - startTime,
  };
}

export interface CycleDeps {
  db: Database.Database;
  providers: readonly ProviderSpec[];
  dryRun?: boolean;
  concurrency?: number;
  client?: HttpClient;
  log?: DiscoveryLogger;
}

export interface CycleReport extends DiscoveryReport {
  articlesWritten: number;
}

/**
 * One scheduled cycle: read known titles, discover, persist new articles,
 * then record a run summary. The fetcher lives for exactly this cycle.
 * A dry run writes neither articles nor events.
 */
export async function runDiscoveryCycle(config: Config, deps: CycleDeps): Promise<CycleReport> {
  const log = deps.log ?? logger;
  const state = createFetcherState({
    minIntervalMs: config.fetch.min_interval_ms,
    timeoutMs: config.fetch.timeout_ms,
    userAgent: config.fetch.user_agent,
    client: deps.client,
  });

  const sink =
    config.telemetry.enabled && !deps.dryRun ? new SqliteTelemetrySink(deps.db) : undefined;

  let report: DiscoveryReport;
  try {
    report = await discoverAll(state, deps.providers, {
      knownTitles: buildTitleIndex(listArticleTitles(deps.db)),
      sink,
      concurrency: deps.concurrency ?? config.discovery.concurrency,
      log,
    });
  } finally {
    await closeFetcher(state);
  }

  const articlesWritten = deps.dryRun ? 0 : insertArticles(deps.db, report.articles);

  reportSummary(
    sink,
    {
      providers_total: deps.providers.length,
      providers_processed: report.providersProcessed,
      providers_failed: report.providersFailed,
      articles_found: report.articles.length,
      articles_written: articlesWritten,
      duration_ms: report.durationMs,
    },
    log,
  );

  if (report.articles.length === 0) {
    log.info({ durationMs: report.durationMs }, 'No new articles found');
  } else {
    log.info(
      { found: report.articles.length, written: articlesWritten, durationMs: report.durationMs },
      'Discovery cycle complete',
    );
  }

  return { ...report, articlesWritten };
}
