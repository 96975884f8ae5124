import type { Extractor, FailureEvent, FailureType, RunSummary, TelemetrySink } from './adapter.js';
import { logger } from '../shared/logger.js';
import { toErrorInfo } from '../shared/errors.js';
import { domainOf } from '../shared/utils.js';

export type TelemetryLogger = Pick<typeof logger, 'error' | 'warn'>;

export interface TelemetryOptions {
  sink?: TelemetrySink;
  log?: TelemetryLogger;
}

const SNIPPET_CHARS = 300;

export function buildFailureEvent(input: {
  source: string;
  errorType: FailureType;
  message: string;
  url: string;
  metadata?: Record<string, unknown>;
  traceback?: string;
}): FailureEvent {
  return {
    source: input.source.toLowerCase(),
    error_type: input.errorType,
    message: input.message,
    url: input.url,
    domain: domainOf(input.url),
    metadata: input.metadata ?? {},
    ...(input.traceback ? { traceback: input.traceback } : {}),
  };
}

/**
 * Hand an event to the sink. A failing sink is logged and otherwise ignored.
 */
export function reportFailure(
  sink: TelemetrySink | undefined,
  event: FailureEvent,
  log: TelemetryLogger = logger,
): void {
  if (!sink) return;
  try {
    sink.record(event);
  } catch (err) {
    log.warn(
      { source: event.source, error_type: event.error_type, error: toErrorInfo(err).message },
      'Failed to record failure event',
    );
  }
}

export function reportSummary(
  sink: TelemetrySink | undefined,
  summary: RunSummary,
  log: TelemetryLogger = logger,
): void {
  if (!sink?.recordSummary) return;
  try {
    sink.recordSummary(summary);
  } catch (err) {
    log.warn({ error: toErrorInfo(err).message }, 'Failed to record run summary');
  }
}

export function fragmentSnippet(fragment: Element): string {
  try {
    return fragment.outerHTML.slice(0, SNIPPET_CHARS).replace(/\r?\n/g, ' ');
  } catch {
    return '<unavailable>';
  }
}

/**
 * The article's own URL, when the fragment exposes one.
 */
export function fragmentUrl(fragment: Element): string {
  const href = fragment.querySelector('a')?.getAttribute('href');
  if (href) return href;
  const link = fragment.querySelector('link');
  if (link) {
    const text = (link.textContent ?? '').trim() || (link.nextSibling?.textContent ?? '').trim();
    if (text) return text;
  }
  return 'unknown';
}

/**
 * Wrap an extractor so a failing fragment is logged and reported with
 * context, then rethrown for the collector to skip.
 */
export function wrapExtractor(
  extractor: Extractor,
  siteName: string,
  options: TelemetryOptions = {},
): Extractor {
  const log = options.log ?? logger;

  return (fragment) => {
    try {
      return extractor(fragment);
    } catch (err) {
      const info = toErrorInfo(err);
      const snippet = fragmentSnippet(fragment);
      const articleUrl = fragmentUrl(fragment);

      log.error(
        { site: siteName, error: info.message, snippet, url: articleUrl, stack: info.stack },
        `Error extracting ${siteName} article`,
      );

      reportFailure(
        options.sink,
        buildFailureEvent({
          source: siteName,
          errorType: 'extraction_failed',
          message: `${info.type}: ${info.message}`,
          url: articleUrl,
          metadata: {
            extractor_function: extractor.name || 'anonymous',
            article_snippet: snippet,
          },
          traceback: info.stack,
        }),
        log,
      );

      throw err;
    }
  };
}
