import type { Extractor, SearchCriteria } from './adapter.js';
import { ExtractionConfigSchema, extractUniversal, type ExtractionConfig } from './universal.js';
import { extractRssItem } from './rss.js';
import { extractSubstackPost } from './substack.js';
import { wrapExtractor, type TelemetryOptions } from './telemetry.js';
import { logger } from '../shared/logger.js';

export const STRATEGY_HTML = 'html';
export const STRATEGY_RSS = 'rss';
export const STRATEGY_SUBSTACK = 'substack';

/** Listing container used when an HTML provider names none. */
export const DEFAULT_CONTAINER = 'article';

export type ProviderStrategy =
  | { kind: 'html'; config: ExtractionConfig; selector: string; providerUrl?: string }
  | { kind: 'rss'; selector?: string }
  | { kind: 'substack'; classPattern: RegExp };

export interface StrategyHandler {
  strategy: ProviderStrategy;
  criteria: SearchCriteria;
  extractor: Extractor;
}

type Descriptor =
  | { kind: 'none' }
  | { kind: 'plain'; selector: string }
  | { kind: 'config'; config: ExtractionConfig }
  | { kind: 'invalid'; reason: string };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * A descriptor is JSON when it looks like an object or the strategy is html;
 * anything that does not parse to an object is a plain selector.
 */
export function parseDescriptor(descriptor: string | undefined, strategy: string): Descriptor {
  const trimmed = descriptor?.trim();
  if (!trimmed) return { kind: 'none' };

  if (trimmed.startsWith('{') || strategy === STRATEGY_HTML) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      return { kind: 'plain', selector: trimmed };
    }
    if (!isJsonObject(parsed)) return { kind: 'plain', selector: trimmed };

    const config = ExtractionConfigSchema.safeParse(parsed);
    if (!config.success) {
      return {
        kind: 'invalid',
        reason: JSON.stringify(config.error.flatten().fieldErrors),
      };
    }
    return { kind: 'config', config: config.data };
  }

  return { kind: 'plain', selector: trimmed };
}

function selectorOf(descriptor: Descriptor): string | undefined {
  if (descriptor.kind === 'plain') return descriptor.selector;
  if (descriptor.kind === 'config') return descriptor.config.container;
  return undefined;
}

/**
 * Turn a provider's declared strategy and element descriptor into a strategy
 * value. Returns null when no extractor can be derived.
 */
export function parseStrategy(
  strategyName: string | undefined,
  descriptor: string | undefined,
  providerUrl?: string,
): ProviderStrategy | null {
  const strategy = (strategyName?.trim() || STRATEGY_HTML).toLowerCase();
  const parsed = parseDescriptor(descriptor, strategy);
  if (parsed.kind === 'invalid') {
    logger.warn({ strategy, reason: parsed.reason }, 'Invalid extraction config');
    return null;
  }

  switch (strategy) {
    case STRATEGY_HTML: {
      const config = parsed.kind === 'config' ? parsed.config : {};
      const selector = selectorOf(parsed) ?? DEFAULT_CONTAINER;
      return { kind: 'html', config, selector, providerUrl };
    }
    case STRATEGY_RSS:
      return { kind: 'rss', selector: selectorOf(parsed) };
    case STRATEGY_SUBSTACK: {
      const source = selectorOf(parsed);
      if (!source) return null;
      try {
        return { kind: 'substack', classPattern: new RegExp(source) };
      } catch (err) {
        logger.warn(
          { pattern: source, error: err instanceof Error ? err.message : String(err) },
          'Invalid substack class pattern',
        );
        return null;
      }
    }
    default:
      return null;
  }
}

export function criteriaFor(strategy: ProviderStrategy): SearchCriteria {
  switch (strategy.kind) {
    case 'html':
      return { kind: 'selector', selector: strategy.selector };
    case 'rss':
      return {
        kind: 'selectors',
        selectors:
          strategy.selector && strategy.selector !== 'item' ? [strategy.selector, 'item'] : ['item'],
      };
    case 'substack':
      return { kind: 'classPattern', pattern: strategy.classPattern };
    default: {
      const unreachable: never = strategy;
      throw new Error(`Unhandled strategy: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function extractorFor(strategy: ProviderStrategy): Extractor {
  switch (strategy.kind) {
    case 'html': {
      const { config, providerUrl } = strategy;
      const extractUniversalArticle: Extractor = (fragment) =>
        extractUniversal(fragment, config, providerUrl);
      return extractUniversalArticle;
    }
    case 'rss':
      return extractRssItem;
    case 'substack':
      return extractSubstackPost;
    default: {
      const unreachable: never = strategy;
      throw new Error(`Unhandled strategy: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Build the search criteria and the wrapped extractor for one provider.
 */
export function resolveStrategy(
  providerName: string,
  strategyName: string | undefined,
  descriptor: string | undefined,
  providerUrl?: string,
  options: TelemetryOptions = {},
): StrategyHandler | null {
  const strategy = parseStrategy(strategyName, descriptor, providerUrl);
  if (!strategy) return null;

  return {
    strategy,
    criteria: criteriaFor(strategy),
    extractor: wrapExtractor(extractorFor(strategy), providerName, options),
  };
}
