import type { ArticleRecord, ExtractionResult, Extractor } from './adapter.js';
import { toErrorInfo } from '../shared/errors.js';

export type CollectStep =
  | { kind: 'article'; record: ArticleRecord }
  | { kind: 'skip'; reason: 'known_title'; title: string }
  | { kind: 'skip'; reason: 'extractor_error'; error: string };

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export function buildTitleIndex(titles: Iterable<string>): ReadonlySet<string> {
  const index = new Set<string>();
  for (const title of titles) index.add(normalizeTitle(title));
  return index;
}

/**
 * Extract one fragment. Never throws: a failing extractor becomes a skip.
 */
export function collectStep(
  fragment: Element,
  extractor: Extractor,
  knownTitles: ReadonlySet<string>,
  sourceName: string,
): CollectStep {
  let result: ExtractionResult;
  try {
    result = extractor(fragment);
  } catch (err) {
    return { kind: 'skip', reason: 'extractor_error', error: toErrorInfo(err).message };
  }

  if (knownTitles.has(normalizeTitle(result.title))) {
    return { kind: 'skip', reason: 'known_title', title: result.title };
  }

  return {
    kind: 'article',
    record: Object.freeze({ ...result, source: sourceName }),
  };
}

/**
 * New articles among the fragments, in input order. The sequence is lazy and
 * can be consumed once; a fragment whose extractor throws is skipped.
 */
export function* collectArticles(
  fragments: Iterable<Element>,
  extractor: Extractor,
  existingTitles: Iterable<string>,
  sourceName: string,
): Generator<ArticleRecord, void, undefined> {
  const knownTitles = buildTitleIndex(existingTitles);
  for (const fragment of fragments) {
    const step = collectStep(fragment, extractor, knownTitles, sourceName);
    if (step.kind === 'article') yield step.record;
  }
}
