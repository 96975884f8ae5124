import { describe, it, expect, vi } from 'vitest';
import { parseDocument } from '../dom.js';
import { buildTitleIndex, collectArticles, collectStep, normalizeTitle } from '../collect.js';
import type { ExtractionResult, Extractor } from '../adapter.js';

function items(...texts: string[]): Element[] {
  const doc = parseDocument(`<ul>${texts.map((t) => `<li>${t}</li>`).join('')}</ul>`);
  return Array.from(doc.querySelectorAll('li'));
}

const byText: Extractor = (fragment) => {
  const title = fragment.textContent ?? '';
  if (title === 'bad') throw new Error('cannot extract');
  return { date: '2025-01-01', title, link: `https://example.com/${title}`, tier: 2 };
};

describe('normalizeTitle', () => {
  it('trims and lowercases', () => {
    expect(normalizeTitle('  Existing Title ')).toBe('existing title');
  });
});

describe('collectStep', () => {
  const known = buildTitleIndex(['Existing Title']);

  it('returns a frozen record for a new title', () => {
    const [li] = items('fresh');
    const step = collectStep(li, byText, known, 'example');
    if (step.kind !== 'article') throw new Error('expected an article');
    expect(step.record).toEqual({
      date: '2025-01-01',
      title: 'fresh',
      link: 'https://example.com/fresh',
      tier: 2,
      source: 'example',
    });
    expect(Object.isFrozen(step.record)).toBe(true);
  });

  it('skips titles that are already known', () => {
    const [li] = items('  existing title  ');
    expect(collectStep(li, byText, known, 'example')).toEqual({
      kind: 'skip',
      reason: 'known_title',
      title: '  existing title  ',
    });
  });

  it('turns extractor errors into skips', () => {
    const [li] = items('bad');
    expect(collectStep(li, byText, known, 'example')).toEqual({
      kind: 'skip',
      reason: 'extractor_error',
      error: 'cannot extract',
    });
  });
});

describe('collectArticles', () => {
  it('yields N-1 records when one fragment fails', () => {
    const records = Array.from(collectArticles(items('one', 'bad', 'three'), byText, [], 'example'));
    expect(records.map((r) => r.title)).toEqual(['one', 'three']);
  });

  it('ignores case and surrounding whitespace when deduplicating', () => {
    const records = Array.from(collectArticles(items('  existing title  '), byText, ['Existing Title'], 'example'));
    expect(records).toEqual([]);
  });

  it('extracts lazily', () => {
    const extractor = vi.fn<(fragment: Element) => ExtractionResult>(byText);
    const gen = collectArticles(items('one', 'two'), extractor, [], 'example');
    expect(extractor).not.toHaveBeenCalled();

    gen.next();
    expect(extractor).toHaveBeenCalledTimes(1);
  });

  it('can be consumed only once', () => {
    const gen = collectArticles(items('one', 'two'), byText, [], 'example');
    expect(Array.from(gen)).toHaveLength(2);
    expect(Array.from(gen)).toHaveLength(0);
  });

  it('tags each record with its source', () => {
    const [record] = Array.from(collectArticles(items('one'), byText, [], 'github'));
    expect(record.source).toBe('github');
  });
});
