import { z } from 'zod';
import type { DateTier, ExtractionResult } from './adapter.js';
import { normalizeDate } from './date.js';
import { classMatches, findFirst, joinedText, textOf } from './dom.js';

export const ExtractionConfigSchema = z.object({
  container: z.string().min(1).optional(),
  title_selector: z.string().min(1).optional(),
  date_selector: z.string().min(1).optional(),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const UNTITLED = '<untitled>';

const HEADER_TAGS = ['h1', 'h2', 'h3', 'h4'] as const;
const TITLE_CLASS = /title|headline|link|entry/i;
const TAXONOMY_HREF = /category|tag|topic/i;
const NAVIGATION_HREF = /category|tag|topic|author/i;
const GENERIC_LINK_TEXT = new Set(['read more', 'continue reading']);

const DATE_ATTRIBUTES = ['pubdate', 'data-date', 'data-published', 'content'] as const;
const DATE_CLASSES = ['date', 'time', 'meta', 'published', 'post-date'] as const;

/**
 * Resolve a relative href against the provider's URL.
 * Absolute http(s) links are returned unchanged.
 */
export function normalizeLink(href: string | null | undefined, providerUrl?: string): string {
  if (!href) return '';
  if (!providerUrl || href.startsWith('http://') || href.startsWith('https://')) return href;
  try {
    return new URL(href, providerUrl).toString();
  } catch {
    return href;
  }
}

function anchorResult(
  anchor: Element,
  providerUrl: string | undefined,
): { title: string; link: string } {
  return { title: textOf(anchor), link: normalizeLink(anchor.getAttribute('href'), providerUrl) };
}

/**
 * Link-first title discovery.
 */
export function extractTitleAndLink(
  fragment: Element,
  config: ExtractionConfig = {},
  providerUrl?: string,
): { title: string; link: string } {
  if (config.title_selector) {
    const titleEl = fragment.querySelector(config.title_selector);
    if (titleEl) {
      const anchor = titleEl.tagName === 'A' ? titleEl : titleEl.querySelector('a');
      return {
        title: textOf(titleEl),
        link: anchor ? normalizeLink(anchor.getAttribute('href'), providerUrl) : '',
      };
    }
  }

  for (const tag of HEADER_TAGS) {
    for (const header of Array.from(fragment.querySelectorAll(tag))) {
      const anchor = header.querySelector('a');
      if (anchor && textOf(anchor).length > 5) {
        return anchorResult(anchor, providerUrl);
      }
    }
  }

  const anchors = Array.from(fragment.querySelectorAll('a'));

  for (const anchor of anchors) {
    if (!classMatches(anchor, TITLE_CLASS)) continue;
    const text = textOf(anchor);
    const href = anchor.getAttribute('href') ?? '';
    if (text.length > 10 && !text.includes('&') && !TAXONOMY_HREF.test(href)) {
      return anchorResult(anchor, providerUrl);
    }
  }

  for (const anchor of anchors) {
    const text = textOf(anchor);
    const href = anchor.getAttribute('href') ?? '';
    if (
      text.length > 15 &&
      !GENERIC_LINK_TEXT.has(text.toLowerCase()) &&
      !NAVIGATION_HREF.test(href) &&
      !text.includes('&')
    ) {
      return anchorResult(anchor, providerUrl);
    }
  }

  const first = anchors[0];
  if (first) return anchorResult(first, providerUrl);

  return { title: UNTITLED, link: '' };
}

function dateFrom(el: Element): string {
  return normalizeDate(el.getAttribute('datetime') || el.textContent);
}

/**
 * Five-tier date discovery. The tier tells which rule fired; 0 means none did.
 */
export function extractDate(
  fragment: Element,
  config: ExtractionConfig = {},
): { date: string; tier: DateTier } {
  if (config.date_selector) {
    const el = fragment.querySelector(config.date_selector);
    if (el) {
      const date = dateFrom(el);
      if (date) return { date, tier: 1 };
    }
  }

  const time = fragment.querySelector('time');
  if (time) {
    const date = dateFrom(time);
    if (date) return { date, tier: 2 };
  }

  for (const attr of DATE_ATTRIBUTES) {
    const el = fragment.querySelector(`[${attr}]`);
    if (el) {
      const date = normalizeDate(el.getAttribute(attr));
      if (date) return { date, tier: 3 };
    }
  }

  for (const cls of DATE_CLASSES) {
    const pattern = new RegExp(cls, 'i');
    const el = findFirst(fragment, (candidate) => classMatches(candidate, pattern));
    if (el) {
      const date = normalizeDate(el.textContent);
      if (date) return { date, tier: 4 };
    }
  }

  const date = normalizeDate(joinedText(fragment));
  if (date) return { date, tier: 5 };

  return { date: '', tier: 0 };
}

/**
 * Heuristic extractor for HTML listings. Explicit selectors in `config`
 * take precedence over every heuristic.
 */
export function extractUniversal(
  fragment: Element,
  config: ExtractionConfig = {},
  providerUrl?: string,
): ExtractionResult {
  const { title, link } = extractTitleAndLink(fragment, config, providerUrl);
  const { date, tier } = extractDate(fragment, config);
  return { date, title, link, tier };
}
