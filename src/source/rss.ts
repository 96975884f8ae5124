import type { ExtractionResult } from './adapter.js';
import { normalizeDate } from './date.js';
import { ExtractionError } from '../shared/errors.js';

/**
 * Drop CDATA markers and stray brackets the HTML parser leaves around feed text.
 */
export function cleanFeedText(text: string | null | undefined): string {
  if (!text) return '';
  const stripped = text.replace(/<!\[CDATA\[/g, '').replace(/\]\]>/g, '').replace(/\]\]/g, '');
  return stripped.trim().replace(/^[ >[\]]+|[ >[\]]+$/g, '').trim();
}

/**
 * RSS 2.0 <item> extractor. The document is parsed as HTML, where <link> is a
 * void element: its URL ends up in the following text node.
 */
export function extractRssItem(item: Element): ExtractionResult {
  const titleEl = item.querySelector('title');
  if (!titleEl) {
    throw new ExtractionError('RSS item has no <title>', { tag: item.tagName.toLowerCase() });
  }
  const title = cleanFeedText(titleEl.textContent);

  let link = '';
  const linkEl = item.querySelector('link');
  if (linkEl) {
    link = cleanFeedText(linkEl.textContent);
    if (!link && linkEl.nextSibling) {
      link = cleanFeedText(linkEl.nextSibling.textContent);
    }
  }

  const dateEl = item.querySelector('pubdate');
  const date = normalizeDate(dateEl?.textContent);

  return { date, title, link, tier: 0 };
}
