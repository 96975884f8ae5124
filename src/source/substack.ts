import type { ExtractionResult } from './adapter.js';
import { ExtractionError } from '../shared/errors.js';
import { textOf } from './dom.js';

const TITLE_SELECTOR = '[data-testid="post-preview-title"]';

/**
 * Substack archive cards: the title anchor carries a test id and the card
 * holds a <time datetime> in ISO form.
 */
export function extractSubstackPost(card: Element): ExtractionResult {
  const titleEl = card.querySelector(TITLE_SELECTOR);
  if (!titleEl) {
    throw new ExtractionError('Substack card has no post title', { selector: TITLE_SELECTOR });
  }

  const datetime = card.querySelector('time')?.getAttribute('datetime');
  if (!datetime) {
    throw new ExtractionError('Substack card has no <time datetime>', { selector: 'time' });
  }

  return {
    date: datetime.split('T')[0],
    title: textOf(titleEl),
    link: titleEl.getAttribute('href') ?? '',
    tier: 0,
  };
}
