import { JSDOM } from 'jsdom';
import type { SearchCriteria } from './adapter.js';

export function parseDocument(html: string, url?: string): Document {
  return new JSDOM(html, url ? { url } : undefined).window.document;
}

export function textOf(node: Node | null | undefined): string {
  return (node?.textContent ?? '').trim();
}

/**
 * Text nodes under `root`, each trimmed, joined by single spaces.
 */
export function joinedText(root: Node): string {
  const parts: string[] = [];
  const walk = (node: Node): void => {
    for (const child of Array.from(node.childNodes)) {
      if (child.nodeType === child.TEXT_NODE) {
        const text = (child.textContent ?? '').trim();
        if (text) parts.push(text);
      } else if (child.nodeType === child.ELEMENT_NODE) {
        walk(child);
      }
    }
  };
  walk(root);
  return parts.join(' ');
}

/**
 * True when any class token, or the whole class attribute, matches.
 */
export function classMatches(el: Element, pattern: RegExp): boolean {
  const attr = el.getAttribute('class');
  if (!attr) return false;
  for (const token of Array.from(el.classList)) {
    if (pattern.test(token)) return true;
  }
  return pattern.test(attr);
}

/**
 * First descendant of root (document order) accepted by the predicate.
 */
export function findFirst(root: ParentNode, predicate: (el: Element) => boolean): Element | null {
  for (const el of Array.from(root.querySelectorAll('*'))) {
    if (predicate(el)) return el;
  }
  return null;
}

/**
 * Elements of the document matching the criteria, in document order.
 * Invalid selectors throw (the caller reports them as a provider failure).
 */
export function findCandidates(root: ParentNode, criteria: SearchCriteria): Element[] {
  switch (criteria.kind) {
    case 'selector':
      return Array.from(root.querySelectorAll(criteria.selector));
    case 'selectors':
      return criteria.selectors.length === 0
        ? []
        : Array.from(root.querySelectorAll(criteria.selectors.join(', ')));
    case 'classPattern':
      return Array.from(root.querySelectorAll('[class]')).filter((el) =>
        classMatches(el, criteria.pattern),
      );
    default: {
      const unreachable: never = criteria;
      throw new Error(`Unknown search criteria: ${JSON.stringify(unreachable)}`);
    }
  }
}
