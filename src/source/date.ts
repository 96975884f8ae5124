import * as chrono from 'chrono-node';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

// [Day,] DD Mon YYYY [HH:MM[:SS]] [zone]
const RFC_822 =
  /^(?:[A-Za-z]{3},?\s+)?(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4}|\d{2})(?:\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*(?:[+-]\d{4}|[A-Za-z]{1,5}))?)?$/;

const LEGACY = /^([A-Za-z]{3})\s+(\d{1,2})\s+(\d{4})$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * YYYY-MM-DD for a real calendar date, '' otherwise (2025-02-30 is rejected).
 */
export function formatYmd(year: number, month: number, day: number): string {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return '';
  if (year < 1000 || year > 9999) return '';
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return '';
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

function ymdOf(date: Date): string {
  return formatYmd(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

function fromIsoPrefix(s: string): string {
  if (!/^\d/.test(s)) return '';
  const m = ISO_DAY.exec(s.slice(0, 10));
  if (!m) return '';
  return formatYmd(Number(m[1]), Number(m[2]), Number(m[3]));
}

function fromRfc822(s: string): string {
  const m = RFC_822.exec(s);
  if (!m) return '';
  const month = monthIndex(m[2] ?? '');
  if (month === 0) return '';
  let year = Number(m[3]);
  if (year < 100) year += year > 68 ? 1900 : 2000;
  return formatYmd(year, month, Number(m[1]));
}

// "2 weeks ago", "3 days later", "in 5 days": relative to the reference, not a publish date
const RELATIVE = /\b(?:ago|later|from now|within)\b|^in\s/i;

function fromFuzzy(s: string, reference: Date): string {
  // strict mode drops casual words such as "today" but still reads relative offsets
  for (const result of chrono.strict.parse(s, reference)) {
    if (RELATIVE.test(result.text)) continue;
    const start = result.start;
    if (!start.isCertain('day') || !start.isCertain('month')) continue;
    const year = start.get('year');
    const month = start.get('month');
    const day = start.get('day');
    if (year === null || month === null || day === null) continue;

    let formatted = formatYmd(year, month, day);
    // a listing without a year never shows a future post
    if (formatted && !start.isCertain('year') && formatted > ymdOf(reference)) {
      formatted = formatYmd(year - 1, month, day);
    }
    if (formatted) return formatted;
  }
  return '';
}

function fromLegacy(s: string): string {
  // ctime-like "Mon Jan 15 2025 ...": the date sits at a fixed offset
  const m = LEGACY.exec(s.slice(4, 16).trim());
  if (!m) return '';
  const month = monthIndex(m[1] ?? '');
  if (month === 0) return '';
  return formatYmd(Number(m[3]), month, Number(m[2]));
}

const PARSERS: ReadonlyArray<(s: string, reference: Date) => string> = [
  fromIsoPrefix,
  fromRfc822,
  fromFuzzy,
  fromLegacy,
];

/**
 * Convert a date string in any of the formats seen on blogs and feeds to
 * YYYY-MM-DD. Returns '' when nothing parses; never throws.
 * `reference` anchors strings that carry no year ("Jan 15") to the latest
 * such day not after it.
 */
export function normalizeDate(raw: string | null | undefined, reference: Date = new Date()): string {
  if (!raw) return '';
  const s = raw.trim();
  if (!s) return '';

  for (const parse of PARSERS) {
    try {
      const date = parse(s, reference);
      if (date) return date;
    } catch {
      // next format
    }
  }
  return '';
}
