import { describe, it, expect } from 'vitest';
import { normalizeDate, formatYmd } from '../date.js';

describe('normalizeDate', () => {
  it('reads ISO dates from the first ten characters', () => {
    expect(normalizeDate('2025-01-15')).toBe('2025-01-15');
    expect(normalizeDate('2025-12-21T10:30:00Z')).toBe('2025-12-21');
    expect(normalizeDate('  2025-03-10 ')).toBe('2025-03-10');
  });

  it('parses RFC-822 feed dates in their own offset', () => {
    expect(normalizeDate('Mon, 01 Jan 2024 00:00:00 GMT')).toBe('2024-01-01');
    expect(normalizeDate('Tue, 10 Jun 2025 23:30:00 -0700')).toBe('2025-06-10');
  });

  it('falls through to RFC-822 when a digit-leading string is not ISO', () => {
    expect(normalizeDate('01 Jan 24 12:00 +0000')).toBe('2024-01-01');
  });

  it('parses ctime-like strings', () => {
    expect(normalizeDate('Wed Jan 15 2025')).toBe('2025-01-15');
    expect(normalizeDate('Sun Dec 21 2025 10:30:00')).toBe('2025-12-21');
    expect(normalizeDate('Sat Nov 30 2024')).toBe('2024-11-30');
  });

  it('finds dates inside free text', () => {
    expect(normalizeDate('Published on January 15, 2025')).toBe('2025-01-15');
    expect(normalizeDate('Posted: 2025/12/21')).toBe('2025-12-21');
    expect(normalizeDate('Jan 10, 2025 10:30 PM')).toBe('2025-01-10');
    expect(normalizeDate('21st December 2024')).toBe('2024-12-21');
    expect(normalizeDate('2025.05.15')).toBe('2025-05-15');
    expect(normalizeDate('March 10, 2025')).toBe('2025-03-10');
  });

  it('returns empty string for unparseable input', () => {
    expect(normalizeDate('Invalid Date String')).toBe('');
    expect(normalizeDate('')).toBe('');
    expect(normalizeDate('   ')).toBe('');
    expect(normalizeDate(null)).toBe('');
    expect(normalizeDate(undefined)).toBe('');
  });

  it('always produces YYYY-MM-DD when it succeeds', () => {
    const inputs = ['2024-02-29', 'Wed, 05 Mar 2025 08:00:00 GMT', 'Published on July 4, 2024'];
    for (const input of inputs) {
      expect(normalizeDate(input)).toMatch(/^\d{4}-\d{2}-\d{2}$/);
    }
  });
});

describe('normalizeDate without a year', () => {
  // 19 October 2026, local time
  const reference = new Date(2026, 9, 19);

  it('places a day still ahead this year in the previous year', () => {
    expect(normalizeDate('Jan 15', reference)).toBe('2026-01-15');
    expect(normalizeDate('Dec 20', reference)).toBe('2025-12-20');
  });

  it('keeps the reference day itself', () => {
    expect(normalizeDate('Oct 19', reference)).toBe('2026-10-19');
  });

  it('never returns a day after the reference', () => {
    for (const input of ['Jan 15', 'Mar 3', 'Oct 20', 'Dec 31']) {
      const date = normalizeDate(input, reference);
      expect(date).toMatch(/^\d{4}-\d{2}-\d{2}$/);
      expect(date <= '2026-10-19').toBe(true);
    }
  });

  it('keeps an explicit year as written', () => {
    expect(normalizeDate('December 20, 2026', reference)).toBe('2026-12-20');
  });

  it('ignores relative expressions', () => {
    expect(normalizeDate('2 weeks ago', reference)).toBe('');
    expect(normalizeDate('3 days ago', reference)).toBe('');
  });
});

describe('formatYmd', () => {
  it('pads month and day', () => {
    expect(formatYmd(2025, 3, 7)).toBe('2025-03-07');
  });

  it('accepts leap days', () => {
    expect(formatYmd(2024, 2, 29)).toBe('2024-02-29');
  });

  it('rejects impossible dates', () => {
    expect(formatYmd(2025, 2, 30)).toBe('');
    expect(formatYmd(2025, 13, 1)).toBe('');
    expect(formatYmd(25, 1, 1)).toBe('');
  });
});
