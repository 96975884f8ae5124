import { describe, it, expect } from 'vitest';
import { resolvePath, generateId, nowISO, getPackageRoot, domainOf, withConcurrency } from '../utils.js';
import { homedir } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import fs from 'node:fs';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    const result = resolvePath('~/test');
    expect(result).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    const result = resolvePath('~');
    expect(result).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    const result = resolvePath('./foo/bar');
    expect(path.isAbsolute(result)).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    const result = resolvePath('/absolute/path');
    expect(result).toBe('/absolute/path');
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates string of custom length', () => {
    expect(generateId(10)).toHaveLength(10);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('nowISO', () => {
  it('returns formatted date string', () => {
    expect(nowISO()).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });
});

describe('domainOf', () => {
  it('drops the www. prefix', () => {
    expect(domainOf('https://www.example.com/post')).toBe('example.com');
  });

  it('keeps other subdomains', () => {
    expect(domainOf('https://engineering.example.com/a')).toBe('engineering.example.com');
  });

  it('returns unknown for values that are not URLs', () => {
    expect(domainOf('')).toBe('unknown');
    expect(domainOf('/relative/path')).toBe('unknown');
  });
});

describe('getPackageRoot', () => {
  it('returns a directory containing package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});

describe('withConcurrency', () => {
  it('keeps results in input order', async () => {
    const results = await withConcurrency([30, 10, 20], 3, async (ms) => {
      await sleep(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await withConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });
    expect(peak).toBe(2);
  });

  it('runs one at a time when the limit is not a finite number', async () => {
    let active = 0;
    let peak = 0;
    const results = await withConcurrency([1, 2, 3], Number.NaN, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(2);
      active--;
      return n * 10;
    });
    expect(results).toEqual([10, 20, 30]);
    expect(peak).toBe(1);
  });

  it('rounds a fractional limit down', async () => {
    let peak = 0;
    let active = 0;
    await withConcurrency([1, 2, 3, 4], 2.7, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(2);
      active--;
    });
    expect(peak).toBe(2);
  });

  it('returns an empty array for no items', async () => {
    await expect(withConcurrency([], 3, async (x: number) => x)).resolves.toEqual([]);
  });
});
