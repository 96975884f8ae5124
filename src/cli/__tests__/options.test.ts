import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parsePositiveInt } from '../options.js';

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(parsePositiveInt(' 20 ')).toBe(20);
  });

  it('rejects text, fractions, zero and negatives', () => {
    for (const value of ['abc', '2.5', '0', '-1', '']) {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    }
  });
});
