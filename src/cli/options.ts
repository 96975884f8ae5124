import { InvalidArgumentError } from 'commander';

/**
 * commander argument parser for counts such as --limit and --concurrency.
 */
export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const parsed = Number(trimmed);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
