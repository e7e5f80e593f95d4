/**
 * Shared option parsers
 */

import { InvalidArgumentError } from 'commander';

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}
