import { InvalidArgumentError } from 'commander';

/**
 * commander argument parser for options that take a positive integer
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}
