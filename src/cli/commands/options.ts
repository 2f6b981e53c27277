/**
 * Shared option parsers for commander.
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError } from 'commander';
import { DEFAULT_MAX_PAGES } from '../../places/search-client.js';

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Parse a result page cap, which the provider limits to 1-3.
 */
export function parsePageCap(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > DEFAULT_MAX_PAGES) {
    throw new InvalidArgumentError(`Must be an integer from 1 to ${DEFAULT_MAX_PAGES}.`);
  }
  return parsed;
}

/**
 * Parse a positive number option value.
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Collect a repeatable option into an array.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
