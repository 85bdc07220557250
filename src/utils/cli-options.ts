/**
 * Argument parsers for Commander.js options.
 */

import { InvalidArgumentError } from 'commander';
import { VIEW_NAMES } from '../config/i-config.js';
import type { ViewName } from '../types/monitoring.js';

/**
 * Commander parser for positive integer options.
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Commander parser for the repeatable --view option.
 */
export function collectView(value: string, previous: ViewName[] = []): ViewName[] {
  const view = VIEW_NAMES.find((name) => name === value);
  if (view === undefined) {
    throw new InvalidArgumentError(
      `Must be one of: ${VIEW_NAMES.join(', ')}.`
    );
  }
  return [...previous, view];
}
