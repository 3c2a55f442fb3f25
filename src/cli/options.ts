/**
 * Option parsing and diagnostics shared by the command handlers
 */

import type { ReadStats, ReadWarning } from '../adapters/types.js';

export const LOG_PREFIX = '[claude-tune]';

export class OptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionError';
  }
}

/**
 * Parse a non-negative integer option; undefined when the option was not given.
 */
export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new OptionError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number(trimmed);
}

export function printWarning(warning: ReadWarning): void {
  const where = warning.line !== undefined ? `${warning.file}:${warning.line}` : warning.file;
  console.error(`${LOG_PREFIX} ${where}: ${warning.reason}`);
}

/**
 * One summary line for skipped lines when per-line warnings were not shown.
 */
export function reportSkipped(stats: ReadStats, verbose: boolean): void {
  if (stats.skipped > 0 && !verbose) {
    console.error(`${LOG_PREFIX} Skipped ${stats.skipped} malformed line(s); run with --verbose for details`);
  }
}

/**
 * Print a failure and exit with status 1.
 */
export function fail(message: string, error?: unknown): never {
  const reason = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : '';
  console.error(`${LOG_PREFIX} ${message}${reason}`);
  if (error instanceof Error && error.cause instanceof Error) {
    console.error(`${LOG_PREFIX} Cause: ${error.cause.message}`);
  }
  process.exit(1);
}
