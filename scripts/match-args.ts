/**
 * Argument helpers for scripts/run-match.ts.
 */

// Bad command line input; the script prints usage instead of a stack trace
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse a whole-number flag value such as `--turns 10`.
 */
export function parseIntegerOption(flag: string, raw: string, min = Number.MIN_SAFE_INTEGER): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new UsageError(`${flag} needs an integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (value < min) {
    throw new UsageError(`${flag} must be at least ${min}, got ${value}`);
  }
  return value;
}
