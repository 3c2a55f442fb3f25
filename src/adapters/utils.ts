/**
 * Shared utilities for log parsing
 */

/**
 * Parse a single timestamp value into an ISO string.
 * Handles epoch milliseconds and ISO strings. Returns undefined for invalid or missing values.
 */
export function parseTimestamp(value: unknown): string | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  if (value === '') return undefined;
  try {
    return new Date(value).toISOString();
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize tool input into an argument object.
 * Non-object inputs are wrapped so the raw value stays available.
 */
export function toToolArgs(input: unknown): Record<string, unknown> {
  if (isRecord(input)) return input;
  if (input === undefined || input === null) return {};
  return { value: input };
}

/**
 * Truncate text to a snippet, collapsing whitespace.
 */
export function toSnippet(text: string, maxLen: number = 200): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  const chars = Array.from(collapsed);
  if (chars.length <= maxLen) return collapsed;
  return chars.slice(0, maxLen - 1).join('') + '…';
}

/**
 * Length in Unicode code points (Hangul and emoji count as one character each).
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}
