/**
 * Shared formatting utilities for consistent display across the CLI
 */

import { Marked, type MarkedExtension } from 'marked';
import { markedTerminal } from 'marked-terminal';

/**
 * Format a ratio (0..1) as a percentage with one decimal, e.g. "37.5%"
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Format a count with its unit, e.g. "1 session", "3 sessions"
 */
export function formatCount(count: number, unit: string): string {
  return `${count} ${unit}${count !== 1 ? 's' : ''}`;
}

/**
 * Format an ISO timestamp as "YYYY-MM-DD HH:mm" (UTC), or '' if absent
 */
export function formatTimestamp(isoDate: string | undefined): string {
  if (!isoDate) return '';
  const date = new Date(isoDate);
  if (Number.isNaN(date.getTime())) return '';
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Truncate a path from the left, preserving the end with an ellipsis prefix
 */
export function truncatePath(path: string, maxLen: number): string {
  if (path.length <= maxLen) return path;
  return '…' + path.slice(-(maxLen - 1));
}

/**
 * Render markdown content to a terminal-formatted string.
 */
export function renderMarkdownContent(content: string, width: number = process.stdout.columns ?? 80): string {
  const renderer = new Marked(
    markedTerminal({
      reflowText: true,
      width: Math.max(40, width - 4),
      tab: 2,
    }) as MarkedExtension,
  );

  try {
    return renderer.parse(content) as string;
  } catch {
    return content;
  }
}
