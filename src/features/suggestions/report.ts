/**
 * Markdown report for `learn`
 */

import type { ReadStats } from '../../adapters/types.js';
import type { Pattern } from '../../analysis/types.js';
import { formatCount } from '../../utils/format.js';
import type { Suggestion } from './types.js';

export interface SuggestionReportInput {
  suggestions: readonly Suggestion[];
  patterns: readonly Pattern[];
  readStats: ReadStats;
  sessions: number;
  /** CLAUDE.md the suggestions were compared against */
  documentPath?: string;
}

function readSummary(stats: ReadStats, sessions: number): string {
  const parts = [`Analyzed ${formatCount(sessions, 'session')} (${formatCount(stats.turns, 'turn')})`];
  if (stats.skipped > 0) {
    parts.push(`${formatCount(stats.skipped, 'malformed line')} skipped`);
  }
  return parts.join(', ');
}

function formatSuggestion(suggestion: Suggestion, index: number): string[] {
  const status = suggestion.alreadyPresent ? ' (already in CLAUDE.md)' : '';
  const lines = [
    `### ${index + 1}. [${suggestion.priority.toUpperCase()}] ${suggestion.rule}${status}`,
    '',
    `- Section: ${suggestion.section}`,
    `- Why: ${suggestion.rationale}`,
    `- Score: ${suggestion.score}`,
  ];
  if (suggestion.latestEvidence) {
    lines.push(`- Latest: "${suggestion.latestEvidence}"`);
  }
  lines.push('');
  return lines;
}

export function formatSuggestionReport(input: SuggestionReportInput): string {
  const { suggestions, patterns, readStats, sessions, documentPath } = input;
  const lines = ['# CLAUDE.md suggestions', '', readSummary(readStats, sessions), ''];

  if (readStats.files === 0) {
    lines.push('No session logs found.', '');
    return lines.join('\n');
  }

  if (suggestions.length === 0) {
    lines.push('No suggestions yet. Keep working and run this again later.', '');
  } else {
    const fresh = suggestions.filter((s) => !s.alreadyPresent).length;
    const target = documentPath ? ` for ${documentPath}` : '';
    lines.push(`## Suggestions${target} (${fresh} new)`, '');
    suggestions.forEach((suggestion, i) => lines.push(...formatSuggestion(suggestion, i)));
  }

  // Patterns without a rule template are informational only
  const observations = patterns.filter((p) => !p.suggestion);
  if (observations.length > 0) {
    lines.push('## Other observations', '');
    for (const pattern of observations) {
      lines.push(`- ${pattern.label}: ${pattern.occurrences}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
