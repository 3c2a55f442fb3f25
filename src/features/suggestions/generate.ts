/**
 * Turn patterns into ranked CLAUDE.md rule suggestions
 */

import type { Heuristics } from '../../analysis/heuristics.js';
import type { Pattern } from '../../analysis/types.js';
import { listRules } from './document.js';
import type { ConfigDocument, Priority, Suggestion } from './types.js';

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

export interface GenerateOptions {
  heuristics: Heuristics;
  /** Existing CLAUDE.md; suggestions it already contains are flagged `alreadyPresent` */
  document?: ConfigDocument;
}

export function priorityFor(score: number, thresholds: Heuristics['priorityThresholds']): Priority {
  if (score >= thresholds.high) return 'high';
  if (score >= thresholds.medium) return 'medium';
  return 'low';
}

/**
 * Priority, then score descending, then most recent evidence, then rule text.
 */
export function compareSuggestions(a: Suggestion, b: Suggestion): number {
  return (
    PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
    b.score - a.score ||
    b.lastSeen - a.lastSeen ||
    a.rule.localeCompare(b.rule)
  );
}

function describeOccurrences(pattern: Pattern): string {
  const sessions = new Set(pattern.evidence.map((e) => e.sessionId)).size;
  const times = pattern.occurrences === 1 ? 'once' : `${pattern.occurrences} times`;
  const across = sessions > 1 ? ` across ${sessions}+ sessions` : '';
  return `"${pattern.label}" seen ${times}${across}`;
}

export function generateSuggestions(patterns: readonly Pattern[], options: GenerateOptions): Suggestion[] {
  const { heuristics, document } = options;
  const present = document ? new Set(listRules(document)) : null;
  const byRule = new Map<string, Suggestion>();

  for (const pattern of patterns) {
    if (!pattern.suggestion) continue;

    const rule = pattern.suggestion.rule.trim();
    const score = pattern.occurrences * heuristics.categoryWeights[pattern.category];
    const suggestion: Suggestion = {
      id: `suggestion:${pattern.id}`,
      patternId: pattern.id,
      category: pattern.category,
      section: pattern.suggestion.section,
      rule,
      rationale: describeOccurrences(pattern),
      priority: priorityFor(score, heuristics.priorityThresholds),
      score,
      occurrences: pattern.occurrences,
      lastSeen: pattern.lastSeen,
      ...(pattern.evidence[0] ? { latestEvidence: pattern.evidence[0].snippet } : {}),
      ...(present ? { alreadyPresent: present.has(rule) } : {}),
    };

    // Two patterns can map to the same rule; the stronger one wins
    const previous = byRule.get(rule);
    if (!previous || compareSuggestions(suggestion, previous) < 0) {
      byRule.set(rule, suggestion);
    }
  }

  return [...byRule.values()].sort(compareSuggestions);
}
