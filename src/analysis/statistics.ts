/**
 * Descriptive statistics over the turn sequence
 */

import type { Turn } from '../adapters/types.js';
import { charLength } from '../adapters/utils.js';
import type { Statistics, ToolCount } from './types.js';

export interface StatisticsOptions {
  codeRequestKeywords: readonly string[];
}

export function emptyStatistics(): Statistics {
  return {
    sessions: 0,
    turns: 0,
    userTurns: 0,
    assistantTurns: 0,
    toolTurns: 0,
    toolCalls: 0,
    toolFrequency: [],
    averageUserMessageLength: 0,
    questionRatio: 0,
    codeRequestRatio: 0,
  };
}

/**
 * A question is a message whose trimmed text ends with `?` (ASCII or full-width).
 */
export function isQuestion(text: string): boolean {
  const trimmed = text.trimEnd();
  return trimmed.endsWith('?') || trimmed.endsWith('？');
}

export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((kw) => lower.includes(kw.toLowerCase()));
}

/**
 * Tool name -> count, count descending then name ascending.
 */
export function countTools(turns: Iterable<Turn>): ToolCount[] {
  const counts = new Map<string, number>();
  for (const turn of turns) {
    if (turn.role === 'user') continue;
    for (const call of turn.toolCalls) {
      counts.set(call.name, (counts.get(call.name) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function computeStatistics(turns: Iterable<Turn>, options: StatisticsOptions): Statistics {
  const stats = emptyStatistics();
  const sessions = new Set<string>();
  const toolTurns: Turn[] = [];

  let totalUserLength = 0;
  let questions = 0;
  let codeRequests = 0;

  for (const turn of turns) {
    stats.turns++;
    sessions.add(turn.sessionId);

    if (turn.role === 'user') {
      stats.userTurns++;
      totalUserLength += charLength(turn.text);
      if (isQuestion(turn.text)) questions++;
      if (containsKeyword(turn.text, options.codeRequestKeywords)) codeRequests++;
    } else if (turn.role === 'assistant') {
      stats.assistantTurns++;
    } else {
      stats.toolTurns++;
    }

    if (turn.role !== 'user' && turn.toolCalls.length > 0) {
      stats.toolCalls += turn.toolCalls.length;
      toolTurns.push(turn);
    }
  }

  stats.sessions = sessions.size;
  stats.toolFrequency = countTools(toolTurns);
  stats.averageUserMessageLength = ratio(totalUserLength, stats.userTurns);
  stats.questionRatio = ratio(questions, stats.userTurns);
  stats.codeRequestRatio = ratio(codeRequests, stats.userTurns);

  return stats;
}
