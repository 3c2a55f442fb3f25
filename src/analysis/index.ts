/**
 * Log Reader → Pattern Extractor + Statistics, shared by every command
 */

import { collectTurns, readTurns } from '../adapters/claude-code/index.js';
import type { ReadOptions, ReadStats, Turn } from '../adapters/types.js';
import type { Settings } from '../utils/config.js';
import { loadHeuristics, type Heuristics } from './heuristics.js';
import { extractPatterns } from './patterns.js';
import { computeStatistics } from './statistics.js';
import type { Pattern, Statistics } from './types.js';

export interface AnalyzeOptions extends ReadOptions {
  minOccurrences?: number;
}

export interface Analysis {
  turns: Turn[];
  readStats: ReadStats;
  statistics: Statistics;
  patterns: Pattern[];
  heuristics: Heuristics;
}

export function analyzeLogs(settings: Settings, options: AnalyzeOptions = {}): Analysis {
  const heuristics = loadHeuristics(settings.rulesPath);
  const { minOccurrences, ...readOptions } = options;

  const { turns, stats } = collectTurns(readTurns(settings.logsPath, readOptions));
  const statistics = computeStatistics(turns, { codeRequestKeywords: heuristics.codeRequestKeywords });
  const patterns = extractPatterns(turns, {
    heuristics,
    ...(minOccurrences !== undefined ? { minOccurrences } : {}),
  });

  return { turns, readStats: stats, statistics, patterns, heuristics };
}

export { loadHeuristics, parseHeuristics, HeuristicsError, PATTERN_CATEGORIES, type Heuristics, type PatternCategory } from './heuristics.js';
export { extractPatterns, comparePatterns, describeToolCall, editedExtension } from './patterns.js';
export { computeStatistics, emptyStatistics, isQuestion } from './statistics.js';
export type * from './types.js';
