import type { PatternCategory, SuggestionTemplate } from './heuristics.js';

export interface Evidence {
  snippet: string;
  /** Assistant reply the user was reacting to (corrections only) */
  context?: string;
  timestamp: string | undefined;
  sessionId: string;
  /** Position of the turn in the analyzed sequence */
  turnIndex: number;
}

/**
 * A recurring signal found across turns.
 */
export interface Pattern {
  /** `${category}:${key}`, unique within one extraction */
  id: string;
  category: PatternCategory;
  key: string;
  label: string;
  occurrences: number;
  /** Most recent first, capped at the heuristics' maxEvidence */
  evidence: Evidence[];
  /** turnIndex of the most recent evidence */
  lastSeen: number;
  suggestion?: SuggestionTemplate;
}

export interface ToolCount {
  name: string;
  count: number;
}

export interface Statistics {
  sessions: number;
  turns: number;
  userTurns: number;
  assistantTurns: number;
  toolTurns: number;
  toolCalls: number;
  /** Tool name -> invocation count, count descending then name ascending */
  toolFrequency: ToolCount[];
  /** Mean user message length in characters */
  averageUserMessageLength: number;
  /** Share of user turns ending with a question mark, 0..1 */
  questionRatio: number;
  /** Share of user turns containing a code-request keyword, 0..1 */
  codeRequestRatio: number;
}
