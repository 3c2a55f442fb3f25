/**
 * Pattern extraction: keyword and frequency heuristics over the turn sequence.
 *
 * Corrections: a user turn answering an assistant turn (tool turns in between
 * do not break the pair, a new session does) is claimed by the first matching
 * correction rule. Preferences and requests are matched on every user turn.
 * Tool habits, tool sequences and edited file types come from assistant tool calls.
 *
 * Nothing below the configured minimum occurrence count is emitted.
 */

import type { ToolInvocation, Turn } from '../adapters/types.js';
import { toSnippet } from '../adapters/utils.js';
import { fillPlaceholder, renderTemplate, type ComputedRule, type Heuristics, type KeywordRule, type PatternCategory, type SuggestionTemplate } from './heuristics.js';
import type { Evidence, Pattern } from './types.js';

export interface ExtractOptions {
  heuristics: Heuristics;
  /** Overrides heuristics.minOccurrences */
  minOccurrences?: number;
}

interface PatternSeed {
  category: PatternCategory;
  key: string;
  label: string;
  suggestion?: SuggestionTemplate;
}

class PatternTally {
  private readonly patterns = new Map<string, Pattern>();

  constructor(private readonly maxEvidence: number) {}

  record(seed: PatternSeed, evidence: Evidence): void {
    const id = `${seed.category}:${seed.key}`;
    let pattern = this.patterns.get(id);
    if (!pattern) {
      pattern = {
        id,
        category: seed.category,
        key: seed.key,
        label: seed.label,
        occurrences: 0,
        evidence: [],
        lastSeen: -1,
        ...(seed.suggestion ? { suggestion: seed.suggestion } : {}),
      };
      this.patterns.set(id, pattern);
    }

    pattern.occurrences++;
    pattern.lastSeen = Math.max(pattern.lastSeen, evidence.turnIndex);
    pattern.evidence.unshift(evidence);
    if (pattern.evidence.length > this.maxEvidence) {
      pattern.evidence.length = this.maxEvidence;
    }
  }

  all(): Pattern[] {
    return [...this.patterns.values()];
  }
}

/**
 * Occurrences descending, then most recent evidence first, then id.
 */
export function comparePatterns(a: Pattern, b: Pattern): number {
  return b.occurrences - a.occurrences || b.lastSeen - a.lastSeen || a.id.localeCompare(b.id);
}

function seedFromRule(rule: KeywordRule): PatternSeed {
  return {
    category: rule.category,
    key: rule.key,
    label: rule.label,
    ...(rule.suggestion ? { suggestion: rule.suggestion } : {}),
  };
}

function seedFromComputed(category: PatternCategory, key: string, rule: ComputedRule, value: string): PatternSeed {
  return {
    category,
    key,
    label: fillPlaceholder(rule.label, value),
    ...(rule.suggestion ? { suggestion: renderTemplate(rule.suggestion, value) } : {}),
  };
}

function evidenceFor(turn: Turn, index: number, heuristics: Heuristics, snippet?: string): Evidence {
  return {
    snippet: toSnippet(snippet ?? turn.text, heuristics.snippetLength),
    timestamp: turn.timestamp,
    sessionId: turn.sessionId,
    turnIndex: index,
  };
}

function collectCorrections(turns: readonly Turn[], heuristics: Heuristics, tally: PatternTally): void {
  let session: string | null = null;
  let previous: Turn | null = null;

  for (let i = 0; i < turns.length; i++) {
    const turn = turns[i];
    if (!turn) continue;

    if (turn.sessionId !== session) {
      session = turn.sessionId;
      previous = null;
    }

    if (turn.role === 'tool') continue;

    if (turn.role === 'user' && previous?.role === 'assistant') {
      const rule = heuristics.corrections.find((r) => r.regex.test(turn.text));
      if (rule) {
        tally.record(seedFromRule(rule), {
          ...evidenceFor(turn, i, heuristics),
          context: previous.text ? toSnippet(previous.text, heuristics.snippetLength) : '[tool calls only]',
        });
      }
    }

    previous = turn;
  }
}

function collectKeywordMatches(
  turns: readonly Turn[],
  rules: readonly KeywordRule[],
  heuristics: Heuristics,
  tally: PatternTally,
): void {
  for (let i = 0; i < turns.length; i++) {
    const turn = turns[i];
    if (!turn || turn.role !== 'user' || !turn.text) continue;

    for (const rule of rules) {
      if (rule.regex.test(turn.text)) {
        tally.record(seedFromRule(rule), evidenceFor(turn, i, heuristics));
      }
    }
  }
}

/**
 * Short human-readable form of a tool call, e.g. `Edit src/app.ts`
 */
export function describeToolCall(call: ToolInvocation): string {
  for (const field of ['file_path', 'notebook_path', 'command', 'pattern', 'path', 'url']) {
    const value = call.args[field];
    if (typeof value === 'string' && value) {
      return `${call.name} ${value}`;
    }
  }
  return call.name;
}

/**
 * Lower-cased extension of the file a tool call edits, if any.
 */
export function editedExtension(call: ToolInvocation): string | undefined {
  const target = call.args['file_path'] ?? call.args['notebook_path'];
  if (typeof target !== 'string') return undefined;

  const name = target.split(/[\\/]/).pop() ?? '';
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) return undefined;
  return name.slice(dot + 1).toLowerCase();
}

function collectToolHabits(turns: readonly Turn[], heuristics: Heuristics, tally: PatternTally): void {
  const editTools = new Set(heuristics.editTools);
  let session: string | null = null;
  let previousTool: string | null = null;

  for (let i = 0; i < turns.length; i++) {
    const turn = turns[i];
    if (!turn) continue;

    if (turn.sessionId !== session) {
      session = turn.sessionId;
      previousTool = null;
    }

    if (turn.role === 'user') continue;

    for (const call of turn.toolCalls) {
      const description = describeToolCall(call);

      tally.record(
        seedFromComputed('tool-habit', `tool:${call.name}`, heuristics.toolHabit, call.name),
        evidenceFor(turn, i, heuristics, description),
      );

      if (previousTool && previousTool !== call.name) {
        const sequence = `${previousTool} → ${call.name}`;
        tally.record(
          seedFromComputed('workflow', `sequence:${previousTool}->${call.name}`, heuristics.workflow, sequence),
          evidenceFor(turn, i, heuristics, sequence),
        );
      }
      previousTool = call.name;

      if (editTools.has(call.name)) {
        const ext = editedExtension(call);
        if (ext) {
          tally.record(
            seedFromComputed('file-type', `ext:${ext}`, heuristics.fileType, ext),
            evidenceFor(turn, i, heuristics, description),
          );
        }
      }
    }
  }
}

/**
 * Minimum occurrences a pattern of the given category needs to be emitted.
 * Category thresholds can raise the floor, never lower it.
 */
export function minimumFor(category: PatternCategory, heuristics: Heuristics, minOccurrences: number): number {
  switch (category) {
    case 'request':
      return Math.max(minOccurrences, heuristics.requestThreshold);
    case 'tool-habit':
      return Math.max(minOccurrences, heuristics.toolHabit.threshold);
    case 'workflow':
      return Math.max(minOccurrences, heuristics.workflow.threshold);
    case 'file-type':
      return Math.max(minOccurrences, heuristics.fileType.threshold);
    default:
      return minOccurrences;
  }
}

export function extractPatterns(turns: readonly Turn[], options: ExtractOptions): Pattern[] {
  const { heuristics } = options;
  const minOccurrences = Math.max(1, options.minOccurrences ?? heuristics.minOccurrences);
  const tally = new PatternTally(heuristics.maxEvidence);

  collectCorrections(turns, heuristics, tally);
  collectKeywordMatches(turns, heuristics.preferences, heuristics, tally);
  collectKeywordMatches(turns, heuristics.requests, heuristics, tally);
  collectToolHabits(turns, heuristics, tally);

  return tally
    .all()
    .filter((p) => p.occurrences >= minimumFor(p.category, heuristics, minOccurrences))
    .sort(comparePatterns);
}
