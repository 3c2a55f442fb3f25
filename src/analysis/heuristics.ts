/**
 * Keyword and threshold tables for pattern detection.
 *
 * The tables live in data/heuristics.json so they can be tuned (or replaced
 * with `--rules <file>`) without touching the extractor.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const PATTERN_CATEGORIES = [
  'tone',
  'correction',
  'language',
  'convention',
  'request',
  'tool-habit',
  'workflow',
  'file-type',
] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

const categorySchema = z.enum(PATTERN_CATEGORIES);

const regexSource = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source, 'i');
      return true;
    } catch {
      return false;
    }
  },
  { message: 'invalid regular expression' },
);

const suggestionTemplateSchema = z.object({
  section: z.string().min(1),
  /** `{value}` is replaced with the matched value (tool sequence, extension) */
  rule: z.string().min(1),
});

const keywordRuleSchema = z.object({
  key: z.string().min(1),
  category: categorySchema,
  label: z.string().min(1),
  pattern: regexSource,
  suggestion: suggestionTemplateSchema.optional(),
});

// Patterns derived from tool usage rather than keywords; `{value}` is the tool, sequence or extension
const computedRuleSchema = z.object({
  label: z.string().min(1),
  threshold: z.number().int().min(1),
  suggestion: suggestionTemplateSchema.optional(),
});

const heuristicsFileSchema = z.object({
  minOccurrences: z.number().int().min(1),
  snippetLength: z.number().int().min(10),
  maxEvidence: z.number().int().min(1),
  categoryWeights: z.record(categorySchema, z.number().min(0)),
  priorityThresholds: z.object({
    high: z.number(),
    medium: z.number(),
  }),
  /** Requests only become patterns once they are this frequent */
  requestThreshold: z.number().int().min(1),
  corrections: z.array(keywordRuleSchema),
  preferences: z.array(keywordRuleSchema),
  requests: z.array(keywordRuleSchema),
  toolHabit: computedRuleSchema,
  workflow: computedRuleSchema,
  fileType: computedRuleSchema,
  editTools: z.array(z.string()),
  codeRequestKeywords: z.array(z.string().min(1)),
  handoff: z.object({
    completedMarkers: z.array(z.string().min(1)),
    pendingMarkers: z.array(z.string().min(1)),
  }),
});

export type HeuristicsFile = z.infer<typeof heuristicsFileSchema>;
export type SuggestionTemplate = z.infer<typeof suggestionTemplateSchema>;
export type ComputedRule = z.infer<typeof computedRuleSchema>;

export interface KeywordRule {
  key: string;
  category: PatternCategory;
  label: string;
  regex: RegExp;
  suggestion?: SuggestionTemplate;
}

export interface Heuristics extends Omit<HeuristicsFile, 'corrections' | 'preferences' | 'requests' | 'categoryWeights'> {
  categoryWeights: Record<PatternCategory, number>;
  corrections: KeywordRule[];
  preferences: KeywordRule[];
  requests: KeywordRule[];
}

export class HeuristicsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HeuristicsError';
  }
}

const DEFAULT_HEURISTICS_PATH = fileURLToPath(new URL('../../data/heuristics.json', import.meta.url));

function compileRules(rules: HeuristicsFile['corrections']): KeywordRule[] {
  return rules.map((rule) => ({
    key: rule.key,
    category: rule.category,
    label: rule.label,
    regex: new RegExp(rule.pattern, 'i'),
    ...(rule.suggestion ? { suggestion: rule.suggestion } : {}),
  }));
}

/**
 * Validate a parsed heuristics document and compile its regular expressions.
 */
export function parseHeuristics(value: unknown, origin: string = 'heuristics'): Heuristics {
  const parsed = heuristicsFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid document';
    throw new HeuristicsError(`Invalid ${origin}: ${where}`);
  }

  const data = parsed.data;
  const weights = data.categoryWeights;
  const categoryWeights: Record<PatternCategory, number> = {
    tone: weights.tone ?? 1,
    correction: weights.correction ?? 1,
    language: weights.language ?? 1,
    convention: weights.convention ?? 1,
    request: weights.request ?? 1,
    'tool-habit': weights['tool-habit'] ?? 1,
    workflow: weights.workflow ?? 1,
    'file-type': weights['file-type'] ?? 1,
  };

  return {
    ...data,
    categoryWeights,
    corrections: compileRules(data.corrections),
    preferences: compileRules(data.preferences),
    requests: compileRules(data.requests),
  };
}

const cache = new Map<string, Heuristics>();

/**
 * Load heuristics from a JSON file (the bundled table by default).
 */
export function loadHeuristics(path: string = DEFAULT_HEURISTICS_PATH): Heuristics {
  const cached = cache.get(path);
  if (cached) return cached;

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new HeuristicsError(`Cannot read rules file ${path}`, { cause: error });
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new HeuristicsError(`Rules file ${path} is not valid JSON`, { cause: error });
  }

  const heuristics = parseHeuristics(value, path);
  cache.set(path, heuristics);
  return heuristics;
}

export function fillPlaceholder(text: string, value: string): string {
  return text.replaceAll('{value}', value);
}

/**
 * Fill `{value}` placeholders of a suggestion template.
 */
export function renderTemplate(template: SuggestionTemplate, value: string): SuggestionTemplate {
  return {
    section: fillPlaceholder(template.section, value),
    rule: fillPlaceholder(template.rule, value),
  };
}
