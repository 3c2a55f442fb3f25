import { describe, it, expect } from 'vitest';
import { loadHeuristics } from '../../../../src/analysis/heuristics.js';
import { extractPatterns } from '../../../../src/analysis/patterns.js';
import { parseConfigDocument } from '../../../../src/features/suggestions/document.js';
import { generateSuggestions, priorityFor } from '../../../../src/features/suggestions/generate.js';
import { honorificScenario } from '../../../helpers/sources.js';
import { makePattern } from '../../../helpers/patterns.js';

const heuristics = loadHeuristics();

describe('priorityFor', () => {
  it('applies the score thresholds inclusively', () => {
    const thresholds = { high: 9, medium: 4 };
    expect(priorityFor(9, thresholds)).toBe('high');
    expect(priorityFor(8, thresholds)).toBe('medium');
    expect(priorityFor(4, thresholds)).toBe('medium');
    expect(priorityFor(3, thresholds)).toBe('low');
  });
});

describe('generateSuggestions', () => {
  it('turns the honorific pattern into a high-priority tone rule', () => {
    const patterns = extractPatterns(honorificScenario(), { heuristics });

    const suggestions = generateSuggestions(patterns, { heuristics });

    expect(suggestions).toEqual([
      {
        id: 'suggestion:tone:tone-honorific',
        patternId: 'tone:tone-honorific',
        category: 'tone',
        section: '말투 규칙',
        rule: '항상 존댓말 사용',
        rationale: '"존댓말 요청" seen 3 times',
        priority: 'high',
        score: 9,
        occurrences: 3,
        lastSeen: 13,
        latestEvidence: '앞으로 존댓말로 말해주세요',
      },
    ]);
  });

  it('ranks by priority, then score, then recency, then rule', () => {
    const patterns = [
      makePattern({ category: 'request', key: 'low', occurrences: 3, suggestion: { section: 'S', rule: 'low rule' } }),
      makePattern({ category: 'language', key: 'b', occurrences: 2, lastSeen: 1, suggestion: { section: 'S', rule: 'b rule' } }),
      makePattern({ category: 'language', key: 'a', occurrences: 2, lastSeen: 5, suggestion: { section: 'S', rule: 'a rule' } }),
      makePattern({ category: 'tone', key: 'top', occurrences: 3, suggestion: { section: 'S', rule: 'top rule' } }),
      makePattern({ category: 'convention', key: 'c', occurrences: 2, lastSeen: 5, suggestion: { section: 'S', rule: 'c rule' } }),
      makePattern({ category: 'tool-habit', key: 'none', occurrences: 20 }),
    ];

    const suggestions = generateSuggestions(patterns, { heuristics });

    expect(suggestions.map((s) => [s.rule, s.priority, s.score])).toEqual([
      ['top rule', 'high', 9],
      ['a rule', 'medium', 4],
      ['c rule', 'medium', 4],
      ['b rule', 'medium', 4],
      ['low rule', 'low', 3],
    ]);
  });

  it('keeps the stronger of two patterns suggesting the same rule', () => {
    const patterns = [
      makePattern({ category: 'request', key: 'weak', occurrences: 2, suggestion: { section: 'S', rule: 'same' } }),
      makePattern({ category: 'tone', key: 'strong', occurrences: 2, suggestion: { section: 'T', rule: 'same' } }),
    ];

    const suggestions = generateSuggestions(patterns, { heuristics });

    expect(suggestions.map((s) => [s.patternId, s.section])).toEqual([['tone:strong', 'T']]);
  });

  it('flags rules the existing document already has', () => {
    const patterns = [
      makePattern({ category: 'tone', key: 'x', suggestion: { section: '말투 규칙', rule: '항상 존댓말 사용' } }),
      makePattern({ category: 'language', key: 'y', suggestion: { section: '언어', rule: '응답은 한국어로 작성' } }),
    ];
    const document = parseConfigDocument('## 말투 규칙\n- 항상 존댓말 사용\n');

    const suggestions = generateSuggestions(patterns, { heuristics, document });

    expect(suggestions.map((s) => [s.rule, s.alreadyPresent])).toEqual([
      ['항상 존댓말 사용', true],
      ['응답은 한국어로 작성', false],
    ]);
  });

  it('mentions the session spread and single occurrences', () => {
    const evidence = (sessionId: string) => ({ snippet: 'x', timestamp: undefined, sessionId, turnIndex: 0 });
    const patterns = [
      makePattern({
        category: 'tone',
        key: 'spread',
        label: '존댓말 요청',
        occurrences: 4,
        evidence: [evidence('a'), evidence('b')],
        suggestion: { section: 'S', rule: 'spread' },
      }),
      makePattern({ category: 'tone', key: 'once', label: '반말 요청', occurrences: 1, suggestion: { section: 'S', rule: 'once' } }),
    ];

    const [spread, once] = generateSuggestions(patterns, { heuristics });

    expect(spread?.rationale).toBe('"존댓말 요청" seen 4 times across 2+ sessions');
    expect(once?.rationale).toBe('"반말 요청" seen once');
  });
});
