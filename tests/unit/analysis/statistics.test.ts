import { describe, it, expect } from 'vitest';
import { computeStatistics, countTools, emptyStatistics, isQuestion } from '../../../src/analysis/statistics.js';
import { parseLogLine } from '../../../src/adapters/claude-code/index.js';
import type { ToolInvocation, Turn } from '../../../src/adapters/types.js';
import { makeTurn } from '../../helpers/sources.js';

const options = { codeRequestKeywords: ['코드', '구현', 'write'] };

describe('computeStatistics', () => {
  it('returns zeros for no turns', () => {
    expect(computeStatistics([], options)).toEqual(emptyStatistics());
  });

  it('counts roles, tools and user message ratios', () => {
    const turns = [
      makeTurn('user', 'How do I write a function?', { sessionId: 's1' }),
      makeTurn('assistant', '', {
        sessionId: 's1',
        toolCalls: [
          { name: 'Read', args: {} },
          { name: 'Edit', args: {} },
        ],
      }),
      makeTurn('tool', 'ok', { sessionId: 's1' }),
      makeTurn('user', '코드 구현해줘', { sessionId: 's2' }),
      makeTurn('assistant', '네', { sessionId: 's2', toolCalls: [{ name: 'Read', args: {} }] }),
      makeTurn('user', '고마워？', { sessionId: 's2' }),
    ];

    const stats = computeStatistics(turns, options);

    expect(stats.sessions).toBe(2);
    expect(stats.turns).toBe(6);
    expect(stats.userTurns).toBe(3);
    expect(stats.assistantTurns).toBe(2);
    expect(stats.toolTurns).toBe(1);
    expect(stats.toolCalls).toBe(3);
    expect(stats.toolFrequency).toEqual([
      { name: 'Read', count: 2 },
      { name: 'Edit', count: 1 },
    ]);
    expect(stats.averageUserMessageLength).toBeCloseTo(37 / 3);
    expect(stats.questionRatio).toBeCloseTo(2 / 3);
    expect(stats.codeRequestRatio).toBeCloseTo(2 / 3);
  });
});

describe('computeStatistics with flat tool records', () => {
  it('counts the tool of each flat tool record', () => {
    const context = { file: 'flat.jsonl', line: 1, sessionId: 'flat', toolUses: new Map<string, ToolInvocation>() };
    const turns: Turn[] = [];
    for (const line of [
      '{"role":"tool","toolName":"Read"}',
      '{"role":"tool","toolName":"Read","text":"ok"}',
      '{"role":"tool","text":"no tool"}',
    ]) {
      const result = parseLogLine(line, context);
      if (result.kind === 'turn') turns.push(result.turn);
    }

    const stats = computeStatistics(turns, options);

    expect(stats.toolTurns).toBe(3);
    expect(stats.toolCalls).toBe(2);
    expect(stats.toolFrequency).toEqual([{ name: 'Read', count: 2 }]);
  });
});

describe('isQuestion', () => {
  it('looks at the last non-blank character', () => {
    expect(isQuestion('why? ')).toBe(true);
    expect(isQuestion('정말？')).toBe(true);
    expect(isQuestion('is it?!')).toBe(false);
    expect(isQuestion('')).toBe(false);
  });
});

describe('countTools', () => {
  it('breaks count ties by name', () => {
    const turns = [
      makeTurn('assistant', '', { toolCalls: [{ name: 'Grep', args: {} }, { name: 'Bash', args: {} }] }),
      makeTurn('user', '', { toolCalls: [{ name: 'Ignored', args: {} }] }),
    ];

    expect(countTools(turns)).toEqual([
      { name: 'Bash', count: 1 },
      { name: 'Grep', count: 1 },
    ]);
  });
});
