import { describe, it, expect } from 'vitest';
import {
  closingFence,
  findOpenFence,
  findSection,
  listRules,
  normalizeSectionName,
  parseConfigDocument,
  serializeConfigDocument,
} from '../../../../src/features/suggestions/document.js';

const SAMPLE = [
  '# CLAUDE.md',
  '',
  '## 말투 규칙',
  '- 항상 존댓말 사용',
  '',
  '## Commit ##',
  '```',
  '# not a heading',
  '- not a rule',
  '```',
  '* Keep subjects short  ',
  '',
].join('\n');

describe('parseConfigDocument', () => {
  it('splits at headings outside code fences', () => {
    const document = parseConfigDocument(SAMPLE);

    expect(document.preamble).toEqual([]);
    expect(document.sections.map((s) => [s.level, s.name])).toEqual([
      [1, 'CLAUDE.md'],
      [2, '말투 규칙'],
      [2, 'Commit'],
    ]);
    expect(document.sections[2]!.lines).toEqual(['```', '# not a heading', '- not a rule', '```', '* Keep subjects short  ', '']);
  });

  it('keeps text before the first heading as the preamble', () => {
    const document = parseConfigDocument('intro\n\n## A\n- a');

    expect(document.preamble).toEqual(['intro', '']);
    expect(document.sections[0]!.lines).toEqual(['- a']);
  });

  it('does not treat #hashtag lines as headings', () => {
    expect(parseConfigDocument('#tag\n').sections).toEqual([]);
  });

  it('reads headings of a CRLF document and keeps its line ending', () => {
    const document = parseConfigDocument('# CLAUDE.md\r\n\r\n## 말투 규칙\r\n- 짧게 답변\r\n');

    expect(document.lineEnding).toBe('\r\n');
    expect(document.sections.map((s) => [s.heading, s.name])).toEqual([
      ['# CLAUDE.md', 'CLAUDE.md'],
      ['## 말투 규칙', '말투 규칙'],
    ]);
    expect(document.sections[1]!.lines).toEqual(['- 짧게 답변', '']);
    expect(listRules(document)).toEqual(['짧게 답변']);
  });

  it('runs an unclosed fence to the end of the document', () => {
    const document = parseConfigDocument('## A\n```\n## not a heading\n- not a rule\n');

    expect(document.sections.map((s) => s.name)).toEqual(['A']);
    expect(listRules(document)).toEqual([]);
  });

  it('serializes back to the exact input', () => {
    for (const text of [SAMPLE, '', '\n\n', 'no headings', '## A\r\n- a\r\n', '  ## indented']) {
      expect(serializeConfigDocument(parseConfigDocument(text))).toBe(text);
    }
  });
});

describe('findSection', () => {
  it('matches names ignoring case and spacing', () => {
    const document = parseConfigDocument(SAMPLE);

    expect(findSection(document, '  commit ')?.heading).toBe('## Commit ##');
    expect(findSection(document, '말투   규칙')?.name).toBe('말투 규칙');
    expect(findSection(document, 'missing')).toBeUndefined();
  });

  it('normalizes names', () => {
    expect(normalizeSectionName('  Code\tStyle ')).toBe('code style');
  });
});

describe('findOpenFence', () => {
  it('returns the line of the fence left open', () => {
    expect(findOpenFence(['- a', '```sh', 'echo hi', ''])).toBe(1);
    expect(findOpenFence(['```', 'x', '```', '~~~~', 'y'])).toBe(3);
    expect(findOpenFence(['```', 'x', '```'])).toBe(-1);
    expect(findOpenFence([])).toBe(-1);
  });

  it('closes a fence with its own marker', () => {
    expect(closingFence('  ~~~~ text')).toBe('~~~~');
    expect(closingFence('```ts')).toBe('```');
  });
});

describe('listRules', () => {
  it('lists bullet text outside code fences', () => {
    expect(listRules(parseConfigDocument(SAMPLE))).toEqual(['항상 존댓말 사용', 'Keep subjects short']);
  });
});
