import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import {
  HeuristicsError,
  loadHeuristics,
  parseHeuristics,
  renderTemplate,
} from '../../../src/analysis/heuristics.js';
import { TempDir } from '../../helpers/temp.js';

const bundledPath = fileURLToPath(new URL('../../../data/heuristics.json', import.meta.url));

function bundled(): Record<string, unknown> {
  const value: unknown = JSON.parse(readFileSync(bundledPath, 'utf-8'));
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('bundled heuristics is not an object');
  }
  return { ...value };
}

describe('loadHeuristics', () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = new TempDir();
  });

  afterEach(async () => {
    await temp.cleanupAll();
  });

  it('loads and compiles the bundled table', () => {
    const heuristics = loadHeuristics();

    expect(heuristics.minOccurrences).toBe(2);
    expect(heuristics.categoryWeights.tone).toBe(3);
    expect(heuristics.corrections[0]?.key).toBe('tone-honorific');
    expect(heuristics.corrections[0]?.regex.test('존댓말로 해주세요')).toBe(true);
    expect(heuristics.preferences.find((r) => r.key === 'language-english')?.regex.test('Answer IN ENGLISH')).toBe(true);
  });

  it('loads a replacement table from a file', async () => {
    const dir = await temp.create();
    const path = join(dir, 'rules.json');
    writeFileSync(path, JSON.stringify({ ...bundled(), minOccurrences: 7 }));

    expect(loadHeuristics(path).minOccurrences).toBe(7);
  });

  it('reports unreadable and malformed files', async () => {
    const dir = await temp.create();
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{ nope');

    expect(() => loadHeuristics(join(dir, 'missing.json'))).toThrow(HeuristicsError);
    expect(() => loadHeuristics(join(dir, 'missing.json'))).toThrow(/Cannot read rules file/);
    expect(() => loadHeuristics(broken)).toThrow(/is not valid JSON/);
  });
});

describe('parseHeuristics', () => {
  it('rejects an invalid regular expression with its location', () => {
    const data = bundled();
    data['requests'] = [{ key: 'bad', category: 'request', label: 'Bad', pattern: '(unclosed' }];

    expect(() => parseHeuristics(data, 'rules.json')).toThrow(
      'Invalid rules.json: requests.0.pattern: invalid regular expression',
    );
  });

  it('rejects an unknown category', () => {
    const data = bundled();
    data['preferences'] = [{ key: 'x', category: 'mood', label: 'X', pattern: 'x' }];

    expect(() => parseHeuristics(data)).toThrow(HeuristicsError);
  });

  it('defaults missing category weights to 1', () => {
    const data = bundled();
    data['categoryWeights'] = { tone: 5 };

    const heuristics = parseHeuristics(data);

    expect(heuristics.categoryWeights.tone).toBe(5);
    expect(heuristics.categoryWeights.workflow).toBe(1);
  });
});

describe('renderTemplate', () => {
  it('fills every placeholder', () => {
    expect(renderTemplate({ section: '{value} 파일', rule: '.{value} 와 {value}' }, 'ts')).toEqual({
      section: 'ts 파일',
      rule: '.ts 와 ts',
    });
  });
});
