import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { emptyStatistics } from '../../../src/analysis/statistics.js';
import { TempDir } from '../../helpers/temp.js';
import { captureExit, mockConsole, mockProcessExit } from '../../helpers/cli.js';
import { createClaudeCodeProject, honorificSession, projectsRoot } from '../../helpers/sources.js';

describe('analyze command', () => {
  let temp: TempDir;
  let consoleMock: ReturnType<typeof mockConsole>;
  let exitMock: ReturnType<typeof mockProcessExit>;

  beforeEach(() => {
    temp = new TempDir();
    consoleMock = mockConsole();
    exitMock = mockProcessExit();
  });

  afterEach(async () => {
    exitMock.restore();
    consoleMock.restore();
    await temp.cleanupAll();
  });

  it('reports zeros for a missing log location without failing', async () => {
    const baseDir = await temp.create();
    const logs = join(baseDir, 'nothing-here');

    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    const code = await captureExit(() => analyzeCommand({ logs, json: true }));

    expect(code).toBeUndefined();
    expect(exitMock.wasCalled()).toBe(false);
    expect(JSON.parse(consoleMock.logs.join('\n'))).toEqual({
      logs,
      files: 0,
      lines: 0,
      skipped: 0,
      ignored: 0,
      statistics: emptyStatistics(),
      patterns: [],
    });
  });

  it('says no logs were found in the text report', async () => {
    const baseDir = await temp.create();

    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    await analyzeCommand({ logs: join(baseDir, 'nothing-here') });

    expect(consoleMock.logs).toContain('  (no session logs found)');
    expect(consoleMock.logs).toContain('  Sessions:       0');
    expect(consoleMock.logs).toContain('  Questions:      0.0%');
  });

  it('reports statistics and patterns for real sessions', async () => {
    const baseDir = await temp.create();
    await createClaudeCodeProject(baseDir, [{ sessionId: 'honorific', entries: [...honorificSession(), 'not json'] }]);

    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    await analyzeCommand({ logs: projectsRoot(baseDir), json: true });

    const report = JSON.parse(consoleMock.logs.join('\n'));
    expect(report.files).toBe(1);
    expect(report.skipped).toBe(1);
    expect(report.statistics.sessions).toBe(1);
    expect(report.statistics.userTurns).toBe(10);
    expect(report.statistics.assistantTurns).toBe(10);
    expect(report.patterns).toEqual([
      { id: 'tone:tone-honorific', category: 'tone', label: '존댓말 요청', occurrences: 3 },
    ]);
    expect(consoleMock.errors).toEqual([
      '[claude-tune] Skipped 1 malformed line(s); run with --verbose for details',
    ]);
  });

  it('prints one warning per malformed line with --verbose', async () => {
    const baseDir = await temp.create();
    const dir = await createClaudeCodeProject(baseDir, [{ sessionId: 's', entries: ['{broken'] }]);

    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    await analyzeCommand({ logs: projectsRoot(baseDir), json: true, verbose: true });

    expect(consoleMock.errors).toEqual([`[claude-tune] ${join(dir, 's.jsonl')}:1: invalid JSON`]);
  });

  it('saves the report as JSON', async () => {
    const baseDir = await temp.create();
    const output = join(baseDir, 'out', 'report.json');

    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    await analyzeCommand({ logs: join(baseDir, 'none'), output });

    expect(JSON.parse(readFileSync(output, 'utf-8')).files).toBe(0);
    expect(consoleMock.logs[consoleMock.logs.length - 1]).toBe(`Saved report to ${output}`);
  });

  it('exits with status 1 for an invalid --limit', async () => {
    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    const code = await captureExit(() => analyzeCommand({ logs: '/nonexistent', limit: 'abc' }));

    expect(code).toBe(1);
    expect(consoleMock.errors).toEqual([
      '[claude-tune] Analysis failed: --limit expects a non-negative integer, got "abc"',
    ]);
  });
});
