/**
 * Claude Code session log reader.
 *
 * Produces turns lazily in file order, then line order. The stream can be
 * iterated any number of times; every pass re-reads the files and resets `stats`.
 */

import { readFileSync } from 'fs';
import { discoverSessionFiles } from './paths.js';
import { parseLogLine } from './parser.js';
import { emptyReadStats, type ReadOptions, type ReadStats, type SessionFile, type ToolInvocation, type Turn } from '../types.js';

export class TurnStream implements Iterable<Turn> {
  private lastStats: ReadStats = emptyReadStats();

  constructor(
    readonly location: string,
    private readonly options: ReadOptions = {},
  ) {}

  /** Counters of the most recent (possibly still running) pass */
  get stats(): ReadStats {
    return { ...this.lastStats };
  }

  sessionFiles(): SessionFile[] {
    return discoverSessionFiles(this.location, this.options);
  }

  *[Symbol.iterator](): Iterator<Turn> {
    const stats = emptyReadStats();
    this.lastStats = stats;

    for (const file of this.sessionFiles()) {
      let content: string;
      try {
        content = readFileSync(file.path, 'utf-8');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.options.onWarning?.({ file: file.path, reason: `unreadable file: ${reason}` });
        continue;
      }
      stats.files++;

      const toolUses = new Map<string, ToolInvocation>();
      const lines = content.split('\n');

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (line === undefined || !line.trim()) continue;
        stats.lines++;

        const result = parseLogLine(line, {
          file: file.path,
          line: i + 1,
          sessionId: file.sessionId,
          toolUses,
        });

        if (result.kind === 'turn') {
          stats.turns++;
          yield result.turn;
        } else if (result.kind === 'ignored') {
          stats.ignored++;
        } else {
          stats.skipped++;
          this.options.onWarning?.({ file: file.path, line: i + 1, reason: result.reason });
        }
      }
    }
  }
}

export function readTurns(location: string, options: ReadOptions = {}): TurnStream {
  return new TurnStream(location, options);
}

/**
 * Drain a stream into memory and return the turns with the stats of that pass.
 */
export function collectTurns(stream: TurnStream): { turns: Turn[]; stats: ReadStats } {
  const turns = [...stream];
  return { turns, stats: stream.stats };
}

export { discoverSessionFiles, getClaudeCodeRootPath, getProjectsDir, desanitizeProjectPath } from './paths.js';
export { parseLogLine, type LineContext, type LineResult } from './parser.js';
