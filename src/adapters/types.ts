export type TurnRole = 'user' | 'assistant' | 'tool';

export interface ToolInvocation {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface TurnSource {
  file: string;
  /** 1-based line number within the session file */
  line: number;
}

/**
 * One parsed record of a session log.
 * Objects are frozen by the parser; treat them as read-only.
 */
export interface Turn {
  readonly role: TurnRole;
  readonly timestamp: string | undefined;
  readonly text: string;
  readonly sessionId: string;
  readonly source: TurnSource;
  /**
   * Tool calls issued by an assistant turn. Flat `tool` records carry their own
   * call here; tool results of Claude Code entries and user turns have none.
   */
  readonly toolCalls: readonly ToolInvocation[];
  /** First invoked tool for assistant turns, resolved tool name for tool results */
  readonly toolName?: string;
  readonly toolArgs?: Record<string, unknown>;
}

/**
 * Counters for the latest pass over a log source.
 * Invariant: turns + skipped + ignored === lines
 */
export interface ReadStats {
  files: number;
  /** Non-blank lines seen */
  lines: number;
  turns: number;
  /** Malformed lines (bad JSON or unknown record shape) */
  skipped: number;
  /** Well-formed records that carry no conversation turn (summaries, snapshots, ...) */
  ignored: number;
}

export interface SessionFile {
  path: string;
  sessionId: string;
  /** Directory name of the owning project ('' for loose files) */
  project: string;
  mtime: number;
}

export interface DiscoverOptions {
  /** Substring match against the project directory name */
  project?: string;
  /** Keep only the N most recently modified session files */
  limit?: number;
}

export interface ReadWarning {
  file: string;
  /** 1-based line number, absent when the whole file could not be read */
  line?: number;
  reason: string;
}

export interface ReadOptions extends DiscoverOptions {
  /** Called for every malformed line and unreadable file */
  onWarning?: (warning: ReadWarning) => void;
}

export function emptyReadStats(): ReadStats {
  return { files: 0, lines: 0, turns: 0, skipped: 0, ignored: 0 };
}
