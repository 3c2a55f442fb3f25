import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { getProjectsDir } from '../adapters/claude-code/paths.js';
import { expandPath } from './platform.js';

export const LOGS_DIR_ENV = 'CLAUDE_TUNE_LOGS_DIR';
export const CLAUDE_MD = 'CLAUDE.md';

/** Options every command accepts (declared on the root program) */
export interface GlobalOptions {
  logs?: string;
  rules?: string;
  verbose?: boolean;
}

export interface Settings {
  /** Session log file, directory, or projects root */
  logsPath: string;
  /** Replacement heuristics table; bundled table when absent */
  rulesPath?: string;
  verbose: boolean;
  cwd: string;
}

/**
 * Resolve settings once: CLI options, then environment, then home-directory defaults.
 */
export function resolveSettings(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Settings {
  const fromEnv = env[LOGS_DIR_ENV];
  const logsPath = options.logs ?? (fromEnv ? fromEnv : getProjectsDir());

  return {
    logsPath: resolve(cwd, expandPath(logsPath)),
    ...(options.rules ? { rulesPath: resolve(cwd, expandPath(options.rules)) } : {}),
    verbose: options.verbose ?? false,
    cwd,
  };
}

/**
 * `./CLAUDE.md` if present, else the nearest ancestor holding one, else `./CLAUDE.md`.
 */
export function findClaudeMd(cwd: string = process.cwd()): string {
  let dir = resolve(cwd);
  for (;;) {
    const candidate = join(dir, CLAUDE_MD);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return join(resolve(cwd), CLAUDE_MD);
}

/**
 * Explicit `--claude-md` path, or the discovered one.
 */
export function resolveClaudeMdPath(explicit: string | undefined, cwd: string = process.cwd()): string {
  return explicit ? resolve(cwd, expandPath(explicit)) : findClaudeMd(cwd);
}
