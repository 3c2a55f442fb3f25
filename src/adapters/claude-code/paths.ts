import { existsSync, readdirSync, statSync } from 'fs';
import { basename, join } from 'path';
import { expandPath } from '../../utils/platform.js';
import type { DiscoverOptions, SessionFile } from '../types.js';

// Claude Code keeps its data under ~/.claude on every platform
const CLAUDE_CODE_ROOT = '~/.claude';

export function getClaudeCodeRootPath(): string {
  return expandPath(CLAUDE_CODE_ROOT);
}

export function getProjectsDir(rootPath: string = getClaudeCodeRootPath()): string {
  return join(rootPath, 'projects');
}

/**
 * Desanitize a project path from the directory name format.
 * Claude Code uses `-` as a path separator, e.g.:
 * "-home-jin-work-api" -> "/home/jin/work/api"
 */
export function desanitizeProjectPath(sanitized: string): string {
  // Windows path: "C-Users-foo" -> "C:/Users/foo"
  if (/^[A-Z]-/.test(sanitized)) {
    return sanitized.replace(/^([A-Z])-/, '$1:/').replace(/-/g, '/');
  }
  return sanitized.replace(/^-/, '/').replace(/-/g, '/');
}

function isSessionFileName(name: string): boolean {
  // agent-* files are side-chain transcripts of sub-agents, not the user's conversation
  return name.endsWith('.jsonl') && !name.startsWith('agent-');
}

function statMtime(path: string): number {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return 0;
  }
}

function listSessionFiles(dir: string, project: string): SessionFile[] {
  let names: string[];
  try {
    names = readdirSync(dir);
  } catch {
    return [];
  }

  return names.filter(isSessionFileName).map((name) => {
    const path = join(dir, name);
    return {
      path,
      sessionId: name.slice(0, -'.jsonl'.length),
      project,
      mtime: statMtime(path),
    };
  });
}

/**
 * Find session files under a log location.
 *
 * Accepts a single .jsonl file, a directory holding .jsonl files, or a projects
 * root with one directory per project. A missing path yields no files.
 * The result is ordered oldest first (mtime, then path).
 */
export function discoverSessionFiles(location: string, options: DiscoverOptions = {}): SessionFile[] {
  if (!existsSync(location)) {
    return [];
  }

  let files: SessionFile[] = [];

  let isDirectory: boolean;
  try {
    isDirectory = statSync(location).isDirectory();
  } catch {
    return [];
  }

  if (!isDirectory) {
    if (!location.endsWith('.jsonl')) return [];
    const name = basename(location);
    files.push({
      path: location,
      sessionId: name.slice(0, -'.jsonl'.length),
      project: '',
      mtime: statMtime(location),
    });
  } else {
    files.push(...listSessionFiles(location, basename(location)));

    try {
      const entries = readdirSync(location, { withFileTypes: true });
      for (const entry of entries) {
        if (!entry.isDirectory()) continue;
        if (entry.name.startsWith('.')) continue;
        files.push(...listSessionFiles(join(location, entry.name), entry.name));
      }
    } catch {
      // Unreadable root: whatever was listed so far is all we get
    }
  }

  if (options.project) {
    const filter = options.project;
    files = files.filter((f) => f.project.includes(filter) || desanitizeProjectPath(f.project).includes(filter));
  }

  if (options.limit !== undefined && options.limit >= 0 && files.length > options.limit) {
    files = [...files]
      .sort((a, b) => b.mtime - a.mtime || a.path.localeCompare(b.path))
      .slice(0, options.limit);
  }

  return files.sort((a, b) => a.mtime - b.mtime || a.path.localeCompare(b.path));
}
