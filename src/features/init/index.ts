/**
 * CLAUDE.md generation for `init`
 */

import { backupFile, writeFileAtomic } from '../../utils/files.js';

export interface InitWriteResult {
  path: string;
  /** Where the previous file was copied to, if there was one */
  backupPath: string | null;
}

/**
 * Back up any existing file at `path`, then write the new content atomically.
 */
export function writeClaudeMd(path: string, content: string): InitWriteResult {
  const backupPath = backupFile(path);
  writeFileAtomic(path, content);
  return { path, backupPath };
}

export * from './questions.js';
export { generateClaudeMd, type LearnedContext } from './template.js';
