import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';

export class DocumentWriteError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot write ${path}${reason}`, options);
    this.name = 'DocumentWriteError';
  }
}

export class DocumentReadError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot read ${path}${reason}`, options);
    this.name = 'DocumentReadError';
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a UTF-8 text file; a missing file reads as null.
 */
export function readTextFile(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new DocumentReadError(path, { cause: error });
  }
}

/**
 * Write through a sibling temp file and rename it over the target, so readers
 * see either the old or the new content. On failure the temp file is removed
 * and the target is left as it was.
 */
export function writeFileAtomic(path: string, content: string): void {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, path);
  } catch (error) {
    try {
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    } catch {
      // report the write error, not the cleanup one
    }
    throw new DocumentWriteError(path, { cause: error });
  }
}

/**
 * Copy an existing file to `<path>.backup`. Returns the backup path, or null when
 * there was nothing to back up.
 */
export function backupFile(path: string): string | null {
  if (!existsSync(path)) return null;
  const backupPath = `${path}.backup`;
  try {
    copyFileSync(path, backupPath);
  } catch (error) {
    throw new DocumentWriteError(backupPath, { cause: error });
  }
  return backupPath;
}
