import { homedir } from 'os';
import { join } from 'path';

/**
 * Home directory, preferring HOME (USERPROFILE on Windows) over os.homedir()
 * so tests can point it at a temp directory.
 */
export function getHomeDir(): string {
  const fromEnv = process.platform === 'win32' ? process.env['USERPROFILE'] || process.env['HOME'] : process.env['HOME'];
  return fromEnv || homedir();
}

/**
 * Expand a leading `~` in paths given on the command line or in the environment.
 */
export function expandPath(path: string): string {
  if (path === '~') return getHomeDir();
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(getHomeDir(), path.slice(2));
  }
  return path;
}
