/**
 * Temporary directories for filesystem tests
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export class TempDir {
  private readonly dirs: string[] = [];

  /** Create a fresh directory under the OS temp dir */
  async create(prefix: string = 'claude-tune-test-'): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), prefix));
    this.dirs.push(dir);
    return dir;
  }

  /** Remove every directory created by this instance */
  async cleanupAll(): Promise<void> {
    const dirs = this.dirs.splice(0);
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  }
}
