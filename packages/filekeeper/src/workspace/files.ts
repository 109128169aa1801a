/**
 * Workspace Files
 *
 * Reads and writes working copies under the workspace root. Paths are
 * always workspace-relative POSIX paths; anything that escapes the root or
 * points into the data directory is rejected.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { dirname, isAbsolute, join, posix } from 'node:path';

import { ValidationFailureError } from '../errors.js';

export class WorkspaceFiles {
  constructor(
    readonly rootDir: string,
    private readonly dataDir: string
  ) {}

  /**
   * Canonical workspace-relative form of a path
   */
  normalize(path: string): string {
    const problems: string[] = [];
    const slashed = path.replace(/\\/g, '/').trim();
    if (slashed.length === 0) {
      problems.push('path is empty');
    }
    if (isAbsolute(slashed) || slashed.startsWith('/')) {
      problems.push('path must be relative to the workspace root');
    }
    const normalized = posix.normalize(slashed).replace(/^\.\//, '').replace(/\/$/, '');
    if (normalized === '..' || normalized.startsWith('../')) {
      problems.push('path escapes the workspace root');
    }
    const dataPrefix = posix.normalize(this.dataDir.replace(/\\/g, '/')).replace(/\/$/, '');
    if (normalized === dataPrefix || normalized.startsWith(`${dataPrefix}/`)) {
      problems.push('path is inside the data directory');
    }
    if (normalized === '.' && problems.length === 0) {
      problems.push('path names the workspace root');
    }
    if (problems.length > 0) {
      throw new ValidationFailureError(`Invalid path "${path}"`, problems);
    }
    return normalized;
  }

  absolute(path: string): string {
    return join(this.rootDir, path);
  }

  async read(path: string): Promise<string> {
    return readFile(this.absolute(path), 'utf8');
  }

  /** Null when the file does not exist */
  async readIfExists(path: string): Promise<string | null> {
    try {
      return await this.read(path);
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Write through a temp file and rename, so readers never see a torn file
   */
  async write(path: string, content: string): Promise<void> {
    const target = this.absolute(path);
    const tmpPath = `${target}.${randomBytes(4).toString('hex')}.tmp`;
    await mkdir(dirname(target), { recursive: true });

    try {
      const handle = await open(tmpPath, 'w');
      try {
        await handle.writeFile(content, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, target);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }

  async remove(path: string): Promise<void> {
    await rm(this.absolute(path), { force: true });
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
