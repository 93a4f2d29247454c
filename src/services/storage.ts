/**
 * Storage root for generated packages and uploaded media.
 *
 * One flat directory shared by every request. Names are plain file names:
 * anything that could address a path outside the root is refused.
 */

import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

export class UnsafeFilenameError extends Error {
  constructor(readonly filename: string) {
    super(`Invalid filename: ${JSON.stringify(filename)}`);
    this.name = 'UnsafeFilenameError';
  }
}

export function isSafeFilename(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 255 &&
    name !== '.' &&
    name !== '..' &&
    !/[/\\\0]/.test(name) &&
    path.basename(name) === name
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class Storage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /** Create the root directory if it does not exist yet */
  async init(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  resolve(filename: string): string {
    if (!isSafeFilename(filename)) {
      throw new UnsafeFilenameError(filename);
    }
    return path.join(this.root, filename);
  }

  /** Read a file, or null when it does not exist */
  async read(filename: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await fs.readFile(this.resolve(filename)));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(filename: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(filename));
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Write bytes under `filename`, replacing any existing file.
   * The data goes to a temporary sibling first and is renamed into place,
   * so readers never see a partially written file.
   */
  async write(filename: string, data: Uint8Array): Promise<void> {
    const target = this.resolve(filename);
    const temporary = path.join(this.root, `.${filename}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await fs.writeFile(temporary, data);
      await fs.rename(temporary, target);
    } catch (error) {
      await fs.rm(temporary, { force: true });
      throw error;
    }
  }
}
