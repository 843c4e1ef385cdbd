import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { join, resolve, sep } from 'path';
import { StorageError } from './errors.js';

export type RemovalOutcome = 'removed' | 'missing';

/**
 * On-disk layout for job files: `<root>/<moduleKey>/<jobId>/<file>`.
 * Every operation wraps I/O failures in `StorageError`.
 */
export class ArtifactStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  jobDirectory(moduleKey: string, jobId: string): string {
    return this.contained(join(this.root, moduleKey, jobId));
  }

  async writeText(moduleKey: string, jobId: string, fileName: string, content: string): Promise<string> {
    return this.writeBuffer(moduleKey, jobId, fileName, Buffer.from(content, 'utf-8'));
  }

  async writeBuffer(moduleKey: string, jobId: string, fileName: string, data: Buffer | Uint8Array): Promise<string> {
    const dir = this.jobDirectory(moduleKey, jobId);
    const path = this.contained(join(dir, fileName));
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(path, data);
    } catch (error) {
      throw new StorageError('write', path, error);
    }
    return path;
  }

  async appendSection(path: string, heading: string, body: string): Promise<void> {
    const target = this.contained(resolve(path));
    try {
      await writeFile(target, `${heading}\n\n${body.trim()}\n\n`, { flag: 'a' });
    } catch (error) {
      throw new StorageError('append', target, error);
    }
  }

  async read(path: string): Promise<Buffer> {
    const target = this.contained(resolve(path));
    try {
      return await readFile(target);
    } catch (error) {
      throw new StorageError('read', target, error);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.contained(resolve(path)));
      return true;
    } catch {
      return false;
    }
  }

  async removeJobDirectory(moduleKey: string, jobId: string): Promise<RemovalOutcome> {
    const dir = this.jobDirectory(moduleKey, jobId);
    try {
      await stat(dir);
    } catch (error) {
      if (isNotFound(error)) return 'missing';
      throw new StorageError('stat', dir, error);
    }

    try {
      await rm(dir, { recursive: true });
    } catch (error) {
      throw new StorageError('remove', dir, error);
    }
    return 'removed';
  }

  private contained(path: string): string {
    if (path !== this.root && !path.startsWith(this.root + sep)) {
      throw new StorageError('resolve', path, new Error('path escapes the storage root'));
    }
    return path;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
