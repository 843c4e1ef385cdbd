import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ArtifactStorage } from './storage.js';
import { StorageError } from './errors.js';

describe('ArtifactStorage', () => {
  let root: string;
  let storage: ArtifactStorage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'storage-test-'));
    storage = new ArtifactStorage(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes files under the module and job directory', async () => {
    const path = await storage.writeText('summarizer', 'job-1', 'summary_001.txt', 'hello');

    expect(path).toBe(join(root, 'summarizer', 'job-1', 'summary_001.txt'));
    expect(await readFile(path, 'utf-8')).toBe('hello');
  });

  it('appends sections with a blank line after each', async () => {
    const path = await storage.writeText('summarizer', 'job-1', 'combined_summary.txt', '');
    await storage.appendSection(path, '## 1. a.pdf', 'First.\n');
    await storage.appendSection(path, '## 2. b.pdf', 'Second.');

    expect(await readFile(path, 'utf-8')).toBe('## 1. a.pdf\n\nFirst.\n\n## 2. b.pdf\n\nSecond.\n\n');
  });

  it('refuses paths outside the root', async () => {
    await expect(storage.writeText('..', '..', 'escape.txt', 'x')).rejects.toBeInstanceOf(StorageError);
    await expect(storage.read('/etc/hostname')).rejects.toBeInstanceOf(StorageError);
  });

  it('removes a job directory and reports a missing one', async () => {
    const path = await storage.writeText('grader', 'job-2', 'report.txt', 'x');

    expect(await storage.removeJobDirectory('grader', 'job-2')).toBe('removed');
    expect(await storage.exists(path)).toBe(false);
    expect(await storage.removeJobDirectory('grader', 'job-2')).toBe('missing');
  });
});
