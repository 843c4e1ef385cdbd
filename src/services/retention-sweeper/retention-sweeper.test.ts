import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { randomUUID } from 'crypto';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { StorageError } from '../../lib/errors.js';
import { ArtifactStorage, type RemovalOutcome } from '../../lib/storage.js';
import { TestClock } from '../../test/clock.js';
import { createTestDatabase, resetDatabase, seedUser, type TestDatabase } from '../../test/db.js';
import { JobStore } from '../job-store/index.js';
import { RetentionSweeper } from './index.js';

class LockedStorage extends ArtifactStorage {
  readonly locked = new Set<string>();

  override async removeJobDirectory(moduleKey: string, jobId: string): Promise<RemovalOutcome> {
    if (this.locked.has(jobId)) {
      throw new StorageError('remove', this.jobDirectory(moduleKey, jobId), new Error('resource busy'));
    }
    return super.removeJobDirectory(moduleKey, jobId);
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('RetentionSweeper', () => {
  let testDb: TestDatabase;
  let root: string;
  let clock: TestClock;
  let store: JobStore;
  let storage: LockedStorage;
  let sweeper: RetentionSweeper;
  let userId: string;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDatabase(testDb.db);
    root = await mkdtemp(join(tmpdir(), 'sweeper-test-'));
    clock = new TestClock();
    store = new JobStore(testDb.db, clock.now);
    storage = new LockedStorage(root);
    sweeper = new RetentionSweeper(store, storage, 24, clock.now);
    ({ userId } = await seedUser(testDb.db));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  /** A job with one item output and one artifact on disk, left in `status`. */
  async function jobWithFiles(status: 'completed' | 'failed' | 'processing' = 'completed'): Promise<string> {
    const id = randomUUID();
    await store.createJob({
      id,
      userId,
      moduleKey: 'summarizer',
      payload: {},
      items: [{ ordinal: 1, label: 'a.txt', input: { document: 0 } }],
    });
    await store.claim(id, 'Starting');

    const [item] = await store.getItems(id);
    await store.beginAttempt(item.id);
    const itemPath = await storage.writeText('summarizer', id, 'summary_001.txt', 'summary');
    await store.completeItem(item.id, { resultText: 'summary', outputPath: itemPath, tokensUsed: 15 });

    if (status !== 'processing') {
      const artifact = await storage.writeText('summarizer', id, 'combined_summary.txt', 'combined');
      await store.finish(id, { status, detail: 'Done', artifacts: { 'combined_summary.txt': artifact } });
    }
    return id;
  }

  it('purges terminal jobs older than the retention period', async () => {
    const jobId = await jobWithFiles();
    clock.advanceHours(25);

    expect(await sweeper.sweep()).toEqual({ scanned: 1, purged: 1, skipped: 0 });

    expect(await exists(join(root, 'summarizer', jobId))).toBe(false);
    const job = await store.getJob(jobId);
    expect(job?.filesPurgedAt?.toISOString()).toBe('2025-03-11T13:00:00.000Z');
    expect(job?.artifacts).toBeNull();
    expect(job?.status).toBe('completed');

    const [item] = await store.getItems(jobId);
    expect(item.outputPath).toBeNull();
    expect(item.resultText).toBe('summary');
  });

  it('is idempotent', async () => {
    await jobWithFiles('failed');
    clock.advanceHours(25);

    await sweeper.sweep();
    expect(await sweeper.sweep()).toEqual({ scanned: 0, purged: 0, skipped: 0 });
  });

  it('keeps jobs inside the retention period and jobs still running', async () => {
    const running = await jobWithFiles('processing');
    clock.advanceHours(2);
    const recent = await jobWithFiles();
    clock.advanceHours(23);

    expect(await sweeper.sweep()).toEqual({ scanned: 0, purged: 0, skipped: 0 });
    expect(await exists(join(root, 'summarizer', recent))).toBe(true);
    expect(await exists(join(root, 'summarizer', running))).toBe(true);
  });

  it('marks a job purged when its directory is already gone', async () => {
    const jobId = await jobWithFiles();
    await rm(join(root, 'summarizer', jobId), { recursive: true });
    clock.advanceHours(25);

    expect(await sweeper.sweep()).toEqual({ scanned: 1, purged: 1, skipped: 0 });
    expect((await store.getJob(jobId))?.filesPurgedAt).not.toBeNull();
  });

  it('skips a job whose files cannot be removed and retries it on the next sweep', async () => {
    const locked = await jobWithFiles();
    const free = await jobWithFiles();
    storage.locked.add(locked);
    clock.advanceHours(25);

    expect(await sweeper.sweep()).toEqual({ scanned: 2, purged: 1, skipped: 1 });
    expect((await store.getJob(locked))?.filesPurgedAt).toBeNull();
    expect((await store.getJob(locked))?.artifacts).not.toBeNull();
    expect((await store.getJob(free))?.filesPurgedAt).not.toBeNull();

    storage.locked.clear();
    expect(await sweeper.sweep()).toEqual({ scanned: 1, purged: 1, skipped: 0 });
  });

  it('joins a sweep already in progress', async () => {
    await jobWithFiles();
    clock.advanceHours(25);

    const first = sweeper.sweep();
    const second = sweeper.sweep();

    expect(second).toBe(first);
    expect(await first).toEqual({ scanned: 1, purged: 1, skipped: 0 });
  });
});
