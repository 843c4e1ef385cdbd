import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { randomUUID } from 'crypto';
import { eq } from 'drizzle-orm';
import { schema } from '../../db/index.js';
import { createTestDatabase, resetDatabase, seedUser, type TestDatabase } from '../../test/db.js';
import { TestClock } from '../../test/clock.js';
import { JobStore } from './index.js';

describe('JobStore', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let store: JobStore;
  let userId: string;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDatabase(testDb.db);
    clock = new TestClock();
    store = new JobStore(testDb.db, clock.now);
    ({ userId } = await seedUser(testDb.db));
  });

  async function createJob(itemCount = 2) {
    const id = randomUUID();
    await store.createJob({
      id,
      userId,
      moduleKey: 'summarizer',
      payload: { documents: [] },
      items: Array.from({ length: itemCount }, (_, i) => ({ ordinal: i + 1, label: `doc-${i + 1}`, input: { index: i } })),
    });
    return id;
  }

  it('creates a pending job with its round 1 items', async () => {
    const id = await createJob(3);
    const job = await store.getJob(id);
    const items = await store.getItems(id);

    expect(job?.status).toBe('pending');
    expect(job?.createdAt.toISOString()).toBe('2025-03-10T12:00:00.000Z');
    expect(items.map(i => [i.round, i.ordinal, i.status])).toEqual([
      [1, 1, 'pending'],
      [1, 2, 'pending'],
      [1, 3, 'pending'],
    ]);
  });

  it('claims a pending job exactly once', async () => {
    const id = await createJob();

    const first = await store.claim(id, 'Starting');
    const second = await store.claim(id, 'Starting');

    expect(first?.status).toBe('processing');
    expect(second).toBeNull();
  });

  it('keeps terminal jobs terminal', async () => {
    const id = await createJob();
    await store.claim(id, 'Starting');

    expect(await store.finish(id, { status: 'completed', detail: 'Done' })).toBe(true);
    expect(await store.fail(id, 'late failure')).toBe(false);
    expect(await store.finish(id, { status: 'completed', detail: 'Again' })).toBe(false);

    const job = await store.getJob(id);
    expect(job?.status).toBe('completed');
    expect(job?.statusDetail).toBe('Done');
    expect(job?.errorMessage).toBeNull();
  });

  it('counts attempts and guards item completion', async () => {
    const id = await createJob(1);
    const [item] = await store.getItems(id);

    expect(await store.beginAttempt(item.id)).toBe(1);
    expect(await store.beginAttempt(item.id)).toBe(2);
    expect(await store.completeItem(item.id, { resultText: 'ok', outputPath: '/tmp/x', tokensUsed: 15 })).toBe(true);
    expect(await store.failItem(item.id, 'late')).toBe(false);
    await expect(store.beginAttempt(item.id)).rejects.toThrow(/no longer runnable/);

    const [after] = await store.getItems(id);
    expect(after).toMatchObject({ status: 'completed', attemptCount: 2, resultText: 'ok', tokensUsed: 15 });
  });

  it('accumulates usage on the job', async () => {
    const id = await createJob();
    await store.addUsage(id, 1, 120);
    await store.addUsage(id, 2, 30);

    const job = await store.getJob(id);
    expect(job?.usageDelta).toBe(3);
    expect(job?.tokensUsed).toBe(150);
  });

  it('purges only terminal jobs, once', async () => {
    const id = await createJob(1);
    const [item] = await store.getItems(id);

    expect(await store.markPurged(id)).toBe(false);

    await store.claim(id, 'Starting');
    await store.beginAttempt(item.id);
    await store.completeItem(item.id, { resultText: 'ok', outputPath: '/tmp/out.txt', tokensUsed: 1 });
    await store.finish(id, { status: 'completed', detail: 'Done', artifacts: { 'combined.txt': '/tmp/c.txt' } });

    clock.advanceHours(25);
    expect(await store.markPurged(id)).toBe(true);
    expect(await store.markPurged(id)).toBe(false);

    const job = await store.getJob(id);
    const [purgedItem] = await store.getItems(id);
    expect(job?.filesPurgedAt?.toISOString()).toBe('2025-03-11T13:00:00.000Z');
    expect(job?.artifacts).toBeNull();
    expect(job?.status).toBe('completed');
    expect(purgedItem.outputPath).toBeNull();
  });

  it('rejects a purge stamp on an in-flight job at the database level', async () => {
    const id = await createJob();
    await expect(
      testDb.db.update(schema.jobs).set({ filesPurgedAt: clock.now() }).where(eq(schema.jobs.id, id)),
    ).rejects.toThrow();
  });

  it('fails the unfinished items of a job and leaves finished ones alone', async () => {
    const id = await createJob(3);
    const [first, second] = await store.getItems(id);
    await store.claim(id, 'Starting');
    await store.beginAttempt(first.id);
    await store.completeItem(first.id, { resultText: 'ok', outputPath: null, tokensUsed: 1 });
    await store.beginAttempt(second.id);

    expect(await store.failUnfinishedItems(id, 'stopped')).toBe(2);
    expect(await store.failUnfinishedItems(id, 'stopped again')).toBe(0);

    const items = await store.getItems(id);
    expect(items.map(i => [i.status, i.errorMessage])).toEqual([
      ['completed', null],
      ['failed', 'stopped'],
      ['failed', 'stopped'],
    ]);
  });

  it('keeps a user with jobs from being deleted', async () => {
    await createJob(1);
    await expect(testDb.db.delete(schema.users).where(eq(schema.users.id, userId))).rejects.toThrow();
    expect(await testDb.db.select().from(schema.jobs)).toHaveLength(1);
  });

  it('finds aged terminal jobs that are not yet purged', async () => {
    const oldId = await createJob(0);
    await store.fail(oldId, 'bad input');
    clock.advanceHours(2);
    const recentId = await createJob(0);
    await store.fail(recentId, 'bad input');
    const pendingId = await createJob(0);

    const cutoff = new Date('2025-03-10T13:00:00.000Z');
    const candidates = await store.findPurgeCandidates(cutoff);

    expect(candidates.map(j => j.id)).toEqual([oldId]);
    expect(candidates.map(j => j.id)).not.toContain(recentId);
    expect(candidates.map(j => j.id)).not.toContain(pendingId);
  });
});
