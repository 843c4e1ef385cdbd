import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createTestDatabase, resetDatabase, seedUser, type TestDatabase } from '../../test/db.js';
import { TestClock } from '../../test/clock.js';
import { UsageLedger } from './index.js';

describe('UsageLedger', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let ledger: UsageLedger;
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
    ledger = new UsageLedger(testDb.db, clock.now);
    ({ userId } = await seedUser(testDb.db));
  });

  it('sums tokens across modules from the window start', async () => {
    await ledger.record({ userId, moduleKey: 'summarizer', units: 1, inputTokens: 100, outputTokens: 20 });
    clock.advanceHours(1);
    await ledger.record({ userId, moduleKey: 'grader', units: 1, inputTokens: 300, outputTokens: 80 });

    expect(await ledger.tokensSince(userId, new Date('2025-03-10T12:00:00.000Z'))).toBe(500);
    expect(await ledger.tokensSince(userId, new Date('2025-03-10T12:30:00.000Z'))).toBe(380);
  });

  it('sums units for one module only', async () => {
    await ledger.record({ userId, moduleKey: 'translator', units: 3, inputTokens: 1, outputTokens: 1 });
    await ledger.record({ userId, moduleKey: 'translator', units: 2, inputTokens: 1, outputTokens: 1 });
    await ledger.record({ userId, moduleKey: 'grader', units: 1, inputTokens: 1, outputTokens: 1 });

    expect(await ledger.unitsFor(userId, 'translator', null)).toBe(5);
    expect(await ledger.unitsFor(userId, 'info-extract', null)).toBe(0);
  });

  it('prices events and reports a weekly summary', async () => {
    await ledger.record({
      userId,
      moduleKey: 'summarizer',
      units: 1,
      model: 'claude-sonnet-4-20250514',
      inputTokens: 1_000_000,
      outputTokens: 100_000,
    });
    clock.advance(8 * 24 * 60 * 60 * 1000);
    await ledger.record({ userId, moduleKey: 'grader', units: 1, inputTokens: 40, outputTokens: 10 });

    const summary = await ledger.summary(userId);

    expect(summary.tokensInWindow).toBe(50);
    expect(summary.costUsdInWindow).toBe(0);
    expect(summary.modules).toEqual([
      { moduleKey: 'grader', units: 1, unitsSince: null, tokens: 50 },
      { moduleKey: 'summarizer', units: 1, unitsSince: null, tokens: 1_100_000 },
    ]);
  });

  it('reports module units over the window their cap is checked against', async () => {
    await ledger.record({ userId, moduleKey: 'translator', units: 3, inputTokens: 10, outputTokens: 0 });
    clock.advance(10 * 24 * 60 * 60 * 1000);
    await ledger.record({ userId, moduleKey: 'translator', units: 2, inputTokens: 10, outputTokens: 0 });
    await ledger.record({ userId, moduleKey: 'grader', units: 1, inputTokens: 10, outputTokens: 0 });

    const summary = await ledger.summary(userId, new Map([['translator', 7]]));

    expect(summary.modules).toEqual([
      { moduleKey: 'grader', units: 1, unitsSince: null, tokens: 10 },
      { moduleKey: 'translator', units: 2, unitsSince: new Date(clock.now().getTime() - 7 * 24 * 60 * 60 * 1000), tokens: 20 },
    ]);
    expect(await ledger.unitsFor(userId, 'translator', null)).toBe(5);
  });

  it('records the priced cost of an event', async () => {
    await ledger.record({
      userId,
      moduleKey: 'summarizer',
      units: 0,
      model: 'claude-sonnet-4-20250514',
      inputTokens: 1_000_000,
      outputTokens: 100_000,
    });

    const summary = await ledger.summary(userId);
    expect(summary.costUsdInWindow).toBe(4.5);
  });

  it('rejects negative amounts', async () => {
    await expect(ledger.record({ userId, moduleKey: 'grader', units: -1, inputTokens: 0, outputTokens: 0 }))
      .rejects.toBeInstanceOf(RangeError);
  });
});
