import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { TestClock } from '../../test/clock.js';
import { createTestDatabase, resetDatabase, seedUser, type TestDatabase } from '../../test/db.js';
import { SessionService } from './index.js';

describe('SessionService', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let sessions: SessionService;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDatabase(testDb.db);
    clock = new TestClock();
    sessions = new SessionService(testDb.db, clock.now);
  });

  it('resolves a live token to its user', async () => {
    const { userId } = await seedUser(testDb.db, {
      email: 'admin@example.test',
      isAdmin: true,
      sessionToken: 'test-secret',
      sessionExpiresAt: new Date('2025-03-11T00:00:00.000Z'),
    });

    expect(await sessions.resolve('test-secret')).toEqual({ id: userId, email: 'admin@example.test', isAdmin: true });
  });

  it('ignores unknown and expired tokens', async () => {
    await seedUser(testDb.db, { sessionToken: 'test-expiring', sessionExpiresAt: new Date('2025-03-10T13:00:00.000Z') });

    expect(await sessions.resolve('test-unknown')).toBeNull();
    clock.advanceHours(2);
    expect(await sessions.resolve('test-expiring')).toBeNull();
  });
});
