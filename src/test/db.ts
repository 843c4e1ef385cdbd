import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { sql } from 'drizzle-orm';
import { schema, type Database } from '../db/index.js';
import { runMigrations } from '../db/migrate.js';

export interface TestDatabase {
  db: Database;
  close(): Promise<void>;
}

/** In-process Postgres with the real migrations applied. */
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await runMigrations(db);
  return { db, close: () => client.close() };
}

export async function resetDatabase(db: Database): Promise<void> {
  await db.execute(sql.raw(
    'TRUNCATE usage_events, job_items, jobs, user_job_history, module_configs, journal_topic_scores, journals, journal_topics, glossary_terms, sessions, users, usage_group_limits, usage_groups CASCADE',
  ));
}

export interface SeedUserOptions {
  email?: string;
  isAdmin?: boolean;
  tokenBudget?: number | null;
  limits?: { moduleKey: string; unitCap: number | null; unitWindowDays?: number | null }[];
  sessionToken?: string;
  sessionExpiresAt?: Date;
}

export interface SeededUser {
  userId: string;
  groupId: string;
  token: string;
}

let seedCounter = 0;

export async function seedUser(db: Database, options: SeedUserOptions = {}): Promise<SeededUser> {
  seedCounter += 1;

  const [group] = await db
    .insert(schema.usageGroups)
    .values({ name: `group-${seedCounter}`, tokenBudget: options.tokenBudget ?? null })
    .returning();

  for (const limit of options.limits ?? []) {
    await db.insert(schema.usageGroupLimits).values({
      groupId: group.id,
      moduleKey: limit.moduleKey,
      unitCap: limit.unitCap,
      unitWindowDays: limit.unitWindowDays ?? null,
    });
  }

  const [user] = await db
    .insert(schema.users)
    .values({
      email: options.email ?? `user-${seedCounter}@example.test`,
      isAdmin: options.isAdmin ?? false,
      usageGroupId: group.id,
    })
    .returning();

  const token = options.sessionToken ?? `test-session-${seedCounter}`;
  await db.insert(schema.sessions).values({
    token,
    userId: user.id,
    expiresAt: options.sessionExpiresAt ?? new Date(Date.now() + 24 * 60 * 60 * 1000),
  });

  return { userId: user.id, groupId: group.id, token };
}
