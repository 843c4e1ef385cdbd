import { pgTable, uuid, text, timestamp, bigint, numeric, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';

// Append-only: rows are never updated or deleted.
export const usageEvents = pgTable('usage_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'restrict' }),
  moduleKey: text('module_key').notNull(),
  jobId: uuid('job_id'),

  tokens: bigint('tokens', { mode: 'number' }).notNull().default(0),
  units: bigint('units', { mode: 'number' }).notNull().default(0),

  inputTokens: bigint('input_tokens', { mode: 'number' }).notNull().default(0),
  outputTokens: bigint('output_tokens', { mode: 'number' }).notNull().default(0),
  costUsd: numeric('cost_usd', { precision: 12, scale: 6 }).notNull().default('0'),

  occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_usage_events_user_time').on(table.userId, table.occurredAt),
  index('idx_usage_events_user_module_time').on(table.userId, table.moduleKey, table.occurredAt),
]);
