import { pgTable, bigserial, uuid, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { users } from './users.js';

// A pointer to a job, not a cache of it: status is always read from `jobs`.
export const userJobHistory = pgTable('user_job_history', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  moduleKey: text('module').notNull(),
  jobKey: text('job_key').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('idx_user_job_history_module_key').on(table.moduleKey, table.jobKey),
  index('idx_user_job_history_user_module_created').on(table.userId, table.moduleKey, table.createdAt),
]);
