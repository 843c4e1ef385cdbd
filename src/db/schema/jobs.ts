import { pgTable, uuid, text, timestamp, jsonb, integer, bigint, index, unique } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { jobStatusEnum } from './enums.js';

export const jobs = pgTable('jobs', {
  id: uuid('id').primaryKey(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'restrict' }),
  moduleKey: text('module_key').notNull(),

  status: jobStatusEnum('status').notNull().default('pending'),
  statusDetail: text('status_detail'),
  errorMessage: text('error_message'),

  payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
  result: jsonb('result').$type<Record<string, unknown>>(),
  // Artifact name -> absolute path. Nulled when the job is purged.
  artifacts: jsonb('artifacts').$type<Record<string, string>>(),

  usageDelta: bigint('usage_delta', { mode: 'number' }).notNull().default(0),
  tokensUsed: bigint('tokens_used', { mode: 'number' }).notNull().default(0),

  filesPurgedAt: timestamp('files_purged_at', { withTimezone: true }),
  startedAt: timestamp('started_at', { withTimezone: true }),
  completedAt: timestamp('completed_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_jobs_user_created').on(table.userId, table.createdAt),
  index('idx_jobs_retention').on(table.status, table.filesPurgedAt, table.createdAt),
]);

export const jobItems = pgTable('job_items', {
  id: uuid('id').primaryKey().defaultRandom(),
  jobId: uuid('job_id').notNull().references(() => jobs.id, { onDelete: 'cascade' }),

  round: integer('round').notNull(),
  ordinal: integer('ordinal').notNull(),
  label: text('label').notNull(),

  status: jobStatusEnum('status').notNull().default('pending'),
  statusDetail: text('status_detail'),
  attemptCount: integer('attempt_count').notNull().default(0),

  input: jsonb('input').$type<Record<string, unknown>>().notNull(),
  resultText: text('result_text'),
  outputPath: text('output_path'),
  errorMessage: text('error_message'),
  tokensUsed: bigint('tokens_used', { mode: 'number' }).notNull().default(0),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  unique('uq_job_items_position').on(table.jobId, table.round, table.ordinal),
  index('idx_job_items_job_status').on(table.jobId, table.status),
]);
