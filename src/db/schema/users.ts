import { pgTable, uuid, text, timestamp, boolean, bigint, integer, index, unique } from 'drizzle-orm/pg-core';

// Users and sessions are owned by the auth layer; the engine only reads them.

export const usageGroups = pgTable('usage_groups', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull().unique(),
  description: text('description'),

  // Shared across all modules over a trailing 7-day window. Null means unlimited.
  tokenBudget: bigint('token_budget', { mode: 'number' }),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const usageGroupLimits = pgTable('usage_group_limits', {
  id: uuid('id').primaryKey().defaultRandom(),
  groupId: uuid('group_id').notNull().references(() => usageGroups.id, { onDelete: 'cascade' }),
  moduleKey: text('module_key').notNull(),

  unitCap: bigint('unit_cap', { mode: 'number' }),
  // Null counts units over the lifetime of the account.
  unitWindowDays: integer('unit_window_days'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  unique('uq_usage_group_limits_group_module').on(table.groupId, table.moduleKey),
]);

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: text('email').notNull().unique(),
  displayName: text('display_name'),
  isAdmin: boolean('is_admin').notNull().default(false),
  usageGroupId: uuid('usage_group_id').notNull().references(() => usageGroups.id),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const sessions = pgTable('sessions', {
  token: text('token').primaryKey(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_sessions_user').on(table.userId),
]);
