import { pgTable, text, timestamp, jsonb } from 'drizzle-orm/pg-core';

export const moduleConfigs = pgTable('module_configs', {
  moduleKey: text('module_key').primaryKey(),
  models: jsonb('models').$type<Record<string, string>>().notNull().default({}),
  prompts: jsonb('prompts').$type<Record<string, string>>().notNull().default({}),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
