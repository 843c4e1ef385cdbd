import { pgTable, uuid, text, timestamp, doublePrecision, smallint, primaryKey, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// Admin-maintained lookup data that tools read at the start of a run.

export const glossaryTerms = pgTable('glossary_terms', {
  id: uuid('id').primaryKey().defaultRandom(),
  sourceTerm: text('source_term').notNull().unique(),
  targetTerm: text('target_term').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const journalTopics = pgTable('journal_topics', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const journals = pgTable('journals', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull().unique(),
  referenceMark: text('reference_mark'),
  // Lowest grading score at which the journal is worth recommending.
  lowBound: doublePrecision('low_bound').notNull(),
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  check('ck_journals_low_bound', sql`${table.lowBound} >= 0`),
]);

// Only non-zero scores are stored; a missing row means 0.
export const journalTopicScores = pgTable('journal_topic_scores', {
  journalId: uuid('journal_id').notNull().references(() => journals.id, { onDelete: 'cascade' }),
  topicId: uuid('topic_id').notNull().references(() => journalTopics.id, { onDelete: 'cascade' }),
  score: smallint('score').notNull(),
}, (table) => [
  primaryKey({ columns: [table.journalId, table.topicId] }),
  check('ck_journal_topic_scores_score', sql`${table.score} BETWEEN 1 AND 2`),
]);
