import { asc, eq, inArray } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

export interface GlossaryTerm {
  id: string;
  sourceTerm: string;
  targetTerm: string;
}

export interface JournalTopic {
  id: string;
  name: string;
  description: string | null;
}

export interface JournalEntry {
  id: string;
  name: string;
  referenceMark: string | null;
  lowBound: number;
  notes: string | null;
  /** Topic name to fit score (1 or 2). Topics the journal does not cover are absent. */
  topicScores: Record<string, number>;
}

/** Everything a tool reads from the reference tables, loaded once per run. */
export interface ReferenceData {
  glossary: GlossaryTerm[];
  topics: JournalTopic[];
  journals: JournalEntry[];
}

export const EMPTY_REFERENCE_DATA: ReferenceData = { glossary: [], topics: [], journals: [] };

export interface JournalInput {
  name: string;
  referenceMark?: string | null;
  lowBound: number;
  notes?: string | null;
  /** Topic name to score 0..2; a 0 removes the pairing. */
  topicScores?: Record<string, number>;
}

/**
 * Admin-maintained glossary and journal catalogue. The translator reads the
 * glossary; the grader reads topics and journals for recommendations.
 */
export class ReferenceDataService {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  async snapshot(): Promise<ReferenceData> {
    const [glossary, topics, journals] = await Promise.all([
      this.listGlossary(),
      this.listTopics(),
      this.listJournals(),
    ]);
    return { glossary, topics, journals };
  }

  // ── Glossary ──

  async listGlossary(): Promise<GlossaryTerm[]> {
    return this.db
      .select({
        id: schema.glossaryTerms.id,
        sourceTerm: schema.glossaryTerms.sourceTerm,
        targetTerm: schema.glossaryTerms.targetTerm,
      })
      .from(schema.glossaryTerms)
      .orderBy(asc(schema.glossaryTerms.sourceTerm));
  }

  /** Adds a term, or replaces the translation of an existing source term. */
  async upsertGlossaryTerm(sourceTerm: string, targetTerm: string): Promise<GlossaryTerm> {
    const source = sourceTerm.trim();
    const target = targetTerm.trim();
    if (!source || !target) throw new ValidationError('Glossary terms cannot be blank');

    const [row] = await this.db
      .insert(schema.glossaryTerms)
      .values({ sourceTerm: source, targetTerm: target, createdAt: this.clock() })
      .onConflictDoUpdate({ target: schema.glossaryTerms.sourceTerm, set: { targetTerm: target } })
      .returning();

    logger.info({ sourceTerm: source }, 'Glossary term saved');
    return { id: row.id, sourceTerm: row.sourceTerm, targetTerm: row.targetTerm };
  }

  async deleteGlossaryTerm(id: string): Promise<void> {
    const deleted = await this.db
      .delete(schema.glossaryTerms)
      .where(eq(schema.glossaryTerms.id, id))
      .returning({ id: schema.glossaryTerms.id });
    if (deleted.length === 0) throw new NotFoundError('Glossary term', id);
  }

  // ── Journal topics ──

  async listTopics(): Promise<JournalTopic[]> {
    return this.db
      .select({
        id: schema.journalTopics.id,
        name: schema.journalTopics.name,
        description: schema.journalTopics.description,
      })
      .from(schema.journalTopics)
      .orderBy(asc(schema.journalTopics.name));
  }

  async upsertTopic(name: string, description: string | null = null): Promise<JournalTopic> {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError('Topic name cannot be blank');

    const [row] = await this.db
      .insert(schema.journalTopics)
      .values({ name: trimmed, description, createdAt: this.clock() })
      .onConflictDoUpdate({ target: schema.journalTopics.name, set: { description } })
      .returning();

    return { id: row.id, name: row.name, description: row.description };
  }

  async deleteTopic(id: string): Promise<void> {
    const deleted = await this.db
      .delete(schema.journalTopics)
      .where(eq(schema.journalTopics.id, id))
      .returning({ id: schema.journalTopics.id });
    if (deleted.length === 0) throw new NotFoundError('Journal topic', id);
  }

  // ── Journals ──

  async listJournals(): Promise<JournalEntry[]> {
    const rows = await this.db.select().from(schema.journals).orderBy(asc(schema.journals.name));
    if (rows.length === 0) return [];

    const scores = await this.db
      .select({
        journalId: schema.journalTopicScores.journalId,
        topic: schema.journalTopics.name,
        score: schema.journalTopicScores.score,
      })
      .from(schema.journalTopicScores)
      .innerJoin(schema.journalTopics, eq(schema.journalTopics.id, schema.journalTopicScores.topicId))
      .where(inArray(schema.journalTopicScores.journalId, rows.map(r => r.id)));

    return rows.map(row => ({
      id: row.id,
      name: row.name,
      referenceMark: row.referenceMark,
      lowBound: row.lowBound,
      notes: row.notes,
      topicScores: Object.fromEntries(scores.filter(s => s.journalId === row.id).map(s => [s.topic, s.score])),
    }));
  }

  /** Creates or replaces a journal by name, including its full set of topic scores. */
  async upsertJournal(input: JournalInput): Promise<JournalEntry> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Journal name cannot be blank');
    if (!Number.isFinite(input.lowBound) || input.lowBound < 0) {
      throw new ValidationError('Journal low bound must be a non-negative number');
    }

    const requested = Object.entries(input.topicScores ?? {});
    const invalid = requested.filter(([, score]) => !Number.isInteger(score) || score < 0 || score > 2);
    if (invalid.length > 0) {
      throw new ValidationError(`Topic scores must be 0, 1 or 2: ${invalid.map(([topic]) => topic).join(', ')}`);
    }

    const journalId = await this.db.transaction(async (tx) => {
      const topics = await tx.select({ id: schema.journalTopics.id, name: schema.journalTopics.name }).from(schema.journalTopics);
      const byName = new Map(topics.map(t => [t.name, t.id]));
      const unknown = requested.filter(([topic]) => !byName.has(topic)).map(([topic]) => topic);
      if (unknown.length > 0) throw new ValidationError(`Unknown journal topics: ${unknown.join(', ')}`);

      const values = {
        name,
        referenceMark: input.referenceMark ?? null,
        lowBound: input.lowBound,
        notes: input.notes ?? null,
      };
      const [row] = await tx
        .insert(schema.journals)
        .values({ ...values, createdAt: this.clock() })
        .onConflictDoUpdate({ target: schema.journals.name, set: values })
        .returning({ id: schema.journals.id });

      await tx.delete(schema.journalTopicScores).where(eq(schema.journalTopicScores.journalId, row.id));
      const scored = requested.flatMap(([topic, score]) => {
        const topicId = byName.get(topic);
        return topicId && score > 0 ? [{ journalId: row.id, topicId, score }] : [];
      });
      if (scored.length > 0) await tx.insert(schema.journalTopicScores).values(scored);

      return row.id;
    });

    logger.info({ journal: name, topics: requested.length }, 'Journal saved');
    const saved = (await this.listJournals()).find(j => j.id === journalId);
    if (!saved) throw new NotFoundError('Journal', journalId);
    return saved;
  }

  async deleteJournal(id: string): Promise<void> {
    const deleted = await this.db
      .delete(schema.journals)
      .where(eq(schema.journals.id, id))
      .returning({ id: schema.journals.id });
    if (deleted.length === 0) throw new NotFoundError('Journal', id);
  }
}
