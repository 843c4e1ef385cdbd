import { and, asc, eq, inArray, isNull, lt, sql } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { logger } from '../../lib/logger.js';
import { sourcesFor, TERMINAL_STATUSES, type JobStatus } from './state-machine.js';

export type JobRecord = typeof schema.jobs.$inferSelect;
export type JobItemRecord = typeof schema.jobItems.$inferSelect;

export interface NewItem {
  ordinal: number;
  label: string;
  input: Record<string, unknown>;
}

export interface CreateJobParams {
  id: string;
  userId: string;
  moduleKey: string;
  payload: Record<string, unknown>;
  items: NewItem[];
}

export interface CompletedItemUpdate {
  resultText: string;
  outputPath: string | null;
  tokensUsed: number;
}

export interface FinishJobParams {
  status: Extract<JobStatus, 'completed' | 'failed'>;
  detail: string;
  errorMessage?: string | null;
  artifacts?: Record<string, string> | null;
  result?: Record<string, unknown> | null;
}

/**
 * Persistence for jobs and their items. Every status write is guarded by the
 * states it may come from, so a terminal row is never moved again.
 */
export class JobStore {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  async createJob(params: CreateJobParams, exec: Database = this.db): Promise<JobRecord> {
    const now = this.clock();
    const [job] = await exec
      .insert(schema.jobs)
      .values({
        id: params.id,
        userId: params.userId,
        moduleKey: params.moduleKey,
        status: 'pending',
        statusDetail: 'Queued',
        payload: params.payload,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    await this.addItems(params.id, 1, params.items, exec);
    return job;
  }

  async addItems(jobId: string, round: number, items: NewItem[], exec: Database = this.db): Promise<JobItemRecord[]> {
    if (items.length === 0) return [];
    const now = this.clock();

    return exec
      .insert(schema.jobItems)
      .values(items.map(item => ({
        jobId,
        round,
        ordinal: item.ordinal,
        label: item.label,
        input: item.input,
        status: 'pending' as const,
        createdAt: now,
        updatedAt: now,
      })))
      .returning();
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    const [job] = await this.db
      .select()
      .from(schema.jobs)
      .where(eq(schema.jobs.id, jobId))
      .limit(1);
    return job ?? null;
  }

  async getItems(jobId: string, round?: number): Promise<JobItemRecord[]> {
    const conditions = [eq(schema.jobItems.jobId, jobId)];
    if (round !== undefined) conditions.push(eq(schema.jobItems.round, round));

    return this.db
      .select()
      .from(schema.jobItems)
      .where(and(...conditions))
      .orderBy(asc(schema.jobItems.round), asc(schema.jobItems.ordinal));
  }

  async getItem(jobId: string, itemId: string): Promise<JobItemRecord | null> {
    const [item] = await this.db
      .select()
      .from(schema.jobItems)
      .where(and(eq(schema.jobItems.jobId, jobId), eq(schema.jobItems.id, itemId)))
      .limit(1);
    return item ?? null;
  }

  async listByStatus(status: JobStatus): Promise<JobRecord[]> {
    return this.db
      .select()
      .from(schema.jobs)
      .where(eq(schema.jobs.status, status))
      .orderBy(asc(schema.jobs.createdAt));
  }

  /** pending -> processing. Returns null when another worker got there first. */
  async claim(jobId: string, detail: string): Promise<JobRecord | null> {
    const now = this.clock();
    const [job] = await this.db
      .update(schema.jobs)
      .set({ status: 'processing', statusDetail: detail, startedAt: now, updatedAt: now })
      .where(and(eq(schema.jobs.id, jobId), inArray(schema.jobs.status, sourcesFor('processing'))))
      .returning();

    if (job) logger.debug({ jobId }, 'Job claimed');
    return job ?? null;
  }

  async setDetail(jobId: string, detail: string): Promise<void> {
    await this.db
      .update(schema.jobs)
      .set({ statusDetail: detail, updatedAt: this.clock() })
      .where(and(eq(schema.jobs.id, jobId), eq(schema.jobs.status, 'processing')));
  }

  /** Counts an attempt and moves the item to processing; returns the new attempt count. */
  async beginAttempt(itemId: string): Promise<number> {
    const [item] = await this.db
      .update(schema.jobItems)
      .set({
        status: 'processing',
        attemptCount: sql`${schema.jobItems.attemptCount} + 1`,
        updatedAt: this.clock(),
      })
      .where(and(eq(schema.jobItems.id, itemId), inArray(schema.jobItems.status, ['pending', 'processing'])))
      .returning({ attemptCount: schema.jobItems.attemptCount });

    if (!item) throw new Error(`Job item ${itemId} is no longer runnable`);
    return item.attemptCount;
  }

  async setItemDetail(itemId: string, detail: string): Promise<void> {
    await this.db
      .update(schema.jobItems)
      .set({ statusDetail: detail, updatedAt: this.clock() })
      .where(eq(schema.jobItems.id, itemId));
  }

  async completeItem(itemId: string, update: CompletedItemUpdate, exec: Database = this.db): Promise<boolean> {
    const rows = await exec
      .update(schema.jobItems)
      .set({
        status: 'completed',
        statusDetail: 'Completed',
        resultText: update.resultText,
        outputPath: update.outputPath,
        tokensUsed: update.tokensUsed,
        errorMessage: null,
        updatedAt: this.clock(),
      })
      .where(and(eq(schema.jobItems.id, itemId), inArray(schema.jobItems.status, sourcesFor('completed'))))
      .returning({ id: schema.jobItems.id });
    return rows.length > 0;
  }

  async failItem(itemId: string, errorMessage: string): Promise<boolean> {
    const rows = await this.db
      .update(schema.jobItems)
      .set({ status: 'failed', statusDetail: 'Failed', errorMessage, updatedAt: this.clock() })
      .where(and(eq(schema.jobItems.id, itemId), inArray(schema.jobItems.status, sourcesFor('failed'))))
      .returning({ id: schema.jobItems.id });
    return rows.length > 0;
  }

  /** Fails every item of the job that has not reached a terminal state. Returns how many were failed. */
  async failUnfinishedItems(jobId: string, errorMessage: string): Promise<number> {
    const rows = await this.db
      .update(schema.jobItems)
      .set({ status: 'failed', statusDetail: 'Failed', errorMessage, updatedAt: this.clock() })
      .where(and(eq(schema.jobItems.jobId, jobId), inArray(schema.jobItems.status, sourcesFor('failed'))))
      .returning({ id: schema.jobItems.id });
    return rows.length;
  }

  /** Adds to the job's running usage counters. Called inside the item's completion transaction. */
  async addUsage(jobId: string, units: number, tokens: number, exec: Database = this.db): Promise<void> {
    await exec
      .update(schema.jobs)
      .set({
        usageDelta: sql`${schema.jobs.usageDelta} + ${units}`,
        tokensUsed: sql`${schema.jobs.tokensUsed} + ${tokens}`,
        updatedAt: this.clock(),
      })
      .where(eq(schema.jobs.id, jobId));
  }

  /** Moves the job to a terminal state. Returns false when the job was already terminal. */
  async finish(jobId: string, params: FinishJobParams): Promise<boolean> {
    const now = this.clock();
    const rows = await this.db
      .update(schema.jobs)
      .set({
        status: params.status,
        statusDetail: params.detail,
        errorMessage: params.errorMessage ?? null,
        ...(params.artifacts !== undefined && { artifacts: params.artifacts }),
        ...(params.result !== undefined && { result: params.result }),
        completedAt: now,
        updatedAt: now,
      })
      .where(and(eq(schema.jobs.id, jobId), inArray(schema.jobs.status, sourcesFor(params.status))))
      .returning({ id: schema.jobs.id });

    if (rows.length === 0) {
      logger.warn({ jobId, status: params.status }, 'Ignored transition on a terminal job');
      return false;
    }

    logger.info({ jobId, status: params.status, detail: params.detail }, 'Job finished');
    return true;
  }

  async fail(jobId: string, errorMessage: string, detail = 'Job failed to complete.'): Promise<boolean> {
    return this.finish(jobId, { status: 'failed', detail, errorMessage });
  }

  /** Terminal, unpurged jobs created before the cutoff. */
  async findPurgeCandidates(cutoff: Date): Promise<JobRecord[]> {
    return this.db
      .select()
      .from(schema.jobs)
      .where(and(
        inArray(schema.jobs.status, [...TERMINAL_STATUSES]),
        isNull(schema.jobs.filesPurgedAt),
        lt(schema.jobs.createdAt, cutoff),
      ))
      .orderBy(asc(schema.jobs.createdAt));
  }

  /**
   * Clears every artifact reference of a terminal job and stamps it purged.
   * Returns false when the job is not terminal or was already purged.
   */
  async markPurged(jobId: string): Promise<boolean> {
    const now = this.clock();

    return this.db.transaction(async (tx) => {
      const rows = await tx
        .update(schema.jobs)
        .set({ artifacts: null, filesPurgedAt: now, updatedAt: now })
        .where(and(
          eq(schema.jobs.id, jobId),
          inArray(schema.jobs.status, [...TERMINAL_STATUSES]),
          isNull(schema.jobs.filesPurgedAt),
        ))
        .returning({ id: schema.jobs.id });

      if (rows.length === 0) return false;

      await tx
        .update(schema.jobItems)
        .set({ outputPath: null, updatedAt: now })
        .where(eq(schema.jobItems.jobId, jobId));

      return true;
    });
  }
}

export * from './state-machine.js';
export * from './outcome.js';
