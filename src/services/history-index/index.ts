import { and, desc, eq, notInArray, sql } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { logger } from '../../lib/logger.js';
import type { JobStatus } from '../job-store/state-machine.js';

export const DEFAULT_HISTORY_LIMIT = 50;

export interface HistoryEntry {
  id: number;
  moduleKey: string;
  jobKey: string;
  createdAt: Date;
  // Live values from the job row; null when the job no longer resolves.
  status: JobStatus | null;
  statusDetail: string | null;
  filesPurged: boolean;
}

export class HistoryIndex {
  constructor(
    private readonly db: Database,
    private readonly maxPerModule: number = DEFAULT_HISTORY_LIMIT,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Adds the pointer for a new job. A repeated (module, job key) is ignored.
   * Keeps at most `maxPerModule` rows per user and module, dropping the oldest.
   */
  async recordJobStart(userId: string, moduleKey: string, jobKey: string, exec: Database = this.db): Promise<boolean> {
    const inserted = await exec
      .insert(schema.userJobHistory)
      .values({ userId, moduleKey, jobKey, createdAt: this.clock() })
      .onConflictDoNothing({ target: [schema.userJobHistory.moduleKey, schema.userJobHistory.jobKey] })
      .returning({ id: schema.userJobHistory.id });

    if (inserted.length === 0) {
      logger.debug({ userId, moduleKey, jobKey }, 'History entry already present');
      return false;
    }

    const keep = exec
      .select({ id: schema.userJobHistory.id })
      .from(schema.userJobHistory)
      .where(and(eq(schema.userJobHistory.userId, userId), eq(schema.userJobHistory.moduleKey, moduleKey)))
      .orderBy(desc(schema.userJobHistory.createdAt), desc(schema.userJobHistory.id))
      .limit(this.maxPerModule);

    await exec
      .delete(schema.userJobHistory)
      .where(and(
        eq(schema.userJobHistory.userId, userId),
        eq(schema.userJobHistory.moduleKey, moduleKey),
        notInArray(schema.userJobHistory.id, keep),
      ));

    return true;
  }

  /** Newest first, optionally for one module. `limit` is clamped to 1..maxPerModule. */
  async fetchRecent(userId: string, moduleKey?: string, limit: number = this.maxPerModule): Promise<HistoryEntry[]> {
    const bounded = Math.min(Math.max(Math.trunc(limit) || 1, 1), this.maxPerModule);

    const conditions = [eq(schema.userJobHistory.userId, userId)];
    if (moduleKey) conditions.push(eq(schema.userJobHistory.moduleKey, moduleKey));

    const rows = await this.db
      .select({
        id: schema.userJobHistory.id,
        moduleKey: schema.userJobHistory.moduleKey,
        jobKey: schema.userJobHistory.jobKey,
        createdAt: schema.userJobHistory.createdAt,
        status: schema.jobs.status,
        statusDetail: schema.jobs.statusDetail,
        filesPurgedAt: schema.jobs.filesPurgedAt,
      })
      .from(schema.userJobHistory)
      .leftJoin(schema.jobs, sql`${schema.jobs.id}::text = ${schema.userJobHistory.jobKey}`)
      .where(and(...conditions))
      .orderBy(desc(schema.userJobHistory.createdAt), desc(schema.userJobHistory.id))
      .limit(bounded);

    return rows.map(row => ({
      id: row.id,
      moduleKey: row.moduleKey,
      jobKey: row.jobKey,
      createdAt: row.createdAt,
      status: row.status,
      statusDetail: row.statusDetail,
      filesPurged: row.filesPurgedAt !== null,
    }));
  }
}
