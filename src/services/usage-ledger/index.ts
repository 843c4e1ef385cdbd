import { and, eq, gte, sql } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { calculateCost } from '../../config/llm-pricing.js';
import { logger } from '../../lib/logger.js';

export const TOKEN_WINDOW_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface UsageEventInput {
  userId: string;
  moduleKey: string;
  jobId?: string | null;
  units: number;
  model?: string;
  inputTokens: number;
  outputTokens: number;
}

export interface ModuleUsage {
  moduleKey: string;
  /** Units since `unitsSince`, or over the account's lifetime when that is null. */
  units: number;
  unitsSince: Date | null;
  /** Lifetime tokens. */
  tokens: number;
}

export interface UsageSummary {
  windowDays: number;
  windowStart: Date;
  tokensInWindow: number;
  costUsdInWindow: number;
  modules: ModuleUsage[];
}

export function windowStart(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Append-only record of tokens and units consumed. Rows are only ever
 * inserted; every figure the quota policy sees is a sum over them.
 */
export class UsageLedger {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  async record(event: UsageEventInput, exec: Database = this.db): Promise<void> {
    if (event.units < 0 || event.inputTokens < 0 || event.outputTokens < 0) {
      throw new RangeError('Usage amounts cannot be negative');
    }

    const tokens = event.inputTokens + event.outputTokens;
    const cost = event.model ? calculateCost(event.model, event.inputTokens, event.outputTokens).totalCostUsd : 0;

    await exec.insert(schema.usageEvents).values({
      userId: event.userId,
      moduleKey: event.moduleKey,
      jobId: event.jobId ?? null,
      tokens,
      units: event.units,
      inputTokens: event.inputTokens,
      outputTokens: event.outputTokens,
      costUsd: cost.toFixed(6),
      occurredAt: this.clock(),
    });

    logger.debug({ userId: event.userId, moduleKey: event.moduleKey, tokens, units: event.units }, 'Usage recorded');
  }

  /** Tokens across every module since `since` (inclusive). */
  async tokensSince(userId: string, since: Date, exec: Database = this.db): Promise<number> {
    const [row] = await exec
      .select({ total: sql<string>`coalesce(sum(${schema.usageEvents.tokens}), 0)::text` })
      .from(schema.usageEvents)
      .where(and(eq(schema.usageEvents.userId, userId), gte(schema.usageEvents.occurredAt, since)));
    return Number(row?.total ?? 0);
  }

  /** Units for one module, since `since` or over the account's lifetime when null. */
  async unitsFor(userId: string, moduleKey: string, since: Date | null, exec: Database = this.db): Promise<number> {
    const conditions = [eq(schema.usageEvents.userId, userId), eq(schema.usageEvents.moduleKey, moduleKey)];
    if (since) conditions.push(gte(schema.usageEvents.occurredAt, since));

    const [row] = await exec
      .select({ total: sql<string>`coalesce(sum(${schema.usageEvents.units}), 0)::text` })
      .from(schema.usageEvents)
      .where(and(...conditions));
    return Number(row?.total ?? 0);
  }

  /**
   * Token totals for the rolling window and per-module usage. `unitWindows`
   * maps a module key to the day window its unit cap is checked over, so the
   * reported units match the figure admission compares with the cap.
   */
  async summary(userId: string, unitWindows: ReadonlyMap<string, number> = new Map()): Promise<UsageSummary> {
    const now = this.clock();
    const start = windowStart(now, TOKEN_WINDOW_DAYS);

    const [windowRow] = await this.db
      .select({
        tokens: sql<string>`coalesce(sum(${schema.usageEvents.tokens}), 0)::text`,
        cost: sql<string>`coalesce(sum(${schema.usageEvents.costUsd}), 0)::text`,
      })
      .from(schema.usageEvents)
      .where(and(eq(schema.usageEvents.userId, userId), gte(schema.usageEvents.occurredAt, start)));

    const moduleRows = await this.db
      .select({
        moduleKey: schema.usageEvents.moduleKey,
        units: sql<string>`coalesce(sum(${schema.usageEvents.units}), 0)::text`,
        tokens: sql<string>`coalesce(sum(${schema.usageEvents.tokens}), 0)::text`,
      })
      .from(schema.usageEvents)
      .where(eq(schema.usageEvents.userId, userId))
      .groupBy(schema.usageEvents.moduleKey)
      .orderBy(schema.usageEvents.moduleKey);

    return {
      windowDays: TOKEN_WINDOW_DAYS,
      windowStart: start,
      tokensInWindow: Number(windowRow?.tokens ?? 0),
      costUsdInWindow: Number(windowRow?.cost ?? 0),
      modules: await Promise.all(moduleRows.map(async r => {
        const days = unitWindows.get(r.moduleKey);
        if (!days) return { moduleKey: r.moduleKey, units: Number(r.units), unitsSince: null, tokens: Number(r.tokens) };
        const since = windowStart(now, days);
        return {
          moduleKey: r.moduleKey,
          units: await this.unitsFor(userId, r.moduleKey, since),
          unitsSince: since,
          tokens: Number(r.tokens),
        };
      })),
    };
  }
}
