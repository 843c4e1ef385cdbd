import { and, eq } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { NotFoundError, QuotaExceededError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { TOKEN_WINDOW_DAYS, UsageLedger, windowStart } from '../usage-ledger/index.js';
import { evaluateQuota, type QuotaDecision, type QuotaLimits, type QuotaRequest } from './evaluate.js';

export interface ModuleLimit {
  moduleKey: string;
  unitCap: number | null;
  unitWindowDays: number | null;
}

export interface GroupPolicy {
  groupId: string;
  name: string;
  tokenBudget: number | null;
  modules: ModuleLimit[];
}

export interface GroupPolicyUpdate {
  tokenBudget?: number | null;
  modules?: ModuleLimit[];
}

/**
 * Reads a user's group limits and the ledger, then applies `evaluateQuota`.
 * The check is point-in-time: nothing is reserved, so two concurrent
 * admissions may both pass and together overshoot by their projections.
 */
export class QuotaPolicy {
  constructor(
    private readonly db: Database,
    private readonly ledger: UsageLedger,
    private readonly clock: Clock = systemClock,
  ) {}

  async limitsFor(userId: string, moduleKey: string, exec: Database = this.db): Promise<QuotaLimits> {
    const [row] = await exec
      .select({
        tokenBudget: schema.usageGroups.tokenBudget,
        unitCap: schema.usageGroupLimits.unitCap,
        unitWindowDays: schema.usageGroupLimits.unitWindowDays,
      })
      .from(schema.users)
      .innerJoin(schema.usageGroups, eq(schema.usageGroups.id, schema.users.usageGroupId))
      .leftJoin(
        schema.usageGroupLimits,
        and(
          eq(schema.usageGroupLimits.groupId, schema.usageGroups.id),
          eq(schema.usageGroupLimits.moduleKey, moduleKey),
        ),
      )
      .where(eq(schema.users.id, userId))
      .limit(1);

    if (!row) throw new NotFoundError('User', userId);

    return {
      tokenBudget: row.tokenBudget,
      unitCap: row.unitCap ?? null,
      unitWindowDays: row.unitWindowDays ?? null,
    };
  }

  async check(userId: string, moduleKey: string, request: QuotaRequest, exec: Database = this.db): Promise<QuotaDecision> {
    const now = this.clock();
    const limits = await this.limitsFor(userId, moduleKey, exec);

    const tokensInWindow = limits.tokenBudget === null
      ? 0
      : await this.ledger.tokensSince(userId, windowStart(now, TOKEN_WINDOW_DAYS), exec);

    const unitsUsed = limits.unitCap === null
      ? 0
      : await this.ledger.unitsFor(
        userId,
        moduleKey,
        limits.unitWindowDays ? windowStart(now, limits.unitWindowDays) : null,
        exec,
      );

    return evaluateQuota(limits, { tokensInWindow, unitsUsed }, request);
  }

  /** Throws `QuotaExceededError` when the request would not be admitted. */
  async assertAdmissible(userId: string, moduleKey: string, request: QuotaRequest, exec: Database = this.db): Promise<void> {
    const decision = await this.check(userId, moduleKey, request, exec);
    if (!decision.admitted) {
      logger.info({ userId, moduleKey, limitKind: decision.limitKind, ...request }, 'Submission rejected by quota');
      throw new QuotaExceededError(decision.limitKind, decision.reason);
    }
  }

  async getGroupPolicy(groupId: string): Promise<GroupPolicy> {
    const [group] = await this.db
      .select()
      .from(schema.usageGroups)
      .where(eq(schema.usageGroups.id, groupId))
      .limit(1);

    if (!group) throw new NotFoundError('Usage group', groupId);

    const limits = await this.db
      .select({
        moduleKey: schema.usageGroupLimits.moduleKey,
        unitCap: schema.usageGroupLimits.unitCap,
        unitWindowDays: schema.usageGroupLimits.unitWindowDays,
      })
      .from(schema.usageGroupLimits)
      .where(eq(schema.usageGroupLimits.groupId, groupId))
      .orderBy(schema.usageGroupLimits.moduleKey);

    return { groupId: group.id, name: group.name, tokenBudget: group.tokenBudget, modules: limits };
  }

  async groupPolicyForUser(userId: string): Promise<GroupPolicy> {
    const [user] = await this.db
      .select({ groupId: schema.users.usageGroupId })
      .from(schema.users)
      .where(eq(schema.users.id, userId))
      .limit(1);

    if (!user) throw new NotFoundError('User', userId);
    return this.getGroupPolicy(user.groupId);
  }

  /** Admin edit. Module limits are upserted; modules not listed keep their current limit. */
  async updateGroupPolicy(groupId: string, update: GroupPolicyUpdate): Promise<GroupPolicy> {
    await this.db.transaction(async (tx) => {
      const [group] = await tx
        .select({ id: schema.usageGroups.id })
        .from(schema.usageGroups)
        .where(eq(schema.usageGroups.id, groupId))
        .limit(1);

      if (!group) throw new NotFoundError('Usage group', groupId);

      if (update.tokenBudget !== undefined) {
        await tx
          .update(schema.usageGroups)
          .set({ tokenBudget: update.tokenBudget })
          .where(eq(schema.usageGroups.id, groupId));
      }

      for (const limit of update.modules ?? []) {
        await tx
          .insert(schema.usageGroupLimits)
          .values({
            groupId,
            moduleKey: limit.moduleKey,
            unitCap: limit.unitCap,
            unitWindowDays: limit.unitWindowDays,
            createdAt: this.clock(),
          })
          .onConflictDoUpdate({
            target: [schema.usageGroupLimits.groupId, schema.usageGroupLimits.moduleKey],
            set: { unitCap: limit.unitCap, unitWindowDays: limit.unitWindowDays },
          });
      }
    });

    logger.info({ groupId, tokenBudget: update.tokenBudget, modules: update.modules?.length ?? 0 }, 'Usage group policy updated');
    return this.getGroupPolicy(groupId);
  }
}

export * from './evaluate.js';
