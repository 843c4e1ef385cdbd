import { randomUUID } from 'crypto';
import { basename } from 'path';
import { z } from 'zod';
import type { Database } from '../../db/index.js';
import { ForbiddenError, GoneError, NotFoundError, ValidationError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import type { ModuleRegistry } from '../../modules/registry.js';
import type { HistoryEntry, HistoryIndex } from '../history-index/index.js';
import type { JobItemRecord, JobRecord, JobStatus, JobStore } from '../job-store/index.js';
import type { JobRunner } from '../job-runner/index.js';
import type { ModuleConfigService } from '../module-config/index.js';
import type { GroupPolicy, QuotaPolicy } from '../quota-policy/index.js';
import type { UsageLedger, UsageSummary } from '../usage-ledger/index.js';

export interface Requester {
  id: string;
  isAdmin: boolean;
}

export interface SubmitJobInput {
  userId: string;
  moduleKey: string;
  payload: unknown;
  /** Lets the caller place uploads under the job's directory before admission. */
  jobId?: string;
}

export interface SubmittedJob {
  jobId: string;
  moduleKey: string;
  status: JobStatus;
  projectedUnits: number;
  projectedTokens: number;
}

export interface JobItemView {
  id: string;
  round: number;
  ordinal: number;
  label: string;
  status: JobStatus;
  statusDetail: string | null;
  attemptCount: number;
  errorMessage: string | null;
  downloadable: boolean;
}

export interface JobStatusView {
  id: string;
  moduleKey: string;
  status: JobStatus;
  statusDetail: string | null;
  errorMessage: string | null;
  usageDelta: number;
  tokensUsed: number;
  result: Record<string, unknown> | null;
  artifacts: string[];
  items: JobItemView[];
  filesPurged: boolean;
  filesPurgedAt: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface ResolvedFile {
  path: string;
  fileName: string;
}

export interface UsageReport extends UsageSummary {
  policy: GroupPolicy;
}

export interface JobServiceDeps {
  db: Database;
  store: JobStore;
  ledger: UsageLedger;
  quota: QuotaPolicy;
  history: HistoryIndex;
  registry: ModuleRegistry;
  moduleConfig: ModuleConfigService;
  runner: Pick<JobRunner, 'dispatch'>;
}

const uuidSchema = z.string().uuid();

/** The engine's inbound and outbound boundary, called once per request by the HTTP layer. */
export class JobService {
  constructor(private readonly deps: JobServiceDeps) {}

  /**
   * Validates the payload, checks quota and creates the job, its first-round
   * items and its history entry in one transaction, then starts the job.
   */
  async submit(input: SubmitJobInput): Promise<SubmittedJob> {
    const { db, store, quota, history, registry, moduleConfig, runner } = this.deps;

    const module = registry.require(input.moduleKey);
    const parsed = module.payloadSchema.safeParse(input.payload);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map(issue => issue.message).join('; '));
    }

    const payload = parsed.data;
    const settings = await moduleConfig.settingsFor(module.key);
    const items = module.rounds[0].plan(payload, [], settings);
    const projectedUnits = module.projectedUnits(payload);
    const projectedTokens = module.estimateTokens(payload);
    const jobId = input.jobId ?? randomUUID();

    await db.transaction(async (tx) => {
      await quota.assertAdmissible(input.userId, module.key, { projectedTokens, projectedUnits }, tx);
      await store.createJob({ id: jobId, userId: input.userId, moduleKey: module.key, payload, items }, tx);
      await history.recordJobStart(input.userId, module.key, jobId, tx);
    });

    logger.info({ jobId, userId: input.userId, moduleKey: module.key, items: items.length, projectedUnits, projectedTokens }, 'Job admitted');
    runner.dispatch(jobId);

    return { jobId, moduleKey: module.key, status: 'pending', projectedUnits, projectedTokens };
  }

  async getStatus(jobId: string, requester: Requester): Promise<JobStatusView> {
    const job = await this.authorizedJob(jobId, requester);
    const items = await this.deps.store.getItems(job.id);
    return toStatusView(job, items);
  }

  async resolveArtifact(jobId: string, name: string, requester: Requester): Promise<ResolvedFile> {
    const job = await this.authorizedJob(jobId, requester);
    if (job.filesPurgedAt) throw new GoneError(job.id, job.filesPurgedAt);

    const path = job.artifacts?.[name];
    if (!path) throw new NotFoundError('Artifact', name);
    return { path, fileName: name };
  }

  async resolveItemDownload(jobId: string, itemId: string, requester: Requester): Promise<ResolvedFile> {
    const job = await this.authorizedJob(jobId, requester);
    if (job.filesPurgedAt) throw new GoneError(job.id, job.filesPurgedAt);

    const item = uuidSchema.safeParse(itemId).success ? await this.deps.store.getItem(job.id, itemId) : null;
    if (!item?.outputPath) throw new NotFoundError('Job item output', itemId);
    return { path: item.outputPath, fileName: basename(item.outputPath) };
  }

  async listHistory(userId: string, moduleKey?: string, limit?: number): Promise<HistoryEntry[]> {
    if (moduleKey) this.deps.registry.require(moduleKey);
    return this.deps.history.fetchRecent(userId, moduleKey, limit);
  }

  async usageReport(userId: string): Promise<UsageReport> {
    const policy = await this.deps.quota.groupPolicyForUser(userId);
    const unitWindows = new Map<string, number>();
    for (const limit of policy.modules) {
      if (limit.unitWindowDays) unitWindows.set(limit.moduleKey, limit.unitWindowDays);
    }
    const summary = await this.deps.ledger.summary(userId, unitWindows);
    return { ...summary, policy };
  }

  private async authorizedJob(jobId: string, requester: Requester): Promise<JobRecord> {
    const job = uuidSchema.safeParse(jobId).success ? await this.deps.store.getJob(jobId) : null;
    if (!job) throw new NotFoundError('Job', jobId);
    if (job.userId !== requester.id && !requester.isAdmin) throw new ForbiddenError();
    return job;
  }
}

export function toStatusView(job: JobRecord, items: JobItemRecord[]): JobStatusView {
  const purged = job.filesPurgedAt !== null;
  return {
    id: job.id,
    moduleKey: job.moduleKey,
    status: job.status,
    statusDetail: job.statusDetail,
    errorMessage: job.errorMessage,
    usageDelta: job.usageDelta,
    tokensUsed: job.tokensUsed,
    result: job.result,
    artifacts: purged ? [] : Object.keys(job.artifacts ?? {}).sort(),
    items: items.map(item => ({
      id: item.id,
      round: item.round,
      ordinal: item.ordinal,
      label: item.label,
      status: item.status,
      statusDetail: item.statusDetail,
      attemptCount: item.attemptCount,
      errorMessage: item.errorMessage,
      downloadable: !purged && item.outputPath !== null,
    })),
    filesPurged: purged,
    filesPurgedAt: job.filesPurgedAt?.toISOString() ?? null,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    completedAt: job.completedAt?.toISOString() ?? null,
  };
}
