import type { Database } from '../../db/index.js';
import { ParseError, StorageError, errorMessage, isRetryableError } from '../../lib/errors.js';
import type { LlmExecutor, LlmResponse } from '../../lib/llm-client.js';
import { logger, type Logger } from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import { mapWithConcurrency } from '../../lib/semaphore.js';
import type { ArtifactStorage } from '../../lib/storage.js';
import type { ModuleRegistry } from '../../modules/registry.js';
import type {
  AnyToolModule,
  AssembledOutput,
  CompletedItem,
  JsonObject,
  RoundDefinition,
  RoundItem,
  RunContext,
  SamplingPlan,
} from '../../modules/types.js';
import type { ModuleConfigService } from '../module-config/index.js';
import type { UsageLedger } from '../usage-ledger/index.js';
import {
  deriveJobOutcome,
  tallyRound,
  type ItemState,
  type JobItemRecord,
  type JobOutcome,
  type JobRecord,
  type JobStatus,
  type JobStore,
  type RoundRule,
} from '../job-store/index.js';

export interface JobRunnerOptions {
  db: Database;
  store: JobStore;
  ledger: UsageLedger;
  llm: LlmExecutor;
  registry: ModuleRegistry;
  moduleConfig: ModuleConfigService;
  storage: ArtifactStorage;
  sleep?: (ms: number) => Promise<void>;
}

interface RoundState {
  // First storage failure of the run; fatal to the job.
  fatalError: string | null;
}

interface ItemAttempt {
  text: string;
  response: LlmResponse;
}

export const INTERRUPTED_MESSAGE = 'Interrupted by a service restart';
export const ABANDONED_ITEM_MESSAGE = 'Job stopped before this item finished';

/**
 * Drives admitted jobs to a terminal state. Each job runs as one background
 * task; inside it every round runs its items through a bounded pool, and the
 * job status is derived only after all items of the last round have settled.
 */
export class JobRunner {
  private readonly active = new Map<string, Promise<void>>();

  constructor(private readonly options: JobRunnerOptions) {}

  /** Starts a job in the background. Failures end in the job row and the log, never in the caller. */
  dispatch(jobId: string): void {
    if (this.active.has(jobId)) return;

    const task = this.run(jobId)
      .then(() => undefined)
      .catch((error) => {
        logger.error({ jobId, error: errorMessage(error) }, 'Job task crashed');
      })
      .finally(() => {
        this.active.delete(jobId);
      });

    this.active.set(jobId, task);
  }

  get activeJobs(): number {
    return this.active.size;
  }

  /** Resolves once every dispatched job has settled. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active.values()]);
    }
  }

  /**
   * Fails jobs a previous process left in `processing` and dispatches the
   * ones still `pending`. Called once at start-up.
   */
  async recover(): Promise<{ interrupted: number; resumed: number }> {
    const { store } = this.options;

    const interrupted = await store.listByStatus('processing');
    for (const job of interrupted) {
      await this.abandon(job.id, INTERRUPTED_MESSAGE, INTERRUPTED_MESSAGE, logger.child({ jobId: job.id }));
    }

    const pending = await store.listByStatus('pending');
    for (const job of pending) {
      this.dispatch(job.id);
    }

    if (interrupted.length > 0 || pending.length > 0) {
      logger.info({ interrupted: interrupted.length, resumed: pending.length }, 'Recovered jobs after restart');
    }
    return { interrupted: interrupted.length, resumed: pending.length };
  }

  /** Claims and runs one job. Returns its terminal status, or null when it was not pending. */
  async run(jobId: string): Promise<JobStatus | null> {
    const { store } = this.options;

    const job = await store.claim(jobId, 'Starting');
    if (!job) {
      logger.debug({ jobId }, 'Job not pending, skipping');
      return null;
    }

    const log = logger.child({ jobId, moduleKey: job.moduleKey });
    log.info('Job started');

    try {
      return await this.execute(job, log);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Job failed unexpectedly');
      await this.abandon(jobId, errorMessage(error), ABANDONED_ITEM_MESSAGE, log);
      return 'failed';
    }
  }

  /** Fails whatever items are still open, then the job itself. */
  private async abandon(jobId: string, jobMessage: string, itemMessage: string, log: Logger): Promise<void> {
    const { store } = this.options;
    try {
      const stranded = await store.failUnfinishedItems(jobId, itemMessage);
      if (stranded > 0) log.warn({ stranded }, 'Failed items left unfinished');
    } finally {
      await store.fail(jobId, jobMessage);
    }
  }

  private async execute(job: JobRecord, log: Logger): Promise<JobStatus> {
    const { store, registry, moduleConfig, storage } = this.options;

    const module = registry.get(job.moduleKey);
    if (!module) {
      await this.abandon(job.id, `Module '${job.moduleKey}' is not available`, ABANDONED_ITEM_MESSAGE, log);
      return 'failed';
    }

    const parsed = module.payloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      const reason = parsed.error.issues.map(issue => issue.message).join('; ');
      log.warn({ reason }, 'Job payload failed validation');
      await this.abandon(job.id, `Invalid submission: ${reason}`, ABANDONED_ITEM_MESSAGE, log);
      return 'failed';
    }

    const settings = await moduleConfig.settingsFor(module.key);
    const ctx: RunContext<JsonObject> = {
      jobId: job.id,
      userId: job.userId,
      moduleKey: module.key,
      payload: parsed.data,
      settings,
      storage,
      log,
    };

    const rules: RoundRule[] = [];
    const state: RoundState = { fatalError: null };
    let items = await store.getItems(job.id);

    for (const round of module.rounds) {
      const rule: RoundRule = { round: round.round, label: round.label, threshold: round.policy.threshold };
      rules.push(rule);

      const completed = this.completedItems(module, items);
      let rows = items.filter(row => row.round === round.round);
      if (rows.length === 0 && round.round > 1) {
        const planned = round.plan(ctx.payload, completed, settings);
        rows = await store.addItems(job.id, round.round, planned);
      }

      await this.runRound(ctx, module, round, rows, completed, state);
      if (round.sampling) await this.drawSamples(ctx, module, round, round.sampling, completed, state);

      items = await store.getItems(job.id);
      if (state.fatalError) break;

      const tally = tallyRound(rule, items);
      log.info({ round: round.round, succeeded: tally.succeeded, total: tally.total, met: tally.met }, 'Round finished');
      if (!tally.met) break;
    }

    let outcome = deriveJobOutcome(rules, items.map(toItemState), state.fatalError);
    let assembled: AssembledOutput = { artifacts: {} };

    if (outcome.status === 'completed') {
      try {
        if (module.assemble) {
          await store.setDetail(job.id, 'Assembling results');
          assembled = await module.assemble(ctx, this.completedItems(module, items), outcome.rounds);
        }
        await this.chargeCompletion(job, module, assembled.units ?? module.completionUnits ?? 0);
      } catch (error) {
        log.error({ error: errorMessage(error) }, 'Failed to assemble job output');
        outcome = deriveJobOutcome(rules, items.map(toItemState), errorMessage(error));
      }
    }

    await this.finish(job.id, outcome, assembled);
    return outcome.status;
  }

  private async runRound(
    ctx: RunContext<JsonObject>,
    module: AnyToolModule,
    round: RoundDefinition<JsonObject, JsonObject>,
    rows: JobItemRecord[],
    completed: CompletedItem<JsonObject>[],
    state: RoundState,
  ): Promise<void> {
    const runnable = rows.filter(row => row.status === 'pending' || row.status === 'processing');
    let done = rows.length - runnable.length;

    const results = await mapWithConcurrency(runnable, round.policy.concurrencyCap, async (row) => {
      await this.runItem(ctx, module, round, row, completed, state);
      done += 1;
      await this.options.store
        .setDetail(ctx.jobId, `${round.label}: ${done}/${rows.length} processed (round ${round.round} of ${module.rounds.length})`)
        .catch((error) => {
          ctx.log.warn({ error: errorMessage(error) }, 'Failed to update job progress');
        });
    });

    // Every item has settled here. One whose own failure could not be recorded is failed now;
    // if that write fails too the job is abandoned by `run`.
    for (const [index, result] of results.entries()) {
      if (result.status === 'fulfilled') continue;
      const row = runnable[index];
      const message = errorMessage(result.reason);
      ctx.log.error({ itemId: row.id, error: message }, 'Item task failed');
      await this.options.store.failItem(row.id, message);
    }
  }

  /** Keeps adding items to a sampled round until enough succeeded or its item budget is spent. */
  private async drawSamples(
    ctx: RunContext<JsonObject>,
    module: AnyToolModule,
    round: RoundDefinition<JsonObject, JsonObject>,
    sampling: SamplingPlan<JsonObject>,
    completed: CompletedItem<JsonObject>[],
    state: RoundState,
  ): Promise<void> {
    const { store } = this.options;
    const sleep = this.options.sleep ?? defaultSleep;

    for (;;) {
      const drawn = (await store.getItems(ctx.jobId)).filter(row => row.round === round.round);
      const succeeded = drawn.filter(row => row.status === 'completed').length;
      if (state.fatalError || succeeded >= sampling.target || drawn.length >= sampling.maxItems) {
        ctx.log.info({ round: round.round, succeeded, drawn: drawn.length }, 'Sampling finished');
        return;
      }

      const size = Math.min(round.policy.concurrencyCap, sampling.target - succeeded, sampling.maxItems - drawn.length);
      const planned = Array.from({ length: size }, (_, i) => sampling.draw(drawn.length + i + 1));

      await sleep(sampling.pauseMs);
      const rows = await store.addItems(ctx.jobId, round.round, planned);
      await store
        .setDetail(ctx.jobId, `${round.label}: ${succeeded} of ${sampling.target} succeeded after ${drawn.length} attempts`)
        .catch((error) => {
          ctx.log.warn({ error: errorMessage(error) }, 'Failed to update job progress');
        });
      await this.runRound(ctx, module, round, rows, completed, state);
    }
  }

  /** Runs one item to a terminal state; provider, parse and storage failures end the item, not the round. */
  private async runItem(
    ctx: RunContext<JsonObject>,
    module: AnyToolModule,
    round: RoundDefinition<JsonObject, JsonObject>,
    row: JobItemRecord,
    completed: CompletedItem<JsonObject>[],
    state: RoundState,
  ): Promise<void> {
    const { store, llm } = this.options;
    const { attemptCap, retryDelay } = round.policy;
    const log = ctx.log.child({ itemId: row.id, round: row.round, ordinal: row.ordinal });

    if (state.fatalError) {
      await store.failItem(row.id, 'Skipped after a storage failure');
      return;
    }

    const spent = { inputTokens: 0, outputTokens: 0, model: '' };

    try {
      const item: RoundItem<JsonObject> = {
        id: row.id,
        round: row.round,
        ordinal: row.ordinal,
        label: row.label,
        input: module.itemSchema.parse(row.input),
      };

      const attempt = await withRetry<ItemAttempt>(async (n) => {
        await store.beginAttempt(row.id);
        await store.setItemDetail(row.id, `Attempt ${n} of ${attemptCap}`);

        const request = await round.request(ctx, item, completed);
        const response = await llm.execute(request);
        spent.inputTokens += response.usage.inputTokens;
        spent.outputTokens += response.usage.outputTokens;
        spent.model = response.model;
        if (response.truncated) throw new ParseError('reply was cut off at the output token limit');

        const text = round.parse ? round.parse(response.text, ctx, item) : response.text;
        return { text, response };
      }, {
        maxAttempts: attemptCap,
        delay: retryDelay,
        shouldRetry: isRetryableError,
        sleep: this.options.sleep,
      });

      const outputPath = round.outputFile
        ? await ctx.storage.writeText(ctx.moduleKey, ctx.jobId, round.outputFile(item), attempt.text)
        : null;

      await this.completeItem(ctx, row, round, attempt, spent, outputPath);
      log.debug({ tokens: spent.inputTokens + spent.outputTokens }, 'Item completed');
    } catch (error) {
      const message = errorMessage(error);
      if (error instanceof StorageError && !state.fatalError) {
        state.fatalError = message;
      }

      log.warn({ error: message }, 'Item failed');
      await store.failItem(row.id, message);

      // Tokens spent on attempts that returned unusable output still count against the budget.
      if (spent.inputTokens + spent.outputTokens > 0) {
        await this.options.ledger.record({
          userId: ctx.userId,
          moduleKey: ctx.moduleKey,
          jobId: ctx.jobId,
          units: 0,
          model: spent.model,
          inputTokens: spent.inputTokens,
          outputTokens: spent.outputTokens,
        });
        await store.addUsage(ctx.jobId, 0, spent.inputTokens + spent.outputTokens);
      }
    }
  }

  private async completeItem(
    ctx: RunContext<JsonObject>,
    row: JobItemRecord,
    round: RoundDefinition<JsonObject, JsonObject>,
    attempt: ItemAttempt,
    spent: { inputTokens: number; outputTokens: number },
    outputPath: string | null,
  ): Promise<void> {
    const { db, store, ledger } = this.options;
    const tokens = spent.inputTokens + spent.outputTokens;
    const units = round.policy.unitsPerItem;

    await db.transaction(async (tx) => {
      const updated = await store.completeItem(row.id, { resultText: attempt.text, outputPath, tokensUsed: tokens }, tx);
      if (!updated) throw new Error(`Job item ${row.id} left the processing state`);

      await ledger.record({
        userId: ctx.userId,
        moduleKey: ctx.moduleKey,
        jobId: ctx.jobId,
        units,
        model: attempt.response.model,
        inputTokens: spent.inputTokens,
        outputTokens: spent.outputTokens,
      }, tx);
      await store.addUsage(ctx.jobId, units, tokens, tx);
    });
  }

  private async chargeCompletion(job: JobRecord, module: AnyToolModule, units: number): Promise<void> {
    if (units === 0) return;

    const { db, store, ledger } = this.options;
    await db.transaction(async (tx) => {
      await ledger.record({
        userId: job.userId,
        moduleKey: module.key,
        jobId: job.id,
        units,
        inputTokens: 0,
        outputTokens: 0,
      }, tx);
      await store.addUsage(job.id, units, 0, tx);
    });
  }

  private async finish(jobId: string, outcome: JobOutcome, assembled: AssembledOutput): Promise<void> {
    const { store } = this.options;

    if (outcome.status === 'completed') {
      await store.finish(jobId, {
        status: 'completed',
        detail: outcome.detail,
        artifacts: assembled.artifacts,
        result: assembled.result ?? null,
      });
      return;
    }

    await store.finish(jobId, {
      status: 'failed',
      detail: outcome.detail,
      errorMessage: outcome.errorMessage,
      artifacts: assembled.artifacts,
    });
  }

  private completedItems(module: AnyToolModule, rows: JobItemRecord[]): CompletedItem<JsonObject>[] {
    return rows
      .filter(row => row.status === 'completed')
      .map(row => ({
        id: row.id,
        round: row.round,
        ordinal: row.ordinal,
        label: row.label,
        input: module.itemSchema.parse(row.input),
        text: row.resultText ?? '',
        outputPath: row.outputPath,
      }));
  }
}

const defaultSleep = (ms: number): Promise<void> =>
  ms > 0 ? new Promise<void>(resolve => setTimeout(resolve, ms)) : Promise.resolve();

function toItemState(row: JobItemRecord): ItemState {
  return {
    round: row.round,
    ordinal: row.ordinal,
    label: row.label,
    status: row.status,
    errorMessage: row.errorMessage,
  };
}
