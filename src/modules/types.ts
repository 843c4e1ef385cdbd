import type { z } from 'zod';
import type { DelayFn } from '../lib/retry.js';
import type { LlmRequest } from '../lib/llm-client.js';
import type { ArtifactStorage } from '../lib/storage.js';
import type { Logger } from '../lib/logger.js';
import type { RoundTally, SuccessThreshold } from '../services/job-store/outcome.js';
import type { ReferenceData } from '../services/reference-data/index.js';

export type JsonObject = Record<string, unknown>;

export interface ExecutionPolicy {
  attemptCap: number;
  concurrencyCap: number;
  retryDelay: DelayFn;
  threshold: SuccessThreshold;
  /** Units charged when an item of the round succeeds. */
  unitsPerItem: number;
}

/** Effective models and prompts for one job run: admin overrides over module defaults. */
export interface ModuleSettings {
  model(slot: string): string;
  prompt(key: string): string;
  readonly reference: ReferenceData;
}

export interface ModuleDefaults {
  models: Record<string, string>;
  prompts: Record<string, string>;
}

export interface PlannedItem<TItem> {
  ordinal: number;
  label: string;
  input: TItem;
}

export interface RoundItem<TItem> extends PlannedItem<TItem> {
  id: string;
  round: number;
}

export interface CompletedItem<TItem> extends RoundItem<TItem> {
  text: string;
  outputPath: string | null;
}

export interface RunContext<TPayload> {
  jobId: string;
  userId: string;
  moduleKey: string;
  payload: TPayload;
  settings: ModuleSettings;
  storage: ArtifactStorage;
  log: Logger;
}

/**
 * Open-ended round: after its planned items the runner keeps drawing new ones,
 * `policy.concurrencyCap` at a time, until `target` have succeeded or the round
 * holds `maxItems` items.
 */
export interface SamplingPlan<TItem> {
  target: number;
  maxItems: number;
  /** Wait before each draw after the planned items. */
  pauseMs: number;
  draw(ordinal: number): PlannedItem<TItem>;
}

export interface RoundDefinition<TPayload, TItem> {
  round: number;
  label: string;
  policy: ExecutionPolicy;
  sampling?: SamplingPlan<TItem>;
  /**
   * Items for this round. Round 1 is planned at submission with no completed
   * items; later rounds see every completed item of the rounds before them.
   */
  plan(payload: TPayload, completed: CompletedItem<TItem>[], settings: ModuleSettings): PlannedItem<TItem>[];
  request(ctx: RunContext<TPayload>, item: RoundItem<TItem>, completed: CompletedItem<TItem>[]): Promise<LlmRequest>;
  /** Checks and normalizes the completion text. Throws `ParseError` to retry the attempt. */
  parse?(text: string, ctx: RunContext<TPayload>, item: RoundItem<TItem>): string;
  /** File name for the item's persisted output; items without one keep their text in the row only. */
  outputFile?(item: RoundItem<TItem>): string;
}

export interface AssembledOutput {
  artifacts: Record<string, string>;
  result?: JsonObject;
  /** Units charged for the completed job; replaces the module's `completionUnits` when set. */
  units?: number;
}

export interface ToolModule<TPayload extends JsonObject, TItem extends JsonObject> {
  key: string;
  label: string;
  unitLabel: string;
  payloadSchema: z.ZodType<TPayload, z.ZodTypeDef, unknown>;
  itemSchema: z.ZodType<TItem, z.ZodTypeDef, unknown>;
  defaults: ModuleDefaults;
  rounds: RoundDefinition<TPayload, TItem>[];
  /** Units charged once when the job completes, on top of per-item units. */
  completionUnits?: number;
  projectedUnits(payload: TPayload): number;
  estimateTokens(payload: TPayload): number;
  /** Builds the job-level artifacts once every round has met its threshold. */
  assemble?(ctx: RunContext<TPayload>, completed: CompletedItem<TItem>[], rounds: readonly RoundTally[]): Promise<AssembledOutput>;
}

export type AnyToolModule = ToolModule<JsonObject, JsonObject>;
