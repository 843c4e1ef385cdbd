import type { JobStatus } from './state-machine.js';

export type SuccessThreshold =
  | { kind: 'all' }
  | { kind: 'atLeast'; count: number }
  | { kind: 'fraction'; ratio: number };

export const allItems = (): SuccessThreshold => ({ kind: 'all' });
export const atLeast = (count: number): SuccessThreshold => ({ kind: 'atLeast', count });
export const fraction = (ratio: number): SuccessThreshold => ({ kind: 'fraction', ratio });

export function requiredSuccesses(threshold: SuccessThreshold, total: number): number {
  switch (threshold.kind) {
    case 'all':
      return total;
    case 'atLeast':
      return threshold.count;
    case 'fraction':
      return Math.ceil(threshold.ratio * total);
  }
}

export function thresholdMet(threshold: SuccessThreshold, succeeded: number, total: number): boolean {
  return succeeded >= requiredSuccesses(threshold, total);
}

export interface RoundRule {
  round: number;
  label: string;
  threshold: SuccessThreshold;
}

export interface ItemState {
  round: number;
  ordinal: number;
  label: string;
  status: JobStatus;
  errorMessage: string | null;
}

export interface ItemError {
  round: number;
  ordinal: number;
  label: string;
  error: string;
}

export interface RoundTally {
  round: number;
  succeeded: number;
  failed: number;
  total: number;
  required: number;
  met: boolean;
}

export type JobOutcome =
  | { status: 'completed'; detail: string; rounds: RoundTally[]; itemErrors: ItemError[] }
  | { status: 'failed'; detail: string; errorMessage: string; rounds: RoundTally[]; itemErrors: ItemError[] };

export function tallyRound(rule: RoundRule, items: readonly ItemState[]): RoundTally {
  const inRound = items.filter(i => i.round === rule.round);
  const succeeded = inRound.filter(i => i.status === 'completed').length;
  const failed = inRound.filter(i => i.status === 'failed').length;
  const required = requiredSuccesses(rule.threshold, inRound.length);
  return {
    round: rule.round,
    succeeded,
    failed,
    total: inRound.length,
    required,
    met: succeeded >= required,
  };
}

/**
 * Derives a job's terminal status from its items. Pure: the same rules, items and
 * fatal error always give the same outcome. Rounds are evaluated in order and the
 * first round below its threshold decides the failure.
 */
export function deriveJobOutcome(
  rules: readonly RoundRule[],
  items: readonly ItemState[],
  fatalError: string | null = null,
): JobOutcome {
  const unfinished = items.filter(i => i.status === 'pending' || i.status === 'processing');
  if (unfinished.length > 0) {
    throw new Error(`Cannot derive job outcome while ${unfinished.length} item(s) are still running`);
  }

  const itemErrors: ItemError[] = items
    .filter(i => i.status === 'failed')
    .sort((a, b) => a.round - b.round || a.ordinal - b.ordinal)
    .map(i => ({ round: i.round, ordinal: i.ordinal, label: i.label, error: i.errorMessage ?? 'Unknown error' }));

  const rounds: RoundTally[] = [];
  const ordered = [...rules].sort((a, b) => a.round - b.round);

  if (fatalError) {
    return {
      status: 'failed',
      detail: 'Job failed to complete.',
      errorMessage: fatalError,
      rounds: ordered.map(rule => tallyRound(rule, items)),
      itemErrors,
    };
  }

  for (const rule of ordered) {
    const tally = tallyRound(rule, items);
    rounds.push(tally);

    if (!tally.met) {
      return {
        status: 'failed',
        detail: `${rule.label} failed`,
        errorMessage: `${rule.label}: only ${tally.succeeded} of ${tally.total} items succeeded (minimum ${tally.required})`,
        rounds,
        itemErrors,
      };
    }
  }

  const succeeded = rounds.reduce((sum, r) => sum + r.succeeded, 0);
  const total = rounds.reduce((sum, r) => sum + r.total, 0);
  const detail = itemErrors.length > 0
    ? `Completed with ${succeeded} of ${total} items; ${itemErrors.length} failed`
    : `Completed: ${succeeded} of ${total} items succeeded`;

  return { status: 'completed', detail, rounds, itemErrors };
}
