import { ParseError } from '../lib/errors.js';
import { extractJsonObject } from '../lib/llm-client.js';

export const LEVEL_KEYS = ['Level 1', 'Level 2', 'Level 3', 'Level 4', 'Level 5', 'Level 6'] as const;
export const LEVEL_WEIGHTS = [4, 2, 1, 1, 1, 1] as const;

export interface GradingRun {
  levels: number[];
  justification: string | null;
}

export interface GradingSummary {
  iqmScore: number;
  perLevel: number[];
  validRuns: number;
  keptRuns: number;
  justification: string | null;
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(value, 100);
}

export function isNonDecreasing(values: readonly number[]): boolean {
  return values.every((value, i) => i === 0 || values[i - 1] <= value + Number.EPSILON);
}

/** Reads one scoring completion. Missing, non-numeric or decreasing scores make the attempt invalid. */
export function parseGradingRun(text: string): GradingRun {
  const json = extractJsonObject(text);

  const levels = LEVEL_KEYS.map((key) => {
    const value = json[key];
    const numeric = typeof value === 'string' ? Number(value) : value;
    if (typeof numeric !== 'number' || Number.isNaN(numeric)) {
      throw new ParseError(`missing numeric score for ${key}`);
    }
    return clampScore(numeric);
  });

  if (!isNonDecreasing(levels)) {
    throw new ParseError(`scores must not decrease across levels (got ${levels.join(', ')})`);
  }

  const justification = typeof json.justification === 'string' && json.justification.trim()
    ? json.justification.trim()
    : null;

  return { levels, justification };
}

/** Canonical form stored for a valid run; `parseGradingRun` reads it back unchanged. */
export function formatGradingRun(run: GradingRun): string {
  const scores = Object.fromEntries(LEVEL_KEYS.map((key, i) => [key, run.levels[i]]));
  return JSON.stringify({ ...scores, justification: run.justification });
}

export function weightedMean(levels: readonly number[]): number {
  let numerator = 0;
  let denominator = 0;
  levels.forEach((score, i) => {
    const weight = LEVEL_WEIGHTS[i] ?? 0;
    numerator += score * weight;
    denominator += weight;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Mean of the middle values after dropping ceil(n/4) from each end. Returns the
 * indices that were kept; with too few values nothing is trimmed.
 */
export function interquartileMean(values: readonly number[]): { mean: number; kept: number[] } {
  if (values.length === 0) return { mean: 0, kept: [] };

  const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b]);
  const trim = Math.ceil(values.length / 4);
  const kept = values.length > 2 * trim ? order.slice(trim, values.length - trim) : order;

  const sum = kept.reduce((acc, i) => acc + values[i], 0);
  return { mean: sum / kept.length, kept };
}

export function summarizeRuns(runs: readonly GradingRun[]): GradingSummary {
  const weighted = runs.map(run => weightedMean(run.levels));
  const { mean, kept } = interquartileMean(weighted);
  const keptRuns = kept.map(i => runs[i]);

  const perLevel = LEVEL_KEYS.map((_, level) =>
    keptRuns.length === 0 ? 0 : keptRuns.reduce((sum, run) => sum + run.levels[level], 0) / keptRuns.length,
  );

  return {
    iqmScore: mean,
    perLevel,
    validRuns: runs.length,
    keptRuns: keptRuns.length,
    justification: runs.find(run => run.justification !== null)?.justification ?? null,
  };
}

/** Scales the job score and every level mean down by `rate` (0.02 takes off 2%). */
export function applyPenalty(summary: GradingSummary, rate: number): GradingSummary {
  const factor = 1 - rate;
  return {
    ...summary,
    iqmScore: summary.iqmScore * factor,
    perLevel: summary.perLevel.map(value => value * factor),
  };
}
