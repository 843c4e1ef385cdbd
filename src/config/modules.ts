import { exponentialDelay, fixedDelay, linearDelay, noDelay } from '../lib/retry.js';
import { allItems, atLeast } from '../services/job-store/outcome.js';
import type { ExecutionPolicy } from '../modules/types.js';

/**
 * Execution policy for every round of every tool. Attempt caps, pool sizes,
 * retry delays, success thresholds and billing are read from here and nowhere else.
 */
export const EXECUTION_POLICIES = {
  summarizer: {
    summaries: { attemptCap: 3, concurrencyCap: 5, retryDelay: linearDelay(1000), threshold: allItems(), unitsPerItem: 1 },
    translations: { attemptCap: 3, concurrencyCap: 5, retryDelay: linearDelay(1000), threshold: allItems(), unitsPerItem: 0 },
  },
  translator: {
    // Billed per fully translated document when the job completes.
    chunks: { attemptCap: 3, concurrencyCap: 4, retryDelay: exponentialDelay(2000), threshold: atLeast(1), unitsPerItem: 0 },
  },
  grader: {
    // One attempt per run: the attempt budget is the sampling budget below. Billed once per completed job.
    scoring: { attemptCap: 1, concurrencyCap: 1, retryDelay: noDelay, threshold: atLeast(8), unitsPerItem: 0 },
    // Recommendations are skipped when this call fails.
    keywords: { attemptCap: 1, concurrencyCap: 1, retryDelay: noDelay, threshold: atLeast(0), unitsPerItem: 0 },
  },
  'info-extract': {
    documents: { attemptCap: 3, concurrencyCap: 5, retryDelay: linearDelay(1500), threshold: atLeast(1), unitsPerItem: 1 },
  },
  reviewer: {
    reviews: { attemptCap: 3, concurrencyCap: 8, retryDelay: fixedDelay(2000), threshold: atLeast(4), unitsPerItem: 0 },
    metaReview: { attemptCap: 3, concurrencyCap: 1, retryDelay: fixedDelay(2000), threshold: allItems(), unitsPerItem: 0 },
    factCheck: { attemptCap: 3, concurrencyCap: 1, retryDelay: fixedDelay(2000), threshold: allItems(), unitsPerItem: 1 },
  },
} satisfies Record<string, Record<string, ExecutionPolicy>>;

export const GRADER_SAMPLING = { target: 12, maxItems: 30, pauseMs: 500 };
export const GRADER_COMPLETION_UNITS = 1;
export const GRADER_DOCX_PENALTY = 0.02;

export const TRANSLATION_CHUNK_MAX_PARAGRAPHS = 20;
export const TRANSLATION_CHUNK_MAX_WORDS = 700;

export const REVIEWER_SLOTS = 8;
