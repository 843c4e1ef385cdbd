import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { errorMessage } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import type { ArtifactStorage } from '../../lib/storage.js';
import type { JobStore } from '../job-store/index.js';

export interface SweepResult {
  scanned: number;
  purged: number;
  skipped: number;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Removes the files of terminal jobs older than the retention period and
 * marks them purged. A job whose files cannot be removed is left for the next
 * sweep; nothing a single job does stops the sweep.
 */
export class RetentionSweeper {
  private running: Promise<SweepResult> | null = null;

  constructor(
    private readonly store: JobStore,
    private readonly storage: ArtifactStorage,
    private readonly retentionHours: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Runs one sweep; a call made while a sweep is in progress joins it. */
  sweep(): Promise<SweepResult> {
    if (!this.running) {
      this.running = this.sweepOnce().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async sweepOnce(): Promise<SweepResult> {
    const cutoff = new Date(this.clock().getTime() - this.retentionHours * HOUR_MS);
    const candidates = await this.store.findPurgeCandidates(cutoff);
    const result: SweepResult = { scanned: candidates.length, purged: 0, skipped: 0 };

    for (const job of candidates) {
      try {
        const removal = await this.storage.removeJobDirectory(job.moduleKey, job.id);
        const purged = await this.store.markPurged(job.id);
        if (purged) {
          result.purged += 1;
          logger.info({ jobId: job.id, moduleKey: job.moduleKey, removal }, 'Job files purged');
        }
      } catch (error) {
        result.skipped += 1;
        logger.warn({ jobId: job.id, moduleKey: job.moduleKey, error: errorMessage(error) }, 'Skipped job during retention sweep');
      }
    }

    logger.info({ ...result, cutoff: cutoff.toISOString() }, 'Retention sweep finished');
    return result;
  }
}
