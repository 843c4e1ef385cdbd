import PgBoss from 'pg-boss';
import { errorMessage } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

export const QUEUES = {
  RETENTION_SWEEP: 'retention-sweep',
} as const;

export interface SchedulerHandlers {
  onRetentionSweep: () => Promise<unknown>;
}

/** Periodic maintenance on pg-boss. Job execution itself does not go through the queue. */
export class Scheduler {
  private boss: PgBoss;

  constructor(connectionString: string, private readonly sweepCron: string) {
    this.boss = new PgBoss({ connectionString });
    this.boss.on('error', (error) => {
      logger.error({ error: errorMessage(error) }, 'pg-boss error');
    });
  }

  async start(handlers: SchedulerHandlers): Promise<void> {
    await this.boss.start();

    await this.boss.createQueue(QUEUES.RETENTION_SWEEP);
    await this.boss.work(QUEUES.RETENTION_SWEEP, async (jobs: PgBoss.Job[]) => {
      for (const job of jobs) {
        logger.info({ queueJobId: job.id }, 'Running retention sweep');
        await handlers.onRetentionSweep();
      }
    });

    await this.boss.schedule(QUEUES.RETENTION_SWEEP, this.sweepCron, {}, { tz: 'UTC' });
    logger.info({ cron: this.sweepCron }, 'Scheduler started');
  }

  async stop(): Promise<void> {
    await this.boss.stop();
  }
}
