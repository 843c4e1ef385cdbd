import { buildApp } from './api/index.js';
import { initDb, closeDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { config } from './config/index.js';
import { createServiceContainer, type ServiceContainer } from './container.js';
import { AnthropicExecutor } from './lib/llm-client.js';
import { errorMessage } from './lib/errors.js';
import { Scheduler } from './services/scheduler/index.js';
import { logger } from './lib/logger.js';

export type { ServiceContainer };

async function main() {
  // 1. Initialize database
  const db = initDb(config.databaseUrl);
  await runMigrations(db);
  logger.info('Database initialized');

  // 2. Initialize services
  const container = createServiceContainer({
    db,
    llm: new AnthropicExecutor(config.anthropicApiKey),
    storageRoot: config.storageRoot,
    defaultModel: config.defaultModel,
    retentionHours: config.retentionHours,
    historyLimit: config.historyLimit,
  });
  logger.info({ modules: container.registry.keys() }, 'Modules registered');

  // 3. Pick up jobs left behind by the previous process
  await container.runner.recover();

  // 4. Start scheduler
  const scheduler = new Scheduler(config.databaseUrl, config.sweepCron);
  await scheduler.start({ onRetentionSweep: () => container.sweeper.sweep() });

  // 5. Start API
  const app = await buildApp(container);
  await app.listen({ port: config.apiPort, host: '0.0.0.0' });
  logger.info({ port: config.apiPort }, 'API server started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await scheduler.stop();
    // In-flight jobs are failed as interrupted by the next start-up.
    logger.info({ activeJobs: container.runner.activeJobs }, 'Abandoning running jobs');
    await closeDb();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger.error({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger.error({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

main().catch((error) => {
  logger.fatal({ error: errorMessage(error) }, 'Failed to start');
  process.exit(1);
});
