import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { authPlugin } from './plugins/auth.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { moduleRoutes } from './routes/modules.js';
import { historyRoutes, jobRoutes } from './routes/jobs.js';
import { usageRoutes } from './routes/usage.js';
import { adminRoutes } from './routes/admin.js';
import type { ServiceContainer } from '../index.js';
import { MAX_DOCUMENTS } from '../modules/documents.js';

export interface AppOptions {
  logger?: boolean;
}

export async function buildApp(container: ServiceContainer, options: AppOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
  });

  // Plugins
  await app.register(cors, { origin: true, methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'] });
  await app.register(multipart, { limits: { fileSize: 25 * 1024 * 1024, files: MAX_DOCUMENTS + 1 } });
  await app.register(authPlugin, { sessions: container.sessions });
  await app.register(errorHandlerPlugin);

  // Routes
  await app.register(moduleRoutes, { prefix: '/api/modules', container });
  await app.register(jobRoutes, { prefix: '/api/jobs', container });
  await app.register(historyRoutes, { prefix: '/api/history', container });
  await app.register(usageRoutes, { prefix: '/api/usage', container });
  await app.register(adminRoutes, { prefix: '/api/admin', container });

  // Health check
  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  return app;
}
