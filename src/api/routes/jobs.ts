import { extname } from 'path';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ServiceContainer } from '../../index.js';
import type { ResolvedFile } from '../../services/job-service/index.js';
import { requireUser } from '../plugins/auth.js';

const CONTENT_TYPES: Record<string, string> = {
  '.txt': 'text/plain; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.json': 'application/json',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.pdf': 'application/pdf',
};

const historyQuery = z.object({
  module: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export const jobRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { jobs, storage } = opts.container;

  async function sendFile(file: ResolvedFile, reply: FastifyReply) {
    const content = await storage.read(file.path);
    return reply
      .header('content-disposition', `attachment; filename="${encodeURIComponent(file.fileName)}"`)
      .type(CONTENT_TYPES[extname(file.fileName).toLowerCase()] ?? 'application/octet-stream')
      .send(content);
  }

  // GET /api/jobs/:id
  app.get<{ Params: { id: string } }>('/:id', async (request) => {
    const user = requireUser(request);
    const view = await jobs.getStatus(request.params.id, user);
    const base = `/api/jobs/${view.id}`;

    return {
      data: {
        ...view,
        artifacts: view.artifacts.map(name => ({ name, url: `${base}/artifacts/${encodeURIComponent(name)}` })),
        items: view.items.map(item => ({
          ...item,
          downloadUrl: item.downloadable ? `${base}/items/${item.id}/download` : null,
        })),
      },
    };
  });

  // GET /api/jobs/:id/artifacts/:name
  app.get<{ Params: { id: string; name: string } }>('/:id/artifacts/:name', async (request, reply) => {
    const user = requireUser(request);
    const file = await jobs.resolveArtifact(request.params.id, request.params.name, user);
    return sendFile(file, reply);
  });

  // GET /api/jobs/:id/items/:itemId/download
  app.get<{ Params: { id: string; itemId: string } }>('/:id/items/:itemId/download', async (request, reply) => {
    const user = requireUser(request);
    const file = await jobs.resolveItemDownload(request.params.id, request.params.itemId, user);
    return sendFile(file, reply);
  });
};

export const historyRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  // GET /api/history?module=&limit=
  app.get('/', async (request) => {
    const user = requireUser(request);
    const query = historyQuery.parse(request.query);
    const entries = await opts.container.jobs.listHistory(user.id, query.module, query.limit);

    return {
      data: entries.map(entry => ({
        ...entry,
        statusUrl: entry.status ? `/api/jobs/${entry.jobKey}` : null,
      })),
    };
  });
};
