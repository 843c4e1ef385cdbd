import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ServiceContainer } from '../../index.js';
import { requireAdmin } from '../plugins/auth.js';

const groupPolicyBody = z.object({
  tokenBudget: z.number().int().nonnegative().nullable().optional(),
  modules: z.array(z.object({
    moduleKey: z.string().min(1),
    unitCap: z.number().int().nonnegative().nullable(),
    unitWindowDays: z.number().int().positive().nullable().default(null),
  })).optional(),
});

const moduleConfigBody = z.object({
  models: z.record(z.string().min(1)).optional(),
  prompts: z.record(z.string().min(1)).optional(),
});

const glossaryBody = z.object({
  sourceTerm: z.string().trim().min(1),
  targetTerm: z.string().trim().min(1),
});

const topicBody = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullable().default(null),
});

const journalBody = z.object({
  name: z.string().trim().min(1),
  referenceMark: z.string().nullable().optional(),
  lowBound: z.number().nonnegative(),
  notes: z.string().nullable().optional(),
  topicScores: z.record(z.number().int().min(0).max(2)).optional(),
});

export const adminRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { quota, moduleConfig, registry, referenceData } = opts.container;

  app.addHook('preHandler', async (request) => {
    requireAdmin(request);
  });

  // GET /api/admin/usage-groups/:id
  app.get<{ Params: { id: string } }>('/usage-groups/:id', async (request) => {
    const id = z.string().uuid().parse(request.params.id);
    return { data: await quota.getGroupPolicy(id) };
  });

  // PUT /api/admin/usage-groups/:id
  app.put<{ Params: { id: string } }>('/usage-groups/:id', async (request) => {
    const id = z.string().uuid().parse(request.params.id);
    const body = groupPolicyBody.parse(request.body);
    for (const limit of body.modules ?? []) registry.require(limit.moduleKey);
    return { data: await quota.updateGroupPolicy(id, body) };
  });

  // GET /api/admin/modules/:module/config
  app.get<{ Params: { module: string } }>('/modules/:module/config', async (request) => {
    return { data: await moduleConfig.getConfig(request.params.module) };
  });

  // PUT /api/admin/modules/:module/config
  app.put<{ Params: { module: string } }>('/modules/:module/config', async (request) => {
    const body = moduleConfigBody.parse(request.body);
    return { data: await moduleConfig.updateConfig(request.params.module, body) };
  });

  // DELETE /api/admin/modules/:module/config
  app.delete<{ Params: { module: string } }>('/modules/:module/config', async (request) => {
    return { data: await moduleConfig.resetConfig(request.params.module) };
  });

  // GET /api/admin/glossary
  app.get('/glossary', async () => {
    return { data: await referenceData.listGlossary() };
  });

  // PUT /api/admin/glossary
  app.put('/glossary', async (request) => {
    const body = glossaryBody.parse(request.body);
    return { data: await referenceData.upsertGlossaryTerm(body.sourceTerm, body.targetTerm) };
  });

  // DELETE /api/admin/glossary/:id
  app.delete<{ Params: { id: string } }>('/glossary/:id', async (request, reply) => {
    await referenceData.deleteGlossaryTerm(z.string().uuid().parse(request.params.id));
    return reply.status(204).send();
  });

  // GET /api/admin/journal-topics
  app.get('/journal-topics', async () => {
    return { data: await referenceData.listTopics() };
  });

  // PUT /api/admin/journal-topics
  app.put('/journal-topics', async (request) => {
    const body = topicBody.parse(request.body);
    return { data: await referenceData.upsertTopic(body.name, body.description) };
  });

  // DELETE /api/admin/journal-topics/:id
  app.delete<{ Params: { id: string } }>('/journal-topics/:id', async (request, reply) => {
    await referenceData.deleteTopic(z.string().uuid().parse(request.params.id));
    return reply.status(204).send();
  });

  // GET /api/admin/journals
  app.get('/journals', async () => {
    return { data: await referenceData.listJournals() };
  });

  // PUT /api/admin/journals
  app.put('/journals', async (request) => {
    return { data: await referenceData.upsertJournal(journalBody.parse(request.body)) };
  });

  // DELETE /api/admin/journals/:id
  app.delete<{ Params: { id: string } }>('/journals/:id', async (request, reply) => {
    await referenceData.deleteJournal(z.string().uuid().parse(request.params.id));
    return reply.status(204).send();
  });
};
