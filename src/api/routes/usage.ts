import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContainer } from '../../index.js';
import { requireUser } from '../plugins/auth.js';

export const usageRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  // GET /api/usage
  app.get('/', async (request) => {
    const user = requireUser(request);
    const report = await opts.container.jobs.usageReport(user.id);

    return {
      data: {
        windowDays: report.windowDays,
        windowStart: report.windowStart.toISOString(),
        tokensInWindow: report.tokensInWindow,
        tokenBudget: report.policy.tokenBudget,
        costUsdInWindow: report.costUsdInWindow,
        modules: report.modules.map(usage => {
          const limit = report.policy.modules.find(m => m.moduleKey === usage.moduleKey);
          return {
            moduleKey: usage.moduleKey,
            units: usage.units,
            unitsSince: usage.unitsSince?.toISOString() ?? null,
            tokens: usage.tokens,
            unitCap: limit?.unitCap ?? null,
            unitWindowDays: limit?.unitWindowDays ?? null,
          };
        }),
        group: { id: report.policy.groupId, name: report.policy.name },
      },
    };
  });
};
