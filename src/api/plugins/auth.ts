import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ForbiddenError, UnauthorizedError } from '../../lib/errors.js';
import type { SessionService, SessionUser } from '../../services/sessions/index.js';

declare module 'fastify' {
  interface FastifyRequest {
    user: SessionUser | null;
  }
}

const PUBLIC_PATHS = new Set(['/health']);

const authPluginFn: FastifyPluginAsync<{ sessions: SessionService }> = async (app, opts) => {
  app.decorateRequest('user', null);

  app.addHook('onRequest', async (request, reply) => {
    if (PUBLIC_PATHS.has(request.url.split('?')[0])) return;

    const header = request.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
    const user = token ? await opts.sessions.resolve(token) : null;
    if (!user) {
      return reply.status(401).send({ error: 'UNAUTHORIZED', message: 'A valid session is required' });
    }

    request.user = user;
  });
};

export const authPlugin = fp(authPluginFn, { name: 'auth' });

export function requireUser(request: FastifyRequest): SessionUser {
  if (!request.user) throw new UnauthorizedError();
  return request.user;
}

export function requireAdmin(request: FastifyRequest): SessionUser {
  const user = requireUser(request);
  if (!user.isAdmin) throw new ForbiddenError('Administrator access required');
  return user;
}
