import { FastifyPluginAsync } from 'fastify';
import { randomUUID } from 'crypto';

/**
 * GET /api/session
 * Fresh identity for clients that cannot keep the browser cookie and
 * send it back as x-session-id instead.
 */
export const sessionRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/session', async () => {
    return { user_id: randomUUID() };
  });
};
