import { FastifyPluginAsync } from 'fastify';

export type HealthCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  /** Dependency name → check; an absent dependency is simply not listed */
  checks: Record<string, HealthCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { checks }) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'ragline-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (_request, reply) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]) => [name, (await check()) ? 'ok' : 'error'] as const)
    );
    const ready = entries.every(([, status]) => status === 'ok');

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: Object.fromEntries(entries),
    });
  });
};
