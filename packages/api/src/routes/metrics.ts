import { FastifyPluginAsync } from 'fastify';
import type { Registry } from 'prom-client';

export interface MetricsRoutesOptions {
  registry: Registry;
}

export const metricsRoutes: FastifyPluginAsync<MetricsRoutesOptions> = async (fastify, { registry }) => {
  fastify.get('/', async (_request, reply) => {
    return reply.type(registry.contentType).send(await registry.metrics());
  });
};
