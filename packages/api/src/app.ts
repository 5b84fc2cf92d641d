import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { randomUUID } from 'crypto';
import { SESSION_COOKIE } from '@ragline/shared';
import type { AppConfig } from './config';
import type { QueryPipeline } from './services/pipeline';
import type { RateLimiter } from './services/rate-limiter';
import type { Metrics } from './observability/metrics';
import { healthRoutes, type HealthCheck } from './routes/health';
import { queryRoutes } from './routes/query';
import { ingestRoutes, type IndexRefresher } from './routes/ingest';
import { documentRoutes } from './routes/documents';
import { sessionRoutes } from './routes/session';
import { metricsRoutes } from './routes/metrics';

export interface AppDeps {
  config: AppConfig;
  pipeline: QueryPipeline;
  rateLimiter: RateLimiter;
  lexicalIndex: IndexRefresher;
  metrics: Metrics;
  checks?: Record<string, HealthCheck>;
  /** Used for calls to the ingestion worker */
  fetch?: typeof fetch;
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDeps, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const { config, metrics } = deps;
  const fetchImpl = deps.fetch ?? fetch;

  const fastify = Fastify({
    logger: options.logger ?? { level: config.logLevel, name: 'ragline-api' },
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  await fastify.register(cookie);

  fastify.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
    if (!request.cookies[SESSION_COOKIE]) {
      reply.setCookie(SESSION_COOKIE, randomUUID(), { httpOnly: true, sameSite: 'lax', path: '/' });
    }
  });

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.checks ?? {} });
  await fastify.register(metricsRoutes, { prefix: '/metrics', registry: metrics.registry });
  await fastify.register(sessionRoutes, { prefix: '/api' });
  await fastify.register(queryRoutes, {
    prefix: '/api',
    pipeline: deps.pipeline,
    rateLimiter: deps.rateLimiter,
    metrics,
    defaults: { k: config.rag.topK, maxContextTokens: config.rag.maxContextTokens },
  });
  await fastify.register(ingestRoutes, {
    prefix: '/api',
    workerUrl: config.ingestion.workerUrl,
    maxUploadMb: config.ingestion.maxUploadMb,
    timeoutMs: config.ingestion.timeoutMs,
    rateLimiter: deps.rateLimiter,
    lexicalIndex: deps.lexicalIndex,
    metrics,
    fetch: fetchImpl,
  });
  await fastify.register(documentRoutes, {
    prefix: '/api/documents',
    workerUrl: config.ingestion.workerUrl,
    lexicalIndex: deps.lexicalIndex,
    fetch: fetchImpl,
  });

  return fastify;
}
