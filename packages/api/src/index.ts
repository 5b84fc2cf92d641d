import { collectDefaultMetrics } from 'prom-client';
import { config, type RerankerKind } from './config';
import { buildApp } from './app';
import { logger } from './utils/logger';
import { createSql, checkDatabaseHealth } from './utils/db';
import { createRedis, checkRedisHealth } from './utils/redis';
import { createLLMClient } from './utils/llm';
import { HttpEmbeddingClient } from './utils/embeddings';
import { PostgresChunkStore } from './services/retrieval/chunk-store';
import { DenseRetriever, PgVectorIndex } from './services/retrieval/dense';
import { LexicalRetriever } from './services/retrieval/lexical';
import {
  EmbeddingReranker,
  LlmReranker,
  RerankingCircuitBreaker,
  type Reranker,
} from './services/reranking';
import { QueryPlanner } from './services/planner';
import { ToolRouter, createDefaultToolRegistry } from './services/tools';
import { AnswerGenerator } from './services/synthesis';
import { FollowupGenerator } from './services/followups';
import { MemoryRateLimitStore, RateLimiter, RedisRateLimitStore } from './services/rate-limiter';
import { QueryPipeline } from './services/pipeline';
import { createMetrics } from './observability/metrics';
import {
  CompositeTraceExporter,
  HttpTraceExporter,
  LoggerTraceExporter,
  type TraceExporter,
} from './observability/tracer';

async function start() {
  const llmSettings = config.llm;
  const apiKey = llmSettings.provider === 'openai' ? llmSettings.openai.apiKey : llmSettings.groq.apiKey;
  if (!apiKey) {
    throw new Error(
      `${llmSettings.provider === 'openai' ? 'OPENAI_API_KEY' : 'GROQ_API_KEY'} is not set. ` +
        'Please configure it in .env file.'
    );
  }

  const sql = createSql(config.database);
  const redis = config.redis.url ? createRedis(config.redis.url) : null;
  const llm = createLLMClient(llmSettings);
  logger.info({ provider: llmSettings.provider, model: llm.model }, 'LLM configured');

  const metrics = createMetrics();
  collectDefaultMetrics({ register: metrics.registry });

  const embeddings = new HttpEmbeddingClient({
    workerUrl: config.embeddings.workerUrl,
    model: config.embeddings.model,
    cacheTtl: config.embeddings.cacheTtl,
    redis,
  });
  const chunkStore = new PostgresChunkStore(sql);
  const dense = new DenseRetriever(embeddings, new PgVectorIndex(sql), chunkStore, {
    timeoutMs: config.rag.timeouts.dense,
  });
  const lexical = new LexicalRetriever(chunkStore, { timeoutMs: config.rag.timeouts.lexical });

  const rerankers: Record<RerankerKind, () => Reranker | null> = {
    llm: () => new LlmReranker(llm, new RerankingCircuitBreaker()),
    embedding: () => new EmbeddingReranker(embeddings),
    none: () => null,
  };

  const exporters: TraceExporter[] = [new LoggerTraceExporter(logger)];
  if (config.observability.traceExportUrl) {
    exporters.push(
      new HttpTraceExporter(config.observability.traceExportUrl, config.observability.traceExportTimeoutMs, logger)
    );
  }

  const { features, rag } = config;
  const pipeline = new QueryPipeline(
    {
      planner: new QueryPlanner(llm, {
        enabled: features.planning,
        maxSubQueries: rag.maxSubQueries,
        timeoutMs: rag.timeouts.planning,
      }),
      dense,
      lexical,
      reranker: rerankers[rag.reranker](),
      router: new ToolRouter(createDefaultToolRegistry(llm), llm, {
        mode: config.toolRouterMode,
        docActions: features.docActions,
        timeoutMs: rag.timeouts.tool,
      }),
      generator: new AnswerGenerator(llm, {
        maxAttempts: rag.generationMaxAttempts,
        timeoutMs: rag.timeouts.generation,
        maxAnswerTokens: rag.maxAnswerTokens,
      }),
      followups: new FollowupGenerator(llm, { timeoutMs: rag.timeouts.followups }),
      metrics,
      traceExporter: new CompositeTraceExporter(exporters),
    },
    {
      features,
      fusion: {
        normalization: rag.fusion.normalization,
        weights: { dense: rag.fusion.denseWeight, lexical: rag.fusion.lexicalWeight },
      },
      rerankPoolSize: rag.rerankPoolSize,
      rerankTimeoutMs: rag.timeouts.rerank,
      maxFanOut: rag.maxFanOut,
      deadlineMs: rag.queryDeadlineMs,
      latencyBudgets: rag.latencyBudgets,
    }
  );

  const rateLimiter = new RateLimiter({
    rules: config.rateLimits,
    store: redis ? new RedisRateLimitStore(redis) : new MemoryRateLimitStore(),
    onDecision: (action, outcome) => metrics.rateLimitDecisions.inc({ action, outcome }),
  });

  const fastify = await buildApp({
    config,
    pipeline,
    rateLimiter,
    lexicalIndex: lexical,
    metrics,
    checks: {
      database: () => checkDatabaseHealth(sql),
      ...(redis ? { redis: () => checkRedisHealth(redis) } : {}),
    },
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await fastify.close();
    await sql.end({ timeout: 5 });
    if (redis) {
      await redis.quit();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await fastify.listen({
    port: config.port,
    host: config.host,
  });

  logger.info(`API server running at http://${config.host}:${config.port}`);
}

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
