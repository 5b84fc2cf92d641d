import { Counter, Histogram, Registry } from 'prom-client';

const LENGTH_BUCKETS = [16, 64, 128, 256, 512, 1024, 2048, 4096, 8192, 16384];
const COUNT_BUCKETS = [0, 1, 2, 3, 5, 8, 10, 15, 20, 30, 50];

export function createMetrics(registry: Registry = new Registry()) {
  const registers = [registry];

  return {
    registry,

    requests: new Counter({
      name: 'rag_requests_total',
      help: 'Total API requests',
      labelNames: ['endpoint'] as const,
      registers,
    }),
    errors: new Counter({
      name: 'rag_errors_total',
      help: 'Total API errors',
      labelNames: ['endpoint'] as const,
      registers,
    }),
    rateLimitDecisions: new Counter({
      name: 'rag_rate_limit_decisions_total',
      help: 'Rate limit decisions by action and outcome',
      labelNames: ['action', 'outcome'] as const,
      registers,
    }),
    latency: new Histogram({
      name: 'rag_latency_seconds',
      help: 'Latency by pipeline stage',
      labelNames: ['stage'] as const,
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 20, 30],
      registers,
    }),
    tokens: new Counter({
      name: 'rag_tokens_total',
      help: 'LLM tokens used',
      labelNames: ['type'] as const,
      registers,
    }),
    degraded: new Counter({
      name: 'rag_degraded_total',
      help: 'Stages that completed in a degraded state',
      labelNames: ['stage'] as const,
      registers,
    }),
    toolInvocations: new Counter({
      name: 'rag_tool_invocations_total',
      help: 'Tool invocations by tool and outcome',
      labelNames: ['tool', 'outcome'] as const,
      registers,
    }),
    queryLength: new Histogram({
      name: 'rag_query_length_chars',
      help: 'Query length in characters',
      buckets: LENGTH_BUCKETS,
      registers,
    }),
    contextLength: new Histogram({
      name: 'rag_context_length_chars',
      help: 'Assembled context length in characters',
      buckets: LENGTH_BUCKETS,
      registers,
    }),
    retrievedCount: new Histogram({
      name: 'rag_retrieved_chunks',
      help: 'Fused candidates per query',
      buckets: COUNT_BUCKETS,
      registers,
    }),
    rerankedCount: new Histogram({
      name: 'rag_reranked_chunks',
      help: 'Candidates rescored by the reranker per query',
      buckets: COUNT_BUCKETS,
      registers,
    }),
    usedCount: new Histogram({
      name: 'rag_context_chunks',
      help: 'Chunks packed into the context per query',
      buckets: COUNT_BUCKETS,
      registers,
    }),
  };
}

export type Metrics = ReturnType<typeof createMetrics>;
