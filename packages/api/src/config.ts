import dotenv from 'dotenv';
import { z } from 'zod';
import {
  EMBEDDING_CONFIG,
  LATENCY_BUDGETS,
  RAG_DEFAULTS,
  RATE_LIMIT_DEFAULTS,
} from '@ragline/shared';

dotenv.config();

type Env = Record<string, string | undefined>;

const LlmProviderSchema = z.enum(['groq', 'openai']);
const NormalizationSchema = z.enum(['minmax', 'max', 'rank']);
const RerankerSchema = z.enum(['llm', 'embedding', 'none']);
const ToolRouterModeSchema = z.enum(['rules', 'llm']);

export type LlmProvider = z.infer<typeof LlmProviderSchema>;
export type RerankerKind = z.infer<typeof RerankerSchema>;

function int(env: Env, name: string, fallback: number): number {
  const parsed = parseInt(env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function float(env: Env, name: string, fallback: number): number {
  const parsed = parseFloat(env[name] ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function oneOf<T extends z.ZodTypeAny>(schema: T, env: Env, name: string, fallback: z.infer<T>): z.infer<T> {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = schema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid value for ${name}: "${raw}"`);
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env) {
  return {
    // Server
    env: env.NODE_ENV || 'development',
    host: env.HOST || '0.0.0.0',
    port: int(env, 'PORT', 3000),
    logLevel: env.LOG_LEVEL || 'info',
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3001').split(','),

    // Database (chunks table + pgvector)
    database: {
      host: env.DB_HOST || 'localhost',
      port: int(env, 'DB_PORT', 5432),
      database: env.DB_NAME || 'ragline',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || 'postgres',
    },

    // Redis (rate limits + embedding cache). Unset → in-process stores.
    redis: {
      url: env.REDIS_URL || undefined,
    },

    llm: {
      provider: oneOf(LlmProviderSchema, env, 'LLM_PROVIDER', 'groq'),
      groq: {
        apiKey: env.GROQ_API_KEY || '',
        model: env.GROQ_MODEL || 'llama-3.3-70b-versatile',
      },
      openai: {
        apiKey: env.OPENAI_API_KEY || '',
        model: env.OPENAI_MODEL || 'gpt-4.1-mini',
      },
    },

    // Embeddings (via worker)
    embeddings: {
      workerUrl: env.EMBEDDING_WORKER_URL || 'http://localhost:8000',
      model: env.EMBEDDINGS_MODEL || EMBEDDING_CONFIG.MODEL,
      cacheTtl: int(env, 'EMBEDDING_CACHE_TTL', EMBEDDING_CONFIG.CACHE_TTL),
    },

    ingestion: {
      workerUrl: env.INGEST_WORKER_URL || 'http://localhost:8000',
      maxUploadMb: int(env, 'MAX_UPLOAD_MB', 10),
      timeoutMs: int(env, 'INGEST_TIMEOUT_MS', 60000),
    },

    rag: {
      topK: int(env, 'RAG_TOP_K', RAG_DEFAULTS.TOP_K),
      maxContextTokens: int(env, 'RAG_MAX_CONTEXT_TOKENS', RAG_DEFAULTS.MAX_CONTEXT_TOKENS),
      maxAnswerTokens: int(env, 'RAG_MAX_ANSWER_TOKENS', RAG_DEFAULTS.MAX_ANSWER_TOKENS),
      rerankPoolSize: int(env, 'RAG_RERANK_POOL_SIZE', RAG_DEFAULTS.RERANK_POOL_SIZE),
      reranker: oneOf(RerankerSchema, env, 'RERANKER', 'llm'),
      maxSubQueries: int(env, 'MAX_SUB_QUERIES', RAG_DEFAULTS.MAX_SUB_QUERIES),
      maxFanOut: int(env, 'MAX_RETRIEVAL_FANOUT', RAG_DEFAULTS.MAX_RETRIEVAL_FANOUT),
      generationMaxAttempts: int(env, 'GENERATION_MAX_ATTEMPTS', RAG_DEFAULTS.GENERATION_MAX_ATTEMPTS),
      fusion: {
        normalization: oneOf(NormalizationSchema, env, 'FUSION_NORMALIZATION', 'minmax'),
        denseWeight: float(env, 'FUSION_DENSE_WEIGHT', 0.5),
        lexicalWeight: float(env, 'FUSION_LEXICAL_WEIGHT', 0.5),
      },

      // Per-call timeouts (ms)
      timeouts: {
        dense: int(env, 'TIMEOUT_DENSE_MS', 3000),
        lexical: int(env, 'TIMEOUT_LEXICAL_MS', 2000),
        rerank: int(env, 'TIMEOUT_RERANK_MS', 5000),
        planning: int(env, 'TIMEOUT_PLANNING_MS', 5000),
        tool: int(env, 'TIMEOUT_TOOL_MS', 10000),
        generation: int(env, 'TIMEOUT_GENERATION_MS', 15000),
        followups: int(env, 'TIMEOUT_FOLLOWUPS_MS', 5000),
      },
      queryDeadlineMs: int(env, 'QUERY_DEADLINE_MS', 30000),

      // Latency budgets (ms), warn-only
      latencyBudgets: {
        planning: int(env, 'LATENCY_PLANNING', LATENCY_BUDGETS.PLANNING),
        retrieval: int(env, 'LATENCY_RETRIEVAL', LATENCY_BUDGETS.RETRIEVAL),
        reranking: int(env, 'LATENCY_RERANKING', LATENCY_BUDGETS.RERANKING),
        generation: int(env, 'LATENCY_GENERATION', LATENCY_BUDGETS.GENERATION),
        total: int(env, 'LATENCY_TOTAL', LATENCY_BUDGETS.TOTAL),
      },
    },

    rateLimits: {
      query: {
        limit: int(env, 'RATE_LIMIT_QUERY', RATE_LIMIT_DEFAULTS.QUERY_LIMIT),
        windowMs: int(env, 'RATE_LIMIT_WINDOW_MS', RATE_LIMIT_DEFAULTS.WINDOW_MS),
      },
      upload: {
        limit: int(env, 'RATE_LIMIT_UPLOAD', RATE_LIMIT_DEFAULTS.UPLOAD_LIMIT),
        windowMs: int(env, 'RATE_LIMIT_WINDOW_MS', RATE_LIMIT_DEFAULTS.WINDOW_MS),
      },
    },

    features: {
      toolRouter: flag(env, 'ENABLE_TOOL_ROUTER', true),
      docActions: flag(env, 'ENABLE_DOC_ACTIONS', true),
      followups: flag(env, 'ENABLE_FOLLOWUPS', true),
      planning: flag(env, 'ENABLE_PLANNING', false),
    },
    toolRouterMode: oneOf(ToolRouterModeSchema, env, 'TOOL_ROUTER_MODE', 'rules'),

    observability: {
      traceExportUrl: env.TRACE_EXPORT_URL || undefined,
      traceExportTimeoutMs: int(env, 'TRACE_EXPORT_TIMEOUT_MS', 2000),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();
