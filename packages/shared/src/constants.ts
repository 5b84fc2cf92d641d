/**
 * Shared constants for Ragline.
 */

export const LATENCY_BUDGETS = {
  PLANNING: 2000, // ms
  RETRIEVAL: 500, // ms
  RERANKING: 2000, // ms
  GENERATION: 8000, // ms
  TOTAL: 15000, // ms
} as const;

export const RAG_DEFAULTS = {
  TOP_K: 5,
  MAX_CONTEXT_TOKENS: 1500,
  RERANK_POOL_SIZE: 20,
  MAX_SUB_QUERIES: 3,
  MAX_RETRIEVAL_FANOUT: 2,
  GENERATION_MAX_ATTEMPTS: 2,
  MAX_ANSWER_TOKENS: 300,
} as const;

export const RATE_LIMIT_DEFAULTS = {
  QUERY_LIMIT: 10,
  UPLOAD_LIMIT: 1,
  WINDOW_MS: 60 * 60 * 1000,
} as const;

export const BM25_PARAMS = {
  K1: 1.5,
  B: 0.75,
} as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'all-MiniLM-L6-v2',
  CACHE_TTL: 86400, // 24 hours
} as const;

export const SESSION_COOKIE = 'browser_id';
export const SESSION_HEADER = 'x-session-id';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';
