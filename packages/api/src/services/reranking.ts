import { cosineSimilarity, type FusedCandidate, type RankedCandidate } from '@ragline/shared';
import type { LLMClient } from '../utils/llm';
import type { EmbeddingClient } from '../utils/embeddings';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { OperationAborted, RerankUnavailable, errorMessage } from '../errors';

/**
 * Reranking Service
 *
 * Purpose: PRECISION PASS after recall-focused retrieval and fusion.
 *
 * Flow:
 * 1. Fusion returns a merged list (high recall)
 * 2. The top-N (pool) is rescored against the raw query
 * 3. Candidates outside the pool keep their fused order after it
 *
 * Resilience:
 * - Every rerank call runs under a timeout
 * - Any failure returns the fused order unchanged, flagged as degraded
 * - The LLM reranker sits behind a circuit breaker so a slow or broken
 *   provider stops being called until it recovers
 */

export interface Reranker {
  readonly name: string;
  /** One relevance score per candidate, in input order */
  score(query: string, candidates: FusedCandidate[], signal: AbortSignal): Promise<number[]>;
}

export interface RerankOptions {
  poolSize: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RerankResult {
  candidates: RankedCandidate[];
  degraded: boolean;
  reason?: string;
  scores: Array<{ chunkId: string; score: number }>;
}

function unranked(candidates: FusedCandidate[]): RankedCandidate[] {
  return candidates.map((candidate) => ({ ...candidate, rerankScore: null }));
}

/**
 * Rerank the fused list. Never throws for backend failures: falls back
 * to the fused order with `degraded: true`. Caller aborts still propagate.
 */
export async function rerankCandidates(
  reranker: Reranker | null,
  query: string,
  fused: FusedCandidate[],
  options: RerankOptions
): Promise<RerankResult> {
  if (!reranker || fused.length === 0) {
    return { candidates: unranked(fused), degraded: false, scores: [] };
  }

  const startTime = Date.now();
  const pool = fused.slice(0, Math.max(0, options.poolSize));
  const rest = fused.slice(pool.length);

  try {
    const scores = await withTimeout(
      (signal) => reranker.score(query, pool, signal),
      options.timeoutMs,
      () => new RerankUnavailable(`${reranker.name} reranker timed out after ${options.timeoutMs}ms`),
      options.signal
    );

    if (scores.length !== pool.length || scores.some((score) => !Number.isFinite(score))) {
      throw new RerankUnavailable(`${reranker.name} reranker returned ${scores.length} scores for ${pool.length} candidates`);
    }

    const reranked = pool
      .map((candidate, i) => ({ ...candidate, rerankScore: scores[i] }))
      .sort(
        (a, b) =>
          b.rerankScore - a.rerankScore ||
          a.rank - b.rank ||
          a.chunk.id.localeCompare(b.chunk.id)
      );

    logger.debug(
      { latency: Date.now() - startTime, reranker: reranker.name, poolSize: pool.length },
      'Reranking completed'
    );

    return {
      candidates: [...reranked, ...unranked(rest)],
      degraded: false,
      scores: reranked.map((candidate) => ({ chunkId: candidate.chunk.id, score: candidate.rerankScore })),
    };
  } catch (error) {
    if (error instanceof OperationAborted) {
      throw error;
    }
    const reason = errorMessage(error);
    logger.warn({ reason, reranker: reranker.name }, 'Reranking failed, using fused order');
    return { candidates: unranked(fused), degraded: true, reason, scores: [] };
  }
}

/**
 * Circuit Breaker States
 */
type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  latencyThreshold: number;
  resetTimeout: number;
  now?: () => number;
}

/**
 * Circuit Breaker for LLM reranking.
 * Tracks failures and latency to protect the pipeline from a slow/broken LLM.
 */
export class RerankingCircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureTime = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions = {
    failureThreshold: 5,      // Trip after 5 failures
    latencyThreshold: 5000,   // 5 seconds max latency
    resetTimeout: 30000,      // Try recovery after 30s
  }) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Check if circuit is OPEN and ready to test recovery
   */
  private shouldAttemptReset(): boolean {
    if (this.state === 'OPEN') {
      if (this.now() - this.lastFailureTime >= this.options.resetTimeout) {
        this.state = 'HALF_OPEN';
        logger.info('Circuit breaker: HALF_OPEN, testing LLM recovery');
        return true;
      }
    }
    return false;
  }

  isOpen(): boolean {
    this.shouldAttemptReset();
    return this.state === 'OPEN';
  }

  recordSuccess(latency: number): void {
    if (latency > this.options.latencyThreshold) {
      this.recordFailure(`High latency: ${latency}ms`);
      return;
    }
    if (this.state === 'HALF_OPEN') {
      this.state = 'CLOSED';
      logger.info('Circuit breaker: CLOSED, LLM recovered');
    }
    this.failureCount = 0;
  }

  /**
   * Record failed or slow LLM call
   */
  recordFailure(reason: string): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.options.failureThreshold) {
      if (this.state !== 'OPEN') {
        this.state = 'OPEN';
        logger.warn({ reason, failureCount: this.failureCount }, 'Circuit breaker: OPEN, skipping LLM reranking');
      }
    } else {
      logger.warn({ reason, failureCount: this.failureCount }, 'LLM failure recorded');
    }
  }

  getState(): CircuitState {
    return this.state;
  }
}

const SCORES_PATTERN = /\[[\d\s.,]+\]/;

/**
 * Cross-encoder-style relevance judgment through the completion API.
 *
 * BATCH OPTIMIZATION:
 * - Groups chunks (5 per batch)
 * - Scores all chunks in a batch with a single LLM call
 */
export class LlmReranker implements Reranker {
  readonly name = 'llm';

  constructor(
    private readonly llm: LLMClient,
    private readonly breaker: RerankingCircuitBreaker = new RerankingCircuitBreaker(),
    private readonly batchSize: number = 5
  ) {}

  async score(query: string, candidates: FusedCandidate[], signal: AbortSignal): Promise<number[]> {
    if (this.breaker.isOpen()) {
      throw new RerankUnavailable('circuit breaker OPEN');
    }

    const startTime = Date.now();
    const batches: FusedCandidate[][] = [];
    for (let i = 0; i < candidates.length; i += this.batchSize) {
      batches.push(candidates.slice(i, i + this.batchSize));
    }

    try {
      const scoredPerBatch = await Promise.all(
        batches.map((batch) => this.scoreBatch(query, batch, signal))
      );
      this.breaker.recordSuccess(Date.now() - startTime);
      return scoredPerBatch.flat();
    } catch (error) {
      if (!signal.aborted) {
        this.breaker.recordFailure(`LLM error: ${errorMessage(error)}`);
      }
      throw error;
    }
  }

  private async scoreBatch(query: string, batch: FusedCandidate[], signal: AbortSignal): Promise<number[]> {
    const chunksText = batch
      .map((candidate, idx) => `[Chunk ${idx + 1}] ${candidate.chunk.content.substring(0, 400)}`)
      .join('\n\n');

    const prompt = `You are a relevance scoring system. Given a query and text chunks, score each chunk's relevance to the query (0.0-1.0).

Respond with ONLY a JSON array of numbers (one score per chunk):
[score1, score2, ...]

Query: ${query}

Chunks:
${chunksText}

Scores:`;

    const completion = await this.llm.generate(prompt, {
      temperature: 0,
      maxTokens: 100,
      signal,
    });

    // Parse JSON array of scores
    const scoresMatch = completion.text.match(SCORES_PATTERN);
    if (!scoresMatch) {
      throw new RerankUnavailable(`unparseable scores: ${completion.text.slice(0, 80)}`);
    }

    const parsed: unknown = JSON.parse(scoresMatch[0]);
    if (!Array.isArray(parsed) || parsed.length !== batch.length) {
      throw new RerankUnavailable(`expected ${batch.length} scores`);
    }

    return parsed.map((value) => (typeof value === 'number' ? Math.max(0, Math.min(1, value)) : 0));
  }
}

/**
 * Cosine similarity between the query embedding and each chunk embedding.
 * Cheaper than the LLM judgment; no circuit breaker needed.
 */
export class EmbeddingReranker implements Reranker {
  readonly name = 'embedding';

  constructor(private readonly embeddings: EmbeddingClient) {}

  async score(query: string, candidates: FusedCandidate[], signal: AbortSignal): Promise<number[]> {
    const [queryEmbedding, chunkEmbeddings] = await Promise.all([
      this.embeddings.embed(query, signal),
      this.embeddings.embedBatch(candidates.map((candidate) => candidate.chunk.content), signal),
    ]);
    return chunkEmbeddings.map((embedding) => cosineSimilarity(queryEmbedding, embedding));
  }
}
