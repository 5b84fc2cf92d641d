import type { Candidate } from '@ragline/shared';
import type { EmbeddingClient } from '../../utils/embeddings';
import type { Sql } from '../../utils/db';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { OperationAborted, RetrievalUnavailable, errorMessage } from '../../errors';
import { cancelOnAbort, type ChunkStore } from './chunk-store';

/**
 * Dense Retriever
 *
 * Embeds the query, runs a top-k similarity search against the vector
 * index, then resolves the returned ids through the chunk store.
 * An id the store cannot resolve is a backend error, not a silent drop.
 */

export interface RetrieveOptions {
  documentId?: string;
  signal?: AbortSignal;
}

export interface Retriever {
  retrieve(query: string, k: number, options?: RetrieveOptions): Promise<Candidate[]>;
}

export interface VectorMatch {
  chunkId: string;
  score: number;
}

export interface VectorIndex {
  search(
    embedding: number[],
    k: number,
    options: { documentId?: string; signal?: AbortSignal }
  ): Promise<VectorMatch[]>;
}

/**
 * Vector search using pgvector cosine similarity.
 *
 * Uses <=> operator for cosine distance (lower = more similar).
 */
export class PgVectorIndex implements VectorIndex {
  constructor(private readonly sql: Sql) {}

  async search(
    embedding: number[],
    k: number,
    { documentId, signal }: { documentId?: string; signal?: AbortSignal }
  ): Promise<VectorMatch[]> {
    // Format embedding as PostgreSQL array literal for pgvector
    const vectorString = `[${embedding.join(',')}]`;
    const documentFilter = documentId ? this.sql`WHERE document_id::text = ${documentId}` : this.sql``;

    const rows = await cancelOnAbort(
      this.sql<{ chunk_id: string; score: string | number }[]>`
        SELECT
          id::text as chunk_id,
          1 - (embedding <=> ${vectorString}::vector) as score
        FROM chunks
        ${documentFilter}
        ORDER BY embedding <=> ${vectorString}::vector
        LIMIT ${k}
      `,
      signal
    );

    return rows.map((row) => ({
      chunkId: row.chunk_id,
      score: typeof row.score === 'number' ? row.score : parseFloat(row.score),
    }));
  }
}

export interface DenseRetrieverOptions {
  timeoutMs: number;
}

export class DenseRetriever implements Retriever {
  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndex,
    private readonly chunks: ChunkStore,
    private readonly options: DenseRetrieverOptions
  ) {}

  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<Candidate[]> {
    const startTime = Date.now();

    try {
      const candidates = await withTimeout(
        (signal) => this.search(query, k, options.documentId, signal),
        this.options.timeoutMs,
        () => new RetrievalUnavailable('dense', `timed out after ${this.options.timeoutMs}ms`),
        options.signal
      );

      logger.debug({ latency: Date.now() - startTime, resultsCount: candidates.length }, 'Dense retrieval completed');
      return candidates;
    } catch (error) {
      if (error instanceof RetrievalUnavailable || error instanceof OperationAborted) {
        throw error;
      }
      throw new RetrievalUnavailable('dense', errorMessage(error), { cause: error });
    }
  }

  private async search(query: string, k: number, documentId: string | undefined, signal: AbortSignal): Promise<Candidate[]> {
    const embedding = await this.embeddings.embed(query, signal);
    const matches = await this.index.search(embedding, k, { documentId, signal });
    const resolved = await this.chunks.getChunks(matches.map((match) => match.chunkId), signal);

    const candidates: Candidate[] = [];
    for (const match of matches) {
      const chunk = resolved.get(match.chunkId);
      if (!chunk) {
        throw new RetrievalUnavailable('dense', `dangling chunk reference ${match.chunkId}`);
      }
      candidates.push({ chunk, method: 'dense', score: match.score });
    }

    // Index order is authoritative; keep it stable for equal scores
    return candidates
      .map((candidate, index) => ({ candidate, index }))
      .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
      .map(({ candidate }) => candidate);
  }
}
