import { BM25_PARAMS, type Candidate, type Chunk } from '@ragline/shared';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { OperationAborted, RetrievalUnavailable, errorMessage } from '../../errors';
import type { ChunkStore } from './chunk-store';
import type { RetrieveOptions, Retriever } from './dense';

/**
 * Lexical Retriever
 *
 * BM25 (Okapi) over an in-memory snapshot of the chunk table:
 * rewards rare terms shared by query and chunk, saturates with term
 * frequency (k1), normalizes by chunk length (b). Deterministic for a
 * fixed snapshot: ties break by chunk id.
 */

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

interface IndexedChunk {
  chunk: Chunk;
  termFrequencies: Map<string, number>;
  length: number;
}

export class Bm25Index {
  private readonly entries: IndexedChunk[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly averageLength: number;

  constructor(
    chunks: Chunk[],
    private readonly k1: number = BM25_PARAMS.K1,
    private readonly b: number = BM25_PARAMS.B
  ) {
    this.entries = chunks.map((chunk) => {
      const termFrequencies = new Map<string, number>();
      const tokens = tokenize(chunk.content);
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      for (const term of termFrequencies.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
      return { chunk, termFrequencies, length: tokens.length };
    });

    const totalLength = this.entries.reduce((sum, entry) => sum + entry.length, 0);
    this.averageLength = this.entries.length > 0 ? totalLength / this.entries.length : 0;
  }

  get size(): number {
    return this.entries.length;
  }

  idf(term: string): number {
    const n = this.documentFrequency.get(term) ?? 0;
    const total = this.entries.length;
    return Math.log(1 + (total - n + 0.5) / (n + 0.5));
  }

  search(query: string, k: number, documentId?: string): Candidate[] {
    const terms = [...new Set(tokenize(query))];
    if (terms.length === 0 || k <= 0) {
      return [];
    }

    const scored: Candidate[] = [];
    for (const entry of this.entries) {
      if (documentId && entry.chunk.documentId !== documentId) {
        continue;
      }
      const score = this.score(entry, terms);
      if (score > 0) {
        scored.push({ chunk: entry.chunk, method: 'lexical', score });
      }
    }

    return scored
      .sort((a, b) => b.score - a.score || a.chunk.id.localeCompare(b.chunk.id))
      .slice(0, k);
  }

  private score(entry: IndexedChunk, terms: string[]): number {
    const lengthNorm = this.averageLength > 0 ? entry.length / this.averageLength : 0;
    let score = 0;

    for (const term of terms) {
      const tf = entry.termFrequencies.get(term);
      if (!tf) {
        continue;
      }
      const numerator = tf * (this.k1 + 1);
      const denominator = tf + this.k1 * (1 - this.b + this.b * lengthNorm);
      score += this.idf(term) * (numerator / denominator);
    }

    return score;
  }
}

export interface LexicalRetrieverOptions {
  timeoutMs: number;
}

export class LexicalRetriever implements Retriever {
  private snapshot: Promise<Bm25Index> | null = null;

  constructor(
    private readonly chunks: ChunkStore,
    private readonly options: LexicalRetrieverOptions
  ) {}

  /**
   * Drop the current snapshot; the next query rebuilds it.
   */
  refresh(): void {
    this.snapshot = null;
    logger.info('Lexical index snapshot invalidated');
  }

  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<Candidate[]> {
    const startTime = Date.now();

    try {
      const index = await withTimeout(
        () => this.loadSnapshot(),
        this.options.timeoutMs,
        () => new RetrievalUnavailable('lexical', `timed out after ${this.options.timeoutMs}ms`),
        options.signal
      );
      const candidates = index.search(query, k, options.documentId);

      logger.debug({ latency: Date.now() - startTime, resultsCount: candidates.length }, 'Lexical retrieval completed');
      return candidates;
    } catch (error) {
      if (error instanceof RetrievalUnavailable || error instanceof OperationAborted) {
        throw error;
      }
      throw new RetrievalUnavailable('lexical', errorMessage(error), { cause: error });
    }
  }

  private loadSnapshot(): Promise<Bm25Index> {
    if (!this.snapshot) {
      this.snapshot = this.chunks.listChunks().then(
        (chunks) => {
          logger.info({ chunks: chunks.length }, 'Lexical index snapshot built');
          return new Bm25Index(chunks);
        },
        (error: unknown) => {
          // A failed load must not stick; the next query retries it
          this.snapshot = null;
          throw error;
        }
      );
    }
    return this.snapshot;
  }
}
