import type Redis from 'ioredis';
import { z } from 'zod';
import { getCachedEmbedding, cacheEmbedding } from './redis';
import { logger } from './logger';

/**
 * Embeddings client.
 *
 * The embedding model runs in the ingestion worker (sentence-transformers);
 * queries must be embedded with the same model as the stored chunks.
 *
 * Strategy:
 * 1. Check Redis cache first (24h TTL)
 * 2. If miss → call the worker's /embed endpoint
 * 3. Store result in Redis for future hits
 */

export interface EmbeddingClient {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const EmbedResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const EmbedBatchResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export interface HttpEmbeddingClientOptions {
  workerUrl: string;
  model: string;
  cacheTtl: number;
  redis?: Redis | null;
}

export class HttpEmbeddingClient implements EmbeddingClient {
  constructor(private readonly options: HttpEmbeddingClientOptions) {}

  /**
   * Generate embedding for a query, going through the cache.
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    // Normalize query (lowercase + trim) for better cache hits
    const normalizedText = text.toLowerCase().trim();
    const { redis } = this.options;

    if (redis) {
      const cached = await this.readCache(redis, normalizedText);
      if (cached) {
        return cached;
      }
    }

    const data = EmbedResponseSchema.parse(
      await this.post('/embed', { text, model: this.options.model }, signal)
    );

    if (redis) {
      await cacheEmbedding(redis, normalizedText, data.embedding, this.options.cacheTtl).catch((error: unknown) => {
        logger.warn({ error }, 'Failed to cache embedding');
      });
    }

    return data.embedding;
  }

  /**
   * Embed several texts in one worker call (used for chunk reranking).
   */
  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const data = EmbedBatchResponseSchema.parse(
      await this.post('/embed/batch', { texts, model: this.options.model }, signal)
    );
    if (data.embeddings.length !== texts.length) {
      throw new Error(`Embedding service returned ${data.embeddings.length} vectors for ${texts.length} texts`);
    }
    return data.embeddings;
  }

  private async readCache(redis: Redis, text: string): Promise<number[] | null> {
    try {
      return await getCachedEmbedding(redis, text);
    } catch (error) {
      logger.warn({ error }, 'Embedding cache read failed');
      return null;
    }
  }

  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.options.workerUrl}${path}`;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        throw new Error(`Embedding service returned ${response.status}`);
      }

      return await response.json();
    } catch (error) {
      logger.error({ error, path }, 'Embedding service call failed');
      throw error;
    }
  }
}
