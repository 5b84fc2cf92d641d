import Redis from 'ioredis';
import { createHash } from 'crypto';
import { logger } from './logger';

/**
 * Redis client for shared state.
 *
 * Used for:
 * - Rate-limit buckets: shared across API instances so limits are global
 * - Embeddings: cache query embeddings to avoid redundant worker calls
 */

export function createRedis(url: string): Redis {
  logger.info({ redisUrl: true }, 'Initializing Redis connection');

  const redis = new Redis(url, {
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
  });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch (error) {
    logger.warn({ error }, 'Redis health check failed');
    return false;
  }
}

/**
 * Cache embedding vector.
 *
 * @param ttl - Time to live in seconds (default: 24 hours)
 */
export async function cacheEmbedding(
  redis: Redis,
  text: string,
  embedding: number[],
  ttl: number = 86400
): Promise<void> {
  await redis.setex(embeddingKey(text), ttl, JSON.stringify(embedding));
}

/**
 * Retrieve cached embedding, or null if not cached or unreadable.
 */
export async function getCachedEmbedding(redis: Redis, text: string): Promise<number[] | null> {
  const cached = await redis.get(embeddingKey(text));
  if (!cached) return null;

  const parsed: unknown = JSON.parse(cached);
  if (Array.isArray(parsed) && parsed.every((value) => typeof value === 'number')) {
    return parsed;
  }
  return null;
}

function embeddingKey(text: string): string {
  return `embed:${createHash('sha1').update(text).digest('hex')}`;
}
