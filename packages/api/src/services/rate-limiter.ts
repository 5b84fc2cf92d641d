import type Redis from 'ioredis';
import type { ActionKind } from '@ragline/shared';
import { logger } from '../utils/logger';
import { errorMessage } from '../errors';

/**
 * Fixed-window rate limiter keyed by (identity, action kind).
 *
 * A request is denied when the bucket's count has already reached the
 * limit; denied requests are not counted, so a bucket never exceeds its
 * limit. Buckets are created on first use and expire when their window
 * elapses.
 */

export interface RateLimitRule {
  limit: number;
  windowMs: number;
}

export interface ConsumeResult {
  allowed: boolean;
  /** Count after this request (unchanged when denied) */
  count: number;
  /** Time left in the current window */
  resetInMs: number;
}

export interface RateLimitStore {
  readonly name: string;
  /** Atomically check the bucket and count the request if it is admitted. */
  consume(key: string, rule: RateLimitRule): Promise<ConsumeResult>;
}

export type Admission =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

interface Bucket {
  windowStart: number;
  windowMs: number;
  count: number;
}

export class MemoryRateLimitStore implements RateLimitStore {
  readonly name = 'memory';
  private readonly buckets = new Map<string, Bucket>();
  private operations = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async consume(key: string, rule: RateLimitRule): Promise<ConsumeResult> {
    const now = this.now();
    this.sweep(now);

    let bucket = this.buckets.get(key);
    if (!bucket || now - bucket.windowStart >= rule.windowMs) {
      bucket = { windowStart: now, windowMs: rule.windowMs, count: 0 };
      this.buckets.set(key, bucket);
    }

    const resetInMs = bucket.windowStart + rule.windowMs - now;
    if (bucket.count >= rule.limit) {
      return { allowed: false, count: bucket.count, resetInMs };
    }

    bucket.count++;
    return { allowed: true, count: bucket.count, resetInMs };
  }

  get size(): number {
    return this.buckets.size;
  }

  /** Drop expired buckets every so often instead of running a timer; each bucket expires on its own window */
  private sweep(now: number): void {
    if (++this.operations % 1000 !== 0) {
      return;
    }
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.windowStart >= bucket.windowMs) {
        this.buckets.delete(key);
      }
    }
  }
}

/**
 * Check-and-increment in one round trip. The key's TTL is the window,
 * set when the bucket is created.
 * Returns { allowed (1/0), count, pttl }.
 */
const CONSUME_SCRIPT = `
local count = tonumber(redis.call('GET', KEYS[1]) or '0')
if count >= tonumber(ARGV[1]) then
  return {0, count, redis.call('PTTL', KEYS[1])}
end
count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return {1, count, redis.call('PTTL', KEYS[1])}
`;

export class RedisRateLimitStore implements RateLimitStore {
  readonly name = 'redis';

  constructor(private readonly redis: Redis, private readonly prefix = 'ratelimit') {}

  async consume(key: string, rule: RateLimitRule): Promise<ConsumeResult> {
    const reply = await this.redis.eval(CONSUME_SCRIPT, 1, `${this.prefix}:${key}`, rule.limit, rule.windowMs);

    if (!Array.isArray(reply) || reply.length !== 3 || !reply.every((value) => typeof value === 'number')) {
      throw new Error(`Unexpected rate-limit script reply: ${JSON.stringify(reply)}`);
    }
    const [allowed, count, pttl] = reply;

    return {
      allowed: allowed === 1,
      count,
      // A key without TTL should not exist; treat it as a full window
      resetInMs: pttl > 0 ? pttl : rule.windowMs,
    };
  }
}

export interface RateLimiterOptions {
  rules: Record<ActionKind, RateLimitRule>;
  store: RateLimitStore;
  /** Used when `store` errors; limits become per-process */
  fallback?: RateLimitStore;
  onDecision?: (action: ActionKind, outcome: 'allowed' | 'denied') => void;
}

export class RateLimiter {
  private readonly fallback: RateLimitStore;

  constructor(private readonly options: RateLimiterOptions) {
    this.fallback = options.fallback ?? new MemoryRateLimitStore();
  }

  async admit(identity: string, action: ActionKind): Promise<Admission> {
    const rule = this.options.rules[action];
    const key = `${action}:${identity}`;
    const result = await this.consume(key, rule);

    const admission: Admission = result.allowed
      ? { allowed: true, remaining: Math.max(0, rule.limit - result.count) }
      : { allowed: false, retryAfterMs: Math.max(1, result.resetInMs) };

    this.options.onDecision?.(action, admission.allowed ? 'allowed' : 'denied');
    if (!admission.allowed) {
      logger.info({ action, identity, retryAfterMs: admission.retryAfterMs }, 'Rate limit exceeded');
    }
    return admission;
  }

  private async consume(key: string, rule: RateLimitRule): Promise<ConsumeResult> {
    const { store } = this.options;
    if (store === this.fallback) {
      return store.consume(key, rule);
    }
    try {
      return await store.consume(key, rule);
    } catch (error) {
      logger.warn(
        { store: store.name, error: errorMessage(error) },
        'Rate-limit store unavailable, using in-process fallback'
      );
      return this.fallback.consume(key, rule);
    }
  }
}
