import type { FastifyReply } from 'fastify';
import type { ActionKind } from '@ragline/shared';
import {
  GenerationUnavailable,
  OperationAborted,
  QueryDeadlineExceeded,
  RateLimitExceeded,
  RetrievalUnavailable,
} from '../errors';

export function sendRateLimited(reply: FastifyReply, action: ActionKind, retryAfterMs: number): FastifyReply {
  const error = new RateLimitExceeded(action, retryAfterMs);
  return reply
    .code(429)
    .header('Retry-After', String(error.retryAfterSeconds))
    .send({ error: error.message, retryAfter: error.retryAfterSeconds });
}

/**
 * HTTP status for an error escaping the query pipeline.
 */
export function statusForError(error: unknown): number {
  if (error instanceof QueryDeadlineExceeded) {
    return 504;
  }
  if (error instanceof RetrievalUnavailable || error instanceof GenerationUnavailable) {
    return 503;
  }
  if (error instanceof OperationAborted) {
    // Client closed the connection; nobody reads this
    return 499;
  }
  return 500;
}
