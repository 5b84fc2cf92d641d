import type { ActionKind, RetrievalMethod } from '@ragline/shared';

/**
 * Error kinds raised by pipeline stages.
 *
 * Each carries a `kind` discriminant so callers can branch without
 * instanceof chains, and a `stage` that names the trace span it belongs to.
 */

export type PipelineErrorKind =
  | 'RetrievalUnavailable'
  | 'RerankUnavailable'
  | 'GenerationUnavailable'
  | 'RateLimitExceeded'
  | 'ToolExecutionFailed'
  | 'QueryDeadlineExceeded';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RetrievalUnavailable extends PipelineError {
  readonly kind = 'RetrievalUnavailable';

  constructor(readonly method: RetrievalMethod | 'all', message: string, options?: { cause?: unknown }) {
    super(`${method} retrieval unavailable: ${message}`, options);
  }
}

export class RerankUnavailable extends PipelineError {
  readonly kind = 'RerankUnavailable';
}

export class GenerationUnavailable extends PipelineError {
  readonly kind = 'GenerationUnavailable';

  constructor(readonly attempts: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RateLimitExceeded extends PipelineError {
  readonly kind = 'RateLimitExceeded';

  constructor(readonly actionKind: ActionKind, readonly retryAfterMs: number) {
    super(`Rate limit exceeded for ${actionKind}. Try again later.`);
  }

  /** Whole seconds for the Retry-After header, never below 1 */
  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

export class ToolExecutionFailed extends PipelineError {
  readonly kind = 'ToolExecutionFailed';

  constructor(readonly tool: string, message: string, options?: { cause?: unknown }) {
    super(`Tool ${tool} failed: ${message}`, options);
  }
}

export class QueryDeadlineExceeded extends PipelineError {
  readonly kind = 'QueryDeadlineExceeded';
}

/**
 * Thrown by withTimeout when the caller's own signal aborts
 * (client disconnect or request deadline), as opposed to a per-call timeout.
 */
export class OperationAborted extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'OperationAborted';
  }
}

/**
 * Explicit result of a stage that may degrade instead of failing.
 */
export type StageOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string }
  | { status: 'failed'; error: Error };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
