import { randomUUID } from 'crypto';
import { logger, type Logger } from '../utils/logger';
import { errorMessage } from '../errors';

/**
 * Per-query tracing.
 *
 * A QueryTrace is a tree of spans under one root span. Stages open
 * child spans, attach metadata, and flag errors or degradation. The
 * trace is finished exactly once; after that it is frozen and handed to
 * the exporter, and further mutations are ignored.
 */

export type SpanStatus = 'ok' | 'degraded' | 'error';
export type TraceStatus = 'ok' | 'degraded' | 'failed' | 'aborted';

export interface SpanRecord {
  id: string;
  parentId: string | null;
  name: string;
  startTime: number;
  endTime: number | null;
  durationMs: number | null;
  status: SpanStatus;
  attributes: Record<string, unknown>;
  error?: string;
}

export interface TraceRecord {
  traceId: string;
  name: string;
  status: TraceStatus;
  startTime: number;
  endTime: number;
  durationMs: number;
  attributes: Record<string, unknown>;
  spans: SpanRecord[];
}

export interface TraceExporter {
  export(trace: TraceRecord): Promise<void>;
}

export class Span {
  constructor(
    private readonly trace: QueryTrace,
    readonly record: SpanRecord
  ) {}

  get id(): string {
    return this.record.id;
  }

  setAttributes(attributes: Record<string, unknown>): this {
    if (!this.trace.finished) {
      Object.assign(this.record.attributes, attributes);
    }
    return this;
  }

  markDegraded(reason: string): this {
    if (!this.trace.finished && this.record.status === 'ok') {
      this.record.status = 'degraded';
      this.record.attributes.degradedReason = reason;
    }
    return this;
  }

  recordError(error: unknown): this {
    if (!this.trace.finished) {
      this.record.status = 'error';
      this.record.error = errorMessage(error);
    }
    return this;
  }

  end(attributes?: Record<string, unknown>): void {
    if (this.trace.finished || this.record.endTime !== null) {
      return;
    }
    if (attributes) {
      this.setAttributes(attributes);
    }
    this.record.endTime = this.trace.now();
    this.record.durationMs = this.record.endTime - this.record.startTime;
  }

  child(name: string, attributes?: Record<string, unknown>): Span {
    return this.trace.startSpan(name, { parent: this, attributes });
  }
}

export class QueryTrace {
  readonly traceId: string;
  readonly root: Span;
  private readonly spans: Span[] = [];
  private finalRecord: TraceRecord | null = null;

  constructor(
    readonly name: string,
    private readonly exporter: TraceExporter | null,
    readonly attributes: Record<string, unknown> = {},
    readonly now: () => number = Date.now
  ) {
    this.traceId = randomUUID();
    this.root = this.startSpan(name);
  }

  get finished(): boolean {
    return this.finalRecord !== null;
  }

  startSpan(name: string, options: { parent?: Span; attributes?: Record<string, unknown> } = {}): Span {
    const record: SpanRecord = {
      id: randomUUID(),
      parentId: options.parent?.id ?? this.root?.id ?? null,
      name,
      startTime: this.now(),
      endTime: null,
      durationMs: null,
      status: 'ok',
      attributes: { ...options.attributes },
    };
    const span = new Span(this, record);
    if (!this.finished) {
      this.spans.push(span);
    }
    return span;
  }

  /**
   * Time an async stage in its own span. Errors are recorded on the span
   * and rethrown.
   */
  async stage<T>(
    name: string,
    fn: (span: Span) => Promise<T>,
    attributes?: Record<string, unknown>
  ): Promise<T> {
    const span = this.startSpan(name, { attributes });
    try {
      return await fn(span);
    } catch (error) {
      span.recordError(error);
      throw error;
    } finally {
      span.end();
    }
  }

  spanNamed(name: string): SpanRecord[] {
    return this.spans.filter((span) => span.record.name === name).map((span) => span.record);
  }

  /**
   * Freeze and export. Spans still open are closed; in a failed or
   * aborted trace they are marked as errors, never as successes.
   */
  async finish(status: TraceStatus): Promise<TraceRecord> {
    if (this.finalRecord) {
      return this.finalRecord;
    }

    const endTime = this.now();
    for (const span of this.spans) {
      if (span.record.endTime === null) {
        if (status === 'failed' || status === 'aborted') {
          span.recordError(new Error(`trace ${status} before span ended`));
        }
        span.end();
      }
    }
    if (status !== 'ok' && this.root.record.status === 'ok') {
      this.root.record.status = status === 'degraded' ? 'degraded' : 'error';
    }

    const record: TraceRecord = deepFreeze({
      traceId: this.traceId,
      name: this.name,
      status,
      startTime: this.root.record.startTime,
      endTime,
      durationMs: endTime - this.root.record.startTime,
      attributes: { ...this.attributes },
      spans: this.spans.map((span) => ({ ...span.record, attributes: { ...span.record.attributes } })),
    });
    this.finalRecord = record;

    if (this.exporter) {
      try {
        await this.exporter.export(record);
      } catch (error) {
        logger.warn({ traceId: this.traceId, error: errorMessage(error) }, 'Trace export failed');
      }
    }
    return record;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Writes each finished trace as one structured log line.
 */
export class LoggerTraceExporter implements TraceExporter {
  constructor(private readonly log: Logger) {}

  async export(trace: TraceRecord): Promise<void> {
    this.log.info(
      {
        traceId: trace.traceId,
        status: trace.status,
        durationMs: trace.durationMs,
        spans: trace.spans.map((span) => ({
          name: span.name,
          status: span.status,
          durationMs: span.durationMs,
          ...(span.error ? { error: span.error } : {}),
        })),
      },
      'Query trace'
    );
  }
}

/**
 * POSTs finished traces to a collector. Export failures are logged and
 * never affect the request.
 */
export class HttpTraceExporter implements TraceExporter {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly log: Logger
  ) {}

  async export(trace: TraceRecord): Promise<void> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(trace),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.log.warn({ status: response.status, traceId: trace.traceId }, 'Trace collector rejected trace');
      }
    } catch (error) {
      this.log.warn({ error: errorMessage(error), traceId: trace.traceId }, 'Trace export failed');
    }
  }
}

export class CompositeTraceExporter implements TraceExporter {
  constructor(private readonly exporters: TraceExporter[]) {}

  async export(trace: TraceRecord): Promise<void> {
    await Promise.all(this.exporters.map((exporter) => exporter.export(trace)));
  }
}
