import {
  checkLatencyBudget,
  type Candidate,
  type Citation,
  type FeatureToggles,
  type Identity,
  type RankedCandidate,
  type RetrievalMethod,
  type TokenUsage,
} from '@ragline/shared';
import { logger } from '../utils/logger';
import { linkSignals } from '../utils/timeout';
import {
  OperationAborted,
  QueryDeadlineExceeded,
  RetrievalUnavailable,
  errorMessage,
  type StageOutcome,
} from '../errors';
import type { Metrics } from '../observability/metrics';
import { QueryTrace, type Span, type TraceExporter, type TraceRecord } from '../observability/tracer';
import type { Retriever } from './retrieval/dense';
import { fuse, mergeSameMethod, type FusionOptions } from './fusion';
import { rerankCandidates, type Reranker } from './reranking';
import { assembleContext, type AssembledContext } from './context';
import type { QueryPlan, QueryPlanner } from './planner';
import type { ToolInvocation, ToolRouter } from './tools';
import type { AnswerGenerator, GenerateInput } from './synthesis';
import type { FollowupGenerator } from './followups';

/**
 * Query Pipeline
 *
 * plan → retrieve (dense ∥ lexical per sub-query) → fuse → rerank →
 * assemble → route/dispatch tool → generate → follow-ups
 *
 * Every stage runs in its own span and observes rag_latency_seconds.
 * Stages that can degrade keep the query alive and add their name to
 * `degraded`; only retrieval (both methods down) and generation can fail
 * a query. The request deadline and the caller's signal abort whatever
 * is in flight.
 */

export interface LatencyBudgets {
  planning: number;
  retrieval: number;
  reranking: number;
  generation: number;
  total: number;
}

export interface QueryPipelineDeps {
  planner: QueryPlanner;
  dense: Retriever;
  lexical: Retriever;
  reranker: Reranker | null;
  router: ToolRouter;
  generator: AnswerGenerator;
  followups: FollowupGenerator;
  metrics: Metrics;
  traceExporter?: TraceExporter | null;
}

export interface QueryPipelineOptions {
  features: FeatureToggles;
  fusion: FusionOptions;
  rerankPoolSize: number;
  rerankTimeoutMs: number;
  maxFanOut: number;
  deadlineMs: number;
  latencyBudgets: LatencyBudgets;
}

/** Per-request settings layered over the pipeline's configuration */
export interface QueryOverrides {
  features?: Partial<Pick<FeatureToggles, 'toolRouter' | 'followups' | 'planning'>>;
  /** false skips the reranker and keeps the fused order */
  rerank?: boolean;
  maxAnswerTokens?: number;
  temperature?: number;
}

export interface QueryInput {
  query: string;
  k: number;
  documentId?: string;
  maxContextTokens: number;
  identity?: Identity;
  signal?: AbortSignal;
  overrides?: QueryOverrides;
}

export interface QueryResult {
  answer: string;
  citations: Citation[];
  followups: string[];
  usedTool: string | null;
  degraded: string[];
  traceId: string;
  usage: TokenUsage;
  /** null when planning is off */
  plan: QueryPlan | null;
  toolInvocation: ToolInvocation | null;
  /** The assembled context the answer was generated from */
  context: string;
  /** Ranked chunks that did not fit the context */
  related: Citation[];
  trace: TraceRecord;
}

interface RunState {
  trace: QueryTrace;
  signal: AbortSignal;
  degraded: string[];
  features: FeatureToggles;
}

interface RetrievalOutcome {
  dense: Candidate[];
  lexical: Candidate[];
  failures: RetrievalUnavailable[];
}

export class QueryPipeline {
  constructor(
    private readonly deps: QueryPipelineDeps,
    private readonly options: QueryPipelineOptions
  ) {}

  async run(input: QueryInput): Promise<QueryResult> {
    const startTime = Date.now();
    const trace = new QueryTrace('query', this.deps.traceExporter ?? null, {
      identity: input.identity?.id,
      identitySource: input.identity?.source,
      documentId: input.documentId,
      k: input.k,
    });

    const deadline = new AbortController();
    const timer = setTimeout(
      () => deadline.abort(new QueryDeadlineExceeded(`Query exceeded deadline of ${this.options.deadlineMs}ms`)),
      this.options.deadlineMs
    );
    const linked = input.signal ? linkSignals(input.signal, deadline.signal) : null;
    const state: RunState = {
      trace,
      signal: linked?.signal ?? deadline.signal,
      degraded: [],
      features: resolveFeatures(this.options.features, input.overrides?.features),
    };

    this.deps.metrics.queryLength.observe(input.query.length);
    trace.root.setAttributes({ queryLength: input.query.length });

    try {
      const result = await this.execute(input, state);
      const record = await trace.finish(state.degraded.length > 0 ? 'degraded' : 'ok');

      const latency = Date.now() - startTime;
      this.deps.metrics.latency.observe({ stage: 'total' }, latency / 1000);
      const budget = checkLatencyBudget(latency, this.options.latencyBudgets.total, 'total');
      if (budget.exceeded) {
        logger.warn({ traceId: trace.traceId, latency, budget: this.options.latencyBudgets.total }, 'Query exceeded total latency budget');
      }

      logger.info(
        {
          traceId: trace.traceId,
          identity: input.identity?.id,
          latency,
          degraded: state.degraded,
          usedTool: result.usedTool,
          citations: result.citations.length,
        },
        'Query completed'
      );
      return { ...result, trace: record };
    } catch (error) {
      if (error instanceof OperationAborted) {
        await trace.finish('aborted');
        if (deadline.signal.aborted) {
          throw new QueryDeadlineExceeded(`Query exceeded deadline of ${this.options.deadlineMs}ms`, { cause: error });
        }
        throw error;
      }
      trace.root.recordError(error);
      await trace.finish('failed');
      logger.error({ traceId: trace.traceId, error: errorMessage(error) }, 'Query failed');
      throw error;
    } finally {
      clearTimeout(timer);
      linked?.dispose();
    }
  }

  private async execute(input: QueryInput, state: RunState): Promise<Omit<QueryResult, 'trace'>> {
    const { metrics, generator } = this.deps;
    const { latencyBudgets } = this.options;
    const { signal, features } = state;
    const overrides: QueryOverrides = input.overrides ?? {};

    const plan = await this.stage(
      state,
      'planning',
      async (span) => {
        if (!features.planning) {
          span.setAttributes({ enabled: false });
          return null;
        }
        const outcome = await this.deps.planner.plan(input.query, signal, input.documentId);
        const value = this.settle(state, 'planning', span, outcome);
        span.setAttributes({ queries: value.queries, entities: value.entities });
        return value;
      },
      latencyBudgets.planning
    );

    const retrieval = await this.stage(
      state,
      'retrieval',
      (span) => this.retrieve(plan?.queries ?? [input.query], input, span, state),
      latencyBudgets.retrieval
    );

    const fused = await this.stage(state, 'fusion', async (span) => {
      const candidates = fuse(retrieval.dense, retrieval.lexical, this.options.fusion);
      span.setAttributes({
        dense: retrieval.dense.length,
        lexical: retrieval.lexical.length,
        fused: candidates.length,
        normalization: this.options.fusion.normalization,
      });
      return candidates;
    });
    metrics.retrievedCount.observe(fused.length);

    const reranked = await this.stage(
      state,
      'reranking',
      async (span) => {
        const reranker = overrides.rerank === false ? null : this.deps.reranker;
        const result = await rerankCandidates(reranker, input.query, fused, {
          poolSize: this.options.rerankPoolSize,
          timeoutMs: this.options.rerankTimeoutMs,
          signal,
        });
        const pool = reranker ? Math.min(this.options.rerankPoolSize, fused.length) : 0;
        span.setAttributes({
          reranker: overrides.rerank === false ? 'disabled' : reranker?.name ?? 'none',
          pool,
          scores: result.scores,
        });
        if (result.degraded) {
          this.degrade(state, 'reranking', span, result.reason ?? 'reranker failed');
        }
        metrics.rerankedCount.observe(result.degraded ? 0 : pool);
        return result.candidates;
      },
      latencyBudgets.reranking
    );

    const context = await this.stage(state, 'context_assembly', async (span) => {
      const assembled = assembleContext(reranked, input.maxContextTokens);
      span.setAttributes({
        budget: input.maxContextTokens,
        tokenCount: assembled.tokenCount,
        chunkIds: assembled.used.map((candidate) => candidate.chunk.id),
      });
      return assembled;
    });
    metrics.contextLength.observe(context.text.length);
    metrics.usedCount.observe(context.used.length);

    const dispatched = await this.runTool(input, context, state);

    const tool: GenerateInput['tool'] =
      dispatched?.output ? { name: dispatched.tool, output: dispatched.output } : null;

    const synthesis = await this.stage(
      state,
      'generation',
      async (span) => {
        const result = await generator.generate({
          query: input.query,
          context: context.text,
          tool,
          signal,
          maxTokens: overrides.maxAnswerTokens,
          temperature: overrides.temperature,
        });
        span.setAttributes({
          attempts: result.attempts,
          refusal: result.refusal,
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
          totalTokens: result.usage.totalTokens,
          tool: tool?.name ?? null,
        });
        return result;
      },
      latencyBudgets.generation
    );
    metrics.tokens.inc({ type: 'prompt' }, synthesis.usage.promptTokens);
    metrics.tokens.inc({ type: 'completion' }, synthesis.usage.completionTokens);
    metrics.tokens.inc({ type: 'total' }, synthesis.usage.totalTokens);

    let followups: string[] = [];
    if (features.followups) {
      followups = await this.stage(state, 'followups', async (span) => {
        const result = await this.deps.followups.suggest(input.query, synthesis.answer, context.text, signal);
        span.setAttributes({ followups: result.followups });
        if (result.failure) {
          this.degrade(state, 'followups', span, result.failure);
        }
        return result.followups;
      });
    }

    return {
      answer: synthesis.answer,
      citations: citationsFor(context.used),
      followups,
      usedTool: tool?.name ?? null,
      degraded: state.degraded,
      traceId: state.trace.traceId,
      usage: synthesis.usage,
      plan,
      toolInvocation: dispatched,
      context: context.text,
      related: citationsFor(reranked.filter((candidate) => !context.used.includes(candidate))),
    };
  }

  /**
   * Route and dispatch. Tools only see a non-empty context; a failed tool
   * is recorded and the query falls through to the generic answer.
   */
  private async runTool(
    input: QueryInput,
    context: AssembledContext,
    state: RunState
  ): Promise<ToolInvocation | null> {
    const { router, metrics } = this.deps;
    if (!state.features.toolRouter || context.text.length === 0) {
      return null;
    }

    const name = await this.stage(state, 'tool_routing', async (span) => {
      const routed = await router.route(input.query, context, state.signal);
      span.setAttributes({ tool: routed, allowed: router.allowedTools().map((tool) => tool.name) });
      return routed;
    });
    if (!name) {
      return null;
    }

    return this.stage(state, 'tool_dispatch', async (span) => {
      const { invocation, error } = await router.dispatch(name, input.query, context, state.signal);
      span.setAttributes({ invocation });
      metrics.toolInvocations.inc({ tool: name, outcome: invocation.ok ? 'success' : 'failure' });
      if (error) {
        span.recordError(error);
        this.degrade(state, 'tool_dispatch', span, error.message);
      }
      return invocation;
    });
  }

  /**
   * Dense and lexical run concurrently for each sub-query; sub-queries run
   * in batches of `maxFanOut`. A failed method is recorded and the query
   * continues on what survived. Only when nothing succeeded at all does
   * retrieval fail.
   */
  private async retrieve(
    queries: string[],
    input: QueryInput,
    span: Span,
    state: RunState
  ): Promise<RetrievalOutcome> {
    const lists: Record<RetrievalMethod, Candidate[][]> = { dense: [], lexical: [] };
    const failures: RetrievalUnavailable[] = [];
    const options = { documentId: input.documentId, signal: state.signal };
    const fanOut = Math.max(1, this.options.maxFanOut);

    for (let i = 0; i < queries.length; i += fanOut) {
      const batch = queries.slice(i, i + fanOut);
      const settled = await Promise.all(
        batch.map((query) =>
          Promise.allSettled([
            this.traceMethod(span, 'dense', query, () => this.deps.dense.retrieve(query, input.k, options)),
            this.traceMethod(span, 'lexical', query, () => this.deps.lexical.retrieve(query, input.k, options)),
          ])
        )
      );

      for (const results of settled) {
        results.forEach((result, index) => {
          const method: RetrievalMethod = index === 0 ? 'dense' : 'lexical';
          if (result.status === 'fulfilled') {
            lists[method].push(result.value);
            return;
          }
          const error: unknown = result.reason;
          if (error instanceof OperationAborted) {
            throw error;
          }
          failures.push(
            error instanceof RetrievalUnavailable
              ? error
              : new RetrievalUnavailable(method, errorMessage(error), { cause: error })
          );
        });
      }
    }

    span.setAttributes({
      queries: queries.length,
      denseCalls: lists.dense.length,
      lexicalCalls: lists.lexical.length,
      failures: failures.map((failure) => failure.message),
    });

    if (lists.dense.length === 0 && lists.lexical.length === 0) {
      throw new RetrievalUnavailable('all', failures.map((failure) => failure.message).join('; '), {
        cause: failures[0],
      });
    }
    if (failures.length > 0) {
      const methods = [...new Set(failures.map((failure) => failure.method))];
      this.degrade(state, 'retrieval', span, `${methods.join(', ')} retrieval failed`);
    }

    return {
      dense: mergeSameMethod(lists.dense),
      lexical: mergeSameMethod(lists.lexical),
      failures,
    };
  }

  private async traceMethod(
    parent: Span,
    method: RetrievalMethod,
    query: string,
    fn: () => Promise<Candidate[]>
  ): Promise<Candidate[]> {
    const span = parent.child(`retrieval.${method}`, { query });
    const startTime = Date.now();
    try {
      const candidates = await fn();
      span.end({ results: candidates.length });
      return candidates;
    } catch (error) {
      span.recordError(error);
      span.end();
      throw error;
    } finally {
      this.deps.metrics.latency.observe({ stage: `${method}_retrieval` }, (Date.now() - startTime) / 1000);
    }
  }

  private async stage<T>(
    state: RunState,
    name: string,
    fn: (span: Span) => Promise<T>,
    budgetMs?: number
  ): Promise<T> {
    if (state.signal.aborted) {
      throw new OperationAborted();
    }
    const startTime = Date.now();
    try {
      return await state.trace.stage(name, fn);
    } finally {
      const latency = Date.now() - startTime;
      this.deps.metrics.latency.observe({ stage: name }, latency / 1000);
      if (budgetMs !== undefined && checkLatencyBudget(latency, budgetMs, name).exceeded) {
        logger.warn({ traceId: state.trace.traceId, stage: name, latency, budget: budgetMs }, 'Stage exceeded latency budget');
      }
    }
  }

  private settle<T>(state: RunState, stage: string, span: Span, outcome: StageOutcome<T>): T {
    switch (outcome.status) {
      case 'ok':
        return outcome.value;
      case 'degraded':
        this.degrade(state, stage, span, outcome.reason);
        return outcome.value;
      case 'failed':
        throw outcome.error;
    }
  }

  private degrade(state: RunState, stage: string, span: Span, reason: string): void {
    span.markDegraded(reason);
    if (!state.degraded.includes(stage)) {
      state.degraded.push(stage);
      this.deps.metrics.degraded.inc({ stage });
    }
  }
}

function resolveFeatures(base: FeatureToggles, overrides: QueryOverrides['features'] = {}): FeatureToggles {
  return {
    toolRouter: overrides.toolRouter ?? base.toolRouter,
    docActions: base.docActions,
    followups: overrides.followups ?? base.followups,
    planning: overrides.planning ?? base.planning,
  };
}

function citationsFor(used: RankedCandidate[]): Citation[] {
  return used.map((candidate) => ({
    chunk_id: candidate.chunk.id,
    document_id: candidate.chunk.documentId,
  }));
}
