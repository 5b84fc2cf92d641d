import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { QueryResponse } from '@ragline/shared';
import type { QueryOverrides, QueryPipeline, QueryResult } from '../services/pipeline';
import type { RateLimiter } from '../services/rate-limiter';
import { resolveIdentity } from '../services/identity';
import type { Metrics } from '../observability/metrics';
import { PipelineError, errorMessage } from '../errors';
import { sendRateLimited, statusForError } from './responses';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  k: z.number().int().min(1).max(50).optional(),
  document_id: z.string().trim().min(1).optional(),
  max_context_tokens: z.number().int().min(200).max(6000).optional(),
  max_answer_tokens: z.number().int().min(50).max(1000).optional(),
  temperature: z.number().min(0).max(1).optional(),
  rerank: z.boolean().optional(),
  include_citations: z.boolean().default(true),
  enable_tools: z.boolean().optional(),
  enable_followups: z.boolean().optional(),
  enable_planning: z.boolean().optional(),
});

type QueryRequest = z.infer<typeof QueryRequestSchema>;

function overridesFrom(body: QueryRequest): QueryOverrides {
  return {
    features: {
      toolRouter: body.enable_tools,
      followups: body.enable_followups,
      planning: body.enable_planning,
    },
    rerank: body.rerank,
    maxAnswerTokens: body.max_answer_tokens,
    temperature: body.temperature,
  };
}

function toResponse(result: QueryResult, includeCitations: boolean): QueryResponse {
  return {
    answer: result.answer,
    citations: includeCitations ? result.citations : [],
    related: includeCitations ? result.related : [],
    context: result.context,
    followups: result.followups,
    used_tool: result.usedTool,
    tool_output: result.toolInvocation?.output?.text ?? null,
    plan: result.plan
      ? { queries: result.plan.queries, rewritten_query: result.plan.rewrittenQuery, entities: result.plan.entities }
      : null,
    degraded: result.degraded,
    trace_id: result.traceId,
  };
}

export interface QueryRoutesOptions {
  pipeline: QueryPipeline;
  rateLimiter: RateLimiter;
  metrics: Metrics;
  defaults: { k: number; maxContextTokens: number };
}

const ENDPOINT = '/api/query';

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, options) => {
  const { pipeline, rateLimiter, metrics, defaults } = options;

  /**
   * POST /api/query
   * Main RAG query endpoint
   *
   * Admission (rate limit) happens before any pipeline work, so a
   * rejected request never reaches the retrievers.
   */
  fastify.post('/query', async (request, reply) => {
    const requestId = request.id;
    metrics.requests.inc({ endpoint: ENDPOINT });

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }
    const body = validation.data;
    const identity = resolveIdentity(request);

    const admission = await rateLimiter.admit(identity.id, 'query');
    if (!admission.allowed) {
      return sendRateLimited(reply, 'query', admission.retryAfterMs);
    }

    // Client went away before we answered: stop spending on the query
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);

    fastify.log.info({ requestId, identitySource: identity.source, queryLength: body.query.length }, 'Processing query');

    try {
      const result = await pipeline.run({
        query: body.query,
        k: body.k ?? defaults.k,
        documentId: body.document_id,
        maxContextTokens: body.max_context_tokens ?? defaults.maxContextTokens,
        identity,
        signal: controller.signal,
        overrides: overridesFrom(body),
      });

      return toResponse(result, body.include_citations);
    } catch (error) {
      const status = statusForError(error);
      metrics.errors.inc({ endpoint: ENDPOINT });
      if (status === 500) {
        fastify.log.error({ requestId, error: errorMessage(error) }, 'Query processing failed');
      } else {
        fastify.log.warn({ requestId, status, error: errorMessage(error) }, 'Query did not complete');
      }
      return reply.code(status).send({
        error: status === 500 ? 'Internal server error' : errorMessage(error),
        kind: error instanceof PipelineError ? error.kind : undefined,
        requestId,
      });
    } finally {
      reply.raw.off('close', onClose);
    }
  });
};
