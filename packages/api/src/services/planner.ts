import { z } from 'zod';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { OperationAborted, errorMessage, type StageOutcome } from '../errors';
import { parseJsonObject } from './json';

/**
 * Query Planner
 *
 * Rewrites the user query and proposes a few targeted retrieval queries.
 * Disabled → the original query alone. Any planner failure degrades to
 * the original query; planning never fails a request.
 */

const PlanSchema = z.object({
  rewritten_query: z.string().trim().min(1).optional(),
  entities: z.array(z.string()).optional(),
  subqueries: z.array(z.unknown()).optional(),
});

export interface QueryPlan {
  queries: string[];
  rewrittenQuery: string;
  entities: string[];
}

export interface QueryPlannerOptions {
  enabled: boolean;
  maxSubQueries: number;
  timeoutMs: number;
}

const SYSTEM_PROMPT =
  'Rewrite the query and propose up to 3 targeted retrieval queries. ' +
  'Return JSON with keys: rewritten_query, entities, subqueries.';

export class QueryPlanner {
  constructor(
    private readonly llm: LLMClient | null,
    private readonly options: QueryPlannerOptions
  ) {}

  get enabled(): boolean {
    return this.options.enabled && this.llm !== null;
  }

  async plan(query: string, signal?: AbortSignal, documentId?: string): Promise<StageOutcome<QueryPlan>> {
    const passthrough: QueryPlan = { queries: [query], rewrittenQuery: query, entities: [] };
    if (!this.enabled || !this.llm) {
      return { status: 'ok', value: passthrough };
    }
    const llm = this.llm;

    try {
      const completion = await withTimeout(
        (callSignal) =>
          llm.generate(`Query: ${query}\nDoc ID: ${documentId ?? 'none'}`, {
            system: SYSTEM_PROMPT,
            jsonMode: true,
            temperature: 0,
            maxTokens: 200,
            signal: callSignal,
          }),
        this.options.timeoutMs,
        () => new Error(`planner timed out after ${this.options.timeoutMs}ms`),
        signal
      );

      const data = PlanSchema.parse(parseJsonObject(completion.text));
      const rewritten = data.rewritten_query ?? query;
      const subqueries = (data.subqueries ?? [])
        .filter((value): value is string => typeof value === 'string')
        .map((value) => value.trim())
        .filter((value) => value.length > 0);

      const queries = [...new Set([rewritten, ...subqueries])].slice(0, Math.max(1, this.options.maxSubQueries));

      logger.info({ queries }, 'Query planning completed');
      return {
        status: 'ok',
        value: { queries, rewrittenQuery: rewritten, entities: data.entities ?? [] },
      };
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }
      const reason = errorMessage(error);
      logger.warn({ reason }, 'Query planning failed, using original query');
      return { status: 'degraded', value: passthrough, reason };
    }
  }
}
