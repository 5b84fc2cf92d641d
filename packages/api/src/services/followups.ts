import { z } from 'zod';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { OperationAborted, errorMessage } from '../errors';
import { parseJsonObject } from './json';

const FollowupSchema = z.object({
  follow_ups: z.array(z.unknown()),
});

const MAX_FOLLOWUPS = 3;
const MIN_FOLLOWUPS = 2;

export interface FollowupResult {
  followups: string[];
  /** Set when the generator failed and returned nothing */
  failure?: string;
}

/**
 * Follow-up Generator. Best-effort: any failure yields an empty list.
 */
export class FollowupGenerator {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: { timeoutMs: number }
  ) {}

  async suggest(query: string, answer: string, context: string, signal?: AbortSignal): Promise<FollowupResult> {
    const preview = context.length <= 800 ? context : `${context.slice(0, 800)}\n...[truncated]`;

    try {
      const completion = await withTimeout(
        (callSignal) =>
          this.llm.generate(`Query: ${query}\nAnswer: ${answer}\nContext:\n${preview}`, {
            system:
              'Generate 2-3 concise follow-up questions based on the answer ' +
              'and missing context. Return JSON with key: follow_ups.',
            jsonMode: true,
            temperature: 0.3,
            maxTokens: 120,
            signal: callSignal,
          }),
        this.options.timeoutMs,
        () => new Error(`follow-ups timed out after ${this.options.timeoutMs}ms`),
        signal
      );

      const data = FollowupSchema.parse(parseJsonObject(completion.text));
      const followups = data.follow_ups
        .filter((value): value is string => typeof value === 'string')
        .map((value) => value.trim())
        .filter((value) => value.length > 0)
        .slice(0, MAX_FOLLOWUPS);

      if (followups.length < MIN_FOLLOWUPS) {
        throw new Error(`expected at least ${MIN_FOLLOWUPS} follow-ups, got ${followups.length}`);
      }
      return { followups };
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }
      const failure = errorMessage(error);
      logger.warn({ failure }, 'Follow-up generation failed');
      return { followups: [], failure };
    }
  }
}
