import type { TokenUsage } from '@ragline/shared';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';
import { withTimeout } from '../utils/timeout';
import { GenerationUnavailable, OperationAborted, errorMessage } from '../errors';
import type { ToolOutput } from './tools';

/**
 * Answer Synthesis Service
 *
 * Purpose: Generate grounded answers from the assembled context.
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from provided context (and tool output derived from it)
 * - Refuse to answer if context is insufficient
 * - Cite context blocks by their [source#position] label
 *
 * Each attempt has its own timeout; attempts are bounded. Exhausting them
 * raises GenerationUnavailable and no partial answer leaves this module.
 */

export interface SynthesisResult {
  answer: string;
  usage: TokenUsage;
  attempts: number;
  refusal: boolean;
}

export interface AnswerGeneratorOptions {
  maxAttempts: number;
  timeoutMs: number;
  maxAnswerTokens: number;
  temperature?: number;
  /** Backoff before the second attempt; doubles after that */
  retryDelayMs?: number;
}

export interface GenerateInput {
  query: string;
  context: string;
  tool?: { name: string; output: ToolOutput } | null;
  signal?: AbortSignal;
  /** Per-call overrides of the generator's configured limits */
  maxTokens?: number;
  temperature?: number;
}

/**
 * System prompt enforcing strict grounding.
 */
function buildSystemPrompt(): string {
  return `You are a precise question-answering system. Your job is to answer questions using ONLY the provided context.

STRICT RULES:
1. Answer ONLY using information from the provided context
2. If the context does not contain enough information to answer, respond with: "I don't have enough information to answer this question."
3. Do NOT use external knowledge or make assumptions
4. Cite which context blocks you used by their label (e.g., "According to [handbook.pdf#3]...")
5. Be concise but complete

Your goal is CORRECTNESS, not fluency. If unsure, refuse to answer.`;
}

/**
 * User prompt with query, context and (optional) tool grounding.
 */
export function buildUserPrompt(query: string, context: string, tool?: GenerateInput['tool']): string {
  const toolBlock = tool ? `\n\nTool output (${tool.name}):\n${tool.output.text}` : '';
  return `Context:
${context || '(no relevant passages found)'}${toolBlock}

Question: ${query}

Answer (using ONLY the context above):`;
}

const REFUSAL_PHRASES = [
  "don't have enough information",
  'insufficient information',
  'cannot answer',
  'not enough context',
  'unable to answer',
];

export function checkIfRefusal(answer: string): boolean {
  const lowerAnswer = answer.toLowerCase();
  return REFUSAL_PHRASES.some((phrase) => lowerAnswer.includes(phrase));
}

export class AnswerGenerator {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: AnswerGeneratorOptions
  ) {}

  async generate({ query, context, tool, signal, maxTokens, temperature }: GenerateInput): Promise<SynthesisResult> {
    const startTime = Date.now();
    const prompt = buildUserPrompt(query, context, tool);
    let attempts = 0;

    try {
      const completion = await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (callSignal) =>
              this.llm.generate(prompt, {
                system: buildSystemPrompt(),
                temperature: temperature ?? this.options.temperature ?? 0.1,
                maxTokens: maxTokens ?? this.options.maxAnswerTokens,
                signal: callSignal,
              }),
            this.options.timeoutMs,
            () => new Error(`generation timed out after ${this.options.timeoutMs}ms`),
            signal
          );
        },
        {
          maxAttempts: this.options.maxAttempts,
          initialDelay: this.options.retryDelayMs ?? 250,
          signal,
          label: 'generation',
        }
      );

      const refusal = checkIfRefusal(completion.text);
      logger.info(
        { latency: Date.now() - startTime, attempts, refused: refusal, totalTokens: completion.usage.totalTokens },
        'Answer synthesis completed'
      );

      return { answer: completion.text, usage: completion.usage, attempts, refusal };
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }
      logger.error({ attempts, error: errorMessage(error) }, 'Answer synthesis failed');
      throw new GenerationUnavailable(
        attempts,
        `Generation unavailable after ${attempts} attempt(s): ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
