import { z } from 'zod';
import type { LLMClient } from '../../utils/llm';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { OperationAborted, ToolExecutionFailed, errorMessage } from '../../errors';
import type { AssembledContext } from '../context';
import { parseJsonObject } from '../json';
import type { ToolRegistry } from './registry';
import type { Tool, ToolInvocation } from './types';

/**
 * Tool Router
 *
 * Picks a specialized tool for the query, or null for plain question
 * answering. Routing only ever reads the registry, so a new tool is a
 * new registration. Rule mode matches each tool's own patterns in
 * registration order; llm mode asks for a JSON classification restricted
 * to the allowed names.
 */

export type ToolRouterMode = 'rules' | 'llm';

export interface ToolRouterOptions {
  mode: ToolRouterMode;
  docActions: boolean;
  timeoutMs: number;
}

const RouteSchema = z.object({
  tool: z.string(),
  reason: z.string().optional(),
});

function contextPreview(text: string, limit = 1200): string {
  return text.length <= limit ? text : `${text.slice(0, limit)}\n...[truncated]`;
}

export class ToolRouter {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly llm: LLMClient | null,
    private readonly options: ToolRouterOptions
  ) {}

  allowedTools(): Tool[] {
    return this.registry.list({ exclude: this.options.docActions ? [] : ['document'] });
  }

  async route(query: string, context: AssembledContext, signal?: AbortSignal): Promise<string | null> {
    const allowed = this.allowedTools();
    if (allowed.length === 0) {
      return null;
    }

    if (this.options.mode === 'llm' && this.llm) {
      return this.classify(this.llm, allowed, query, context, signal);
    }

    const match = allowed.find((tool) => tool.patterns.some((pattern) => pattern.test(query)));
    return match?.name ?? null;
  }

  /**
   * Run a routed tool. Failures come back as an unsuccessful invocation
   * carrying ToolExecutionFailed; the caller falls through to the
   * generic answer path.
   */
  async dispatch(
    name: string,
    query: string,
    context: AssembledContext,
    signal?: AbortSignal
  ): Promise<{ invocation: ToolInvocation; error?: ToolExecutionFailed }> {
    const startTime = Date.now();
    const input = { query, contextChars: context.text.length };
    const tool = this.registry.get(name);

    try {
      if (!tool) {
        throw new ToolExecutionFailed(name, 'not registered');
      }
      const output = await withTimeout(
        (callSignal) => tool.run({ query, context, signal: callSignal }),
        this.options.timeoutMs,
        () => new ToolExecutionFailed(name, `timed out after ${this.options.timeoutMs}ms`),
        signal
      );
      return { invocation: { tool: name, input, output, ok: true, latencyMs: Date.now() - startTime } };
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }
      const failure =
        error instanceof ToolExecutionFailed ? error : new ToolExecutionFailed(name, errorMessage(error), { cause: error });
      logger.warn({ tool: name, error: failure.message }, 'Tool execution failed, falling through to generic answer');
      return {
        invocation: { tool: name, input, output: null, ok: false, error: failure.message, latencyMs: Date.now() - startTime },
        error: failure,
      };
    }
  }

  private async classify(
    llm: LLMClient,
    allowed: Tool[],
    query: string,
    context: AssembledContext,
    signal?: AbortSignal
  ): Promise<string | null> {
    const names = allowed.map((tool) => tool.name);
    const catalog = allowed.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n');
    const prompt =
      'Choose the best tool for the user query based on the context. ' +
      'Return JSON with keys: tool, reason. ' +
      `Allowed tools:\n${catalog}\n- none: plain question answering\n\n` +
      `Query: ${query}\n\n` +
      `Context (preview):\n${contextPreview(context.text)}`;

    try {
      const completion = await withTimeout(
        (callSignal) =>
          llm.generate(prompt, {
            system: 'You are a strict tool router.',
            jsonMode: true,
            temperature: 0,
            maxTokens: 120,
            signal: callSignal,
          }),
        this.options.timeoutMs,
        () => new Error(`tool classification timed out after ${this.options.timeoutMs}ms`),
        signal
      );
      const { tool } = RouteSchema.parse(parseJsonObject(completion.text));
      return names.includes(tool) ? tool : null;
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }
      logger.warn({ error: errorMessage(error) }, 'Tool classification failed, using generic answer');
      return null;
    }
  }
}
