import type { AssembledContext } from '../context';

export type ToolKind = 'generative' | 'document';

export interface ToolInput {
  query: string;
  context: AssembledContext;
  signal: AbortSignal;
}

export interface ToolOutput {
  text: string;
  data?: unknown;
}

/**
 * A specialized answer tool. Tools are added by registering another
 * implementation; the router only ever sees this interface.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  /** Document tools scan the assembled context for structure instead of calling the LLM */
  readonly kind: ToolKind;
  /** Query patterns that select this tool in rule-based routing */
  readonly patterns: RegExp[];
  run(input: ToolInput): Promise<ToolOutput>;
}

export interface ToolInvocation {
  tool: string;
  input: { query: string; contextChars: number };
  output: ToolOutput | null;
  ok: boolean;
  error?: string;
  latencyMs: number;
}
