import type { LLMClient } from '../../utils/llm';
import type { Tool, ToolInput, ToolOutput } from './types';

interface GenerativeToolSpec {
  name: string;
  description: string;
  instruction: string;
  patterns: RegExp[];
}

const GENERATIVE_TOOLS: GenerativeToolSpec[] = [
  {
    name: 'draft_email',
    description: 'Draft a professional email grounded in the documents',
    instruction: 'Draft a professional email using the context. Cite sources if relevant.',
    patterns: [/\bdraft\b.*\be-?mail\b/i, /\bwrite\b.*\be-?mail\b/i, /\be-?mail\s+to\b/i],
  },
  {
    name: 'generate_checklist',
    description: 'Turn requirements or procedures into a checklist',
    instruction: 'Generate a checklist based on the context. Use citations.',
    patterns: [/\bchecklist\b/i, /\bto-?do\s+list\b/i],
  },
  {
    name: 'compare',
    description: 'Compare entities, options or versions described in the documents',
    instruction: 'Compare the key entities or options in the context. Use citations.',
    patterns: [/\bcompar(?:e|es|ed|ing|ison)\b/i, /\bdifferences?\s+between\b/i, /\bvs\.?(?=\s)/i, /\bversus\b/i],
  },
  {
    name: 'summarize',
    description: 'Summarize the relevant passages',
    instruction: 'Summarize the context succinctly for the query. Keep citations.',
    patterns: [/\bsummar(?:y|ies|ize|ise|ized|ised)\b/i, /\btl;?dr\b/i, /\boverview\b/i],
  },
  {
    name: 'extract_facts',
    description: 'Extract factual statements with citations',
    instruction: 'Extract factual statements from the context with citations.',
    patterns: [/\bextract\b/i, /\bkey\s+facts?\b/i, /\blist\s+(?:the\s+|all\s+)?facts?\b/i],
  },
];

class GenerativeTool implements Tool {
  readonly kind = 'generative';
  readonly name: string;
  readonly description: string;
  readonly patterns: RegExp[];

  constructor(private readonly spec: GenerativeToolSpec, private readonly llm: LLMClient) {
    this.name = spec.name;
    this.description = spec.description;
    this.patterns = spec.patterns;
  }

  async run({ query, context, signal }: ToolInput): Promise<ToolOutput> {
    const completion = await this.llm.generate(`Context:\n${context.text}\n\nTask: ${query}`, {
      system: this.spec.instruction,
      temperature: 0.2,
      maxTokens: 400,
      signal,
    });
    return { text: completion.text };
  }
}

export function createGenerativeTools(llm: LLMClient): Tool[] {
  return GENERATIVE_TOOLS.map((spec) => new GenerativeTool(spec, llm));
}
