import {
  CONTEXT_SEPARATOR,
  chunkLabel,
  estimateTokens,
  type Chunk,
  type RankedCandidate,
} from '@ragline/shared';

/**
 * Context Assembler
 *
 * Greedy, rank-ordered packing under a token budget. A chunk is either
 * included whole or skipped; a chunk too large for the remaining budget
 * does not stop smaller, lower-ranked chunks from being packed.
 */

export interface AssembledContext {
  text: string;
  used: RankedCandidate[];
  tokenCount: number;
}

export function formatChunkHeader(chunk: Chunk): string {
  return `[${chunkLabel(chunk)}] (chunk ${chunk.id})`;
}

const SEPARATOR_COST = estimateTokens(CONTEXT_SEPARATOR);

/**
 * Tokens a chunk's block costs: its content (never less than the text
 * estimate, whatever the stored count says) plus the header line.
 * Blocks after the first also pay for the separator.
 */
export function chunkCost(chunk: Chunk, first = true): number {
  const content = Math.max(chunk.tokenCount, estimateTokens(chunk.content));
  const header = estimateTokens(`${formatChunkHeader(chunk)}\n`);
  return content + header + (first ? 0 : SEPARATOR_COST);
}

export function assembleContext(ranked: RankedCandidate[], maxTokens: number): AssembledContext {
  const used: RankedCandidate[] = [];
  const blocks: string[] = [];
  let tokenCount = 0;

  for (const candidate of ranked) {
    const cost = chunkCost(candidate.chunk, blocks.length === 0);
    if (tokenCount + cost > maxTokens) {
      continue;
    }
    tokenCount += cost;
    used.push(candidate);
    blocks.push(`${formatChunkHeader(candidate.chunk)}\n${candidate.chunk.content}`);
  }

  return { text: blocks.join(CONTEXT_SEPARATOR), used, tokenCount };
}
