/**
 * Shared utility functions for Ragline.
 */

/**
 * Rough token estimate used for text the store has not counted
 * (citation headers, separators). ~4 characters per token.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Check if a latency exceeds its budget.
 */
export function checkLatencyBudget(
  actual: number,
  budget: number,
  stage: string
): { exceeded: boolean; violation?: string } {
  if (actual > budget) {
    return {
      exceeded: true,
      violation: `${stage}: ${actual}ms exceeded budget of ${budget}ms`,
    };
  }
  return { exceeded: false };
}

/**
 * Calculate cosine similarity between two vectors.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same dimensions');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Stable identifier used in citation headers: `source#position`.
 */
export function chunkLabel(chunk: { source: string; position: number }): string {
  return `${chunk.source}#${chunk.position}`;
}
