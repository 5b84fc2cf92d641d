import type { Candidate, FusedCandidate, RetrievalMethod } from '@ragline/shared';

/**
 * Result Fuser
 *
 * Merges dense and lexical candidates into one deduplicated, ranked list.
 *
 * Each method's scores are normalized on their own (cosine similarity
 * and BM25 live on unrelated scales), then combined as a weighted sum
 * over the methods that found the chunk. A chunk found by both methods
 * accumulates both contributions.
 *
 * Ordering is total: fused score desc → first-seen order (dense list
 * first) → chunk id. Identical inputs always give identical output.
 */

export type Normalization = 'minmax' | 'max' | 'rank';

export interface FusionOptions {
  normalization: Normalization;
  weights: Record<RetrievalMethod, number>;
}

export const DEFAULT_FUSION: FusionOptions = {
  normalization: 'minmax',
  weights: { dense: 0.5, lexical: 0.5 },
};

/**
 * Normalize one method's scores to [0, 1]. Input must be ordered by
 * descending score (retriever output).
 */
export function normalizeScores(scores: number[], method: Normalization): number[] {
  if (scores.length === 0) {
    return [];
  }

  switch (method) {
    case 'rank': {
      const n = scores.length;
      return scores.map((_, i) => (n - i) / n);
    }
    case 'max': {
      const max = Math.max(...scores);
      return scores.map((score) => (max > 0 ? score / max : 1));
    }
    case 'minmax': {
      const max = Math.max(...scores);
      const min = Math.min(...scores);
      const range = max - min;
      return scores.map((score) => (range > 0 ? (score - min) / range : 1));
    }
  }
}

interface Accumulator {
  candidate: FusedCandidate;
  firstSeen: number;
}

/**
 * Merge candidates from several retrieval calls of the same method
 * (one per sub-query), keeping each chunk's best raw score.
 */
export function mergeSameMethod(lists: Candidate[][]): Candidate[] {
  const best = new Map<string, { candidate: Candidate; firstSeen: number }>();
  let seen = 0;

  for (const list of lists) {
    for (const candidate of list) {
      const existing = best.get(candidate.chunk.id);
      if (!existing) {
        best.set(candidate.chunk.id, { candidate, firstSeen: seen++ });
      } else if (candidate.score > existing.candidate.score) {
        existing.candidate = candidate;
      }
    }
  }

  return [...best.values()]
    .sort((a, b) => b.candidate.score - a.candidate.score || a.firstSeen - b.firstSeen)
    .map(({ candidate }) => candidate);
}

export function fuse(
  dense: Candidate[],
  lexical: Candidate[],
  options: FusionOptions = DEFAULT_FUSION
): FusedCandidate[] {
  const merged = new Map<string, Accumulator>();
  let seen = 0;

  const addMethod = (method: RetrievalMethod, candidates: Candidate[]) => {
    const normalized = normalizeScores(candidates.map((candidate) => candidate.score), options.normalization);
    const weight = options.weights[method];

    candidates.forEach((candidate, i) => {
      const norm = normalized[i];
      const existing = merged.get(candidate.chunk.id);

      if (!existing) {
        merged.set(candidate.chunk.id, {
          firstSeen: seen++,
          candidate: {
            chunk: candidate.chunk,
            methods: [method],
            rawScores: { [method]: candidate.score },
            normalizedScores: { [method]: norm },
            normalizedScore: norm,
            score: weight * norm,
            rank: 0,
          },
        });
        return;
      }

      const fused = existing.candidate;
      const previous = fused.normalizedScores[method];
      if (previous === undefined) {
        fused.methods.push(method);
        fused.rawScores[method] = candidate.score;
        fused.normalizedScores[method] = norm;
        fused.score += weight * norm;
      } else if (norm > previous) {
        // Same chunk twice from one method: keep the better hit
        fused.rawScores[method] = candidate.score;
        fused.normalizedScores[method] = norm;
        fused.score += weight * (norm - previous);
      }
      fused.normalizedScore = Math.max(fused.normalizedScore, norm);
    });
  };

  addMethod('dense', dense);
  addMethod('lexical', lexical);

  return [...merged.values()]
    .sort(
      (a, b) =>
        b.candidate.score - a.candidate.score ||
        a.firstSeen - b.firstSeen ||
        a.candidate.chunk.id.localeCompare(b.candidate.chunk.id)
    )
    .map(({ candidate }, index) => ({ ...candidate, rank: index + 1 }));
}
