import { describe, expect, it } from 'vitest';
import { checkLatencyBudget, chunkLabel, cosineSimilarity, estimateTokens } from '../utils';

describe('estimateTokens', () => {
  it('rounds four characters per token up', () => {
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('')).toBe(0);
  });
});

describe('checkLatencyBudget', () => {
  it('reports a violation only above the budget', () => {
    expect(checkLatencyBudget(500, 500, 'retrieval')).toEqual({ exceeded: false });
    expect(checkLatencyBudget(501, 500, 'retrieval')).toEqual({
      exceeded: true,
      violation: 'retrieval: 501ms exceeded budget of 500ms',
    });
  });
});

describe('cosineSimilarity', () => {
  it('compares direction', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('returns 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different sizes', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have same dimensions');
  });
});

describe('chunkLabel', () => {
  it('joins source and position', () => {
    expect(chunkLabel({ source: 'handbook.md', position: 4 })).toBe('handbook.md#4');
  });
});
