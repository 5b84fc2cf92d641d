import { describe, expect, it } from 'vitest';
import { estimateTokens } from '@ragline/shared';
import { assembleContext, chunkCost, formatChunkHeader } from '../context';
import { makeChunk, ranked } from '../../__tests__/helpers';

describe('formatChunkHeader', () => {
  it('labels a block with source, position and chunk id', () => {
    expect(formatChunkHeader(makeChunk('c7', { source: 'policy.pdf', position: 3 }))).toBe('[policy.pdf#3] (chunk c7)');
  });
});

describe('assembleContext', () => {
  const c1 = ranked(makeChunk('c1'), 1);
  const big = ranked(makeChunk('big', { tokenCount: 100, position: 1 }), 2);
  const c3 = ranked(makeChunk('c3', { position: 2 }), 3);

  it('charges the token count plus the header line estimate', () => {
    // "[handbook.md#0] (chunk c1)\n" is 27 characters
    expect(chunkCost(c1.chunk)).toBe(17);
  });

  it('adds the separator for every block after the first', () => {
    expect(chunkCost(c1.chunk, false)).toBe(19);
  });

  it('charges the text estimate when the stored count is lower', () => {
    const understated = makeChunk('u', { content: 'x'.repeat(40), tokenCount: 1 });

    // 10 for the content, 7 for "[handbook.md#0] (chunk u)\n"
    expect(chunkCost(understated)).toBe(17);
  });

  it('skips a chunk that does not fit and keeps packing smaller ones', () => {
    const context = assembleContext([c1, big, c3], 40);

    expect(context.used.map((hit) => hit.chunk.id)).toEqual(['c1', 'c3']);
    expect(context.tokenCount).toBe(36);
    expect(context.text).toBe(
      '[handbook.md#0] (chunk c1)\ncontent of c1\n\n---\n\n[handbook.md#2] (chunk c3)\ncontent of c3'
    );
  });

  it('includes a chunk that exactly fills the budget', () => {
    expect(assembleContext([c1], 17).used).toHaveLength(1);
    expect(assembleContext([c1], 16).used).toHaveLength(0);
  });

  it('keeps the estimate of the rendered text within the budget', () => {
    const blocks = ['a', 'b', 'c'].map((id, index) =>
      ranked(makeChunk(id, { content: 'x'.repeat(40), tokenCount: 1, position: index }), index + 1)
    );

    const context = assembleContext(blocks, 36);

    expect(context.used.map((hit) => hit.chunk.id)).toEqual(['a', 'b']);
    expect(context.tokenCount).toBe(36);
    expect(context.text).toHaveLength(139);
    expect(estimateTokens(context.text)).toBeLessThanOrEqual(36);
  });

  it('returns an empty context when nothing fits', () => {
    expect(assembleContext([big], 50)).toEqual({ text: '', used: [], tokenCount: 0 });
  });
});
