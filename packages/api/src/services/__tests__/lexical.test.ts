import { describe, expect, it } from 'vitest';
import { RetrievalUnavailable } from '../../errors';
import { Bm25Index, LexicalRetriever, tokenize } from '../retrieval/lexical';
import { MemoryChunkStore, makeChunk } from '../../__tests__/helpers';

const corpus = [
  makeChunk('c1', { content: 'Refund policy: refunds are issued within 30 days.' }),
  makeChunk('c2', { content: 'Shipping policy for international orders.' }),
  makeChunk('c3', { content: 'Refund requests need a receipt. Refund forms are online.', documentId: 'doc-2' }),
];

describe('tokenize', () => {
  it('lowercases and keeps letter and digit runs', () => {
    expect(tokenize('Héllo, WORLD 42!')).toEqual(['héllo', 'world', '42']);
  });
});

describe('Bm25Index', () => {
  it('computes idf as ln(1 + (N - n + 0.5) / (n + 0.5))', () => {
    const index = new Bm25Index(corpus);

    expect(index.idf('refund')).toBeCloseTo(Math.log(1 + 1.5 / 2.5), 10);
    expect(index.idf('shipping')).toBeCloseTo(Math.log(1 + 2.5 / 1.5), 10);
  });

  it('ranks by BM25 score and returns only positive scores', () => {
    const index = new Bm25Index(corpus);

    const ids = index.search('refund policy', 5).map((hit) => hit.chunk.id);

    expect(ids).toEqual(['c1', 'c3', 'c2']);
  });

  it('tags hits as lexical and honours k', () => {
    const hits = new Bm25Index(corpus).search('refund policy', 1);

    expect(hits).toHaveLength(1);
    expect(hits[0].method).toBe('lexical');
    expect(hits[0].chunk.id).toBe('c1');
  });

  it('returns nothing when no query term occurs', () => {
    expect(new Bm25Index(corpus).search('warranty', 5)).toEqual([]);
    expect(new Bm25Index(corpus).search('   ', 5)).toEqual([]);
  });

  it('filters by document', () => {
    const ids = new Bm25Index(corpus).search('refund policy', 5, 'doc-2').map((hit) => hit.chunk.id);

    expect(ids).toEqual(['c3']);
  });

  it('breaks score ties by chunk id', () => {
    const index = new Bm25Index([
      makeChunk('b', { content: 'same text here' }),
      makeChunk('a', { content: 'same text here' }),
      makeChunk('c', { content: 'unrelated words' }),
    ]);

    expect(index.search('same', 5).map((hit) => hit.chunk.id)).toEqual(['a', 'b']);
  });
});

describe('LexicalRetriever', () => {
  it('loads the snapshot once and reuses it', async () => {
    const store = new MemoryChunkStore(corpus);
    const retriever = new LexicalRetriever(store, { timeoutMs: 1000 });

    await retriever.retrieve('refund', 5);
    await retriever.retrieve('policy', 5);

    expect(store.listCalls).toBe(1);
  });

  it('rebuilds the snapshot after refresh', async () => {
    const store = new MemoryChunkStore([corpus[0]]);
    const retriever = new LexicalRetriever(store, { timeoutMs: 1000 });

    expect(await retriever.retrieve('shipping', 5)).toEqual([]);

    store.chunks = corpus;
    retriever.refresh();

    const hits = await retriever.retrieve('shipping', 5);
    expect(hits.map((hit) => hit.chunk.id)).toEqual(['c2']);
    expect(store.listCalls).toBe(2);
  });

  it('reports a failed snapshot load as lexical unavailability and retries on the next query', async () => {
    const store = new MemoryChunkStore(corpus);
    store.failNextList = new Error('relation "chunks" does not exist');
    const retriever = new LexicalRetriever(store, { timeoutMs: 1000 });

    const error = await retriever.retrieve('refund', 5).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RetrievalUnavailable);
    expect(error).toMatchObject({ method: 'lexical' });

    const hits = await retriever.retrieve('refund', 5);
    expect(hits.map((hit) => hit.chunk.id)).toEqual(['c3', 'c1']);
  });
});
