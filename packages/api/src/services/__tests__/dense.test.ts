import { describe, expect, it } from 'vitest';
import { OperationAborted, RetrievalUnavailable } from '../../errors';
import { DenseRetriever, type VectorIndex, type VectorMatch } from '../retrieval/dense';
import { FakeEmbeddings, MemoryChunkStore, makeChunk } from '../../__tests__/helpers';

class FakeVectorIndex implements VectorIndex {
  readonly searches: Array<{ k: number; documentId?: string }> = [];

  constructor(private readonly respond: (signal?: AbortSignal) => Promise<VectorMatch[]>) {}

  async search(_embedding: number[], k: number, options: { documentId?: string; signal?: AbortSignal }) {
    this.searches.push({ k, documentId: options.documentId });
    return this.respond(options.signal);
  }
}

const store = new MemoryChunkStore([makeChunk('c1'), makeChunk('c2'), makeChunk('c3')]);

function never(signal?: AbortSignal): Promise<VectorMatch[]> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('query cancelled')), { once: true });
  });
}

describe('DenseRetriever', () => {
  it('returns dense candidates by descending similarity', async () => {
    const index = new FakeVectorIndex(async () => [
      { chunkId: 'c2', score: 0.7 },
      { chunkId: 'c1', score: 0.9 },
    ]);
    const retriever = new DenseRetriever(new FakeEmbeddings(), index, store, { timeoutMs: 1000 });

    const hits = await retriever.retrieve('refund policy', 5, { documentId: 'doc-1' });

    expect(hits.map((hit) => [hit.chunk.id, hit.method, hit.score])).toEqual([
      ['c1', 'dense', 0.9],
      ['c2', 'dense', 0.7],
    ]);
    expect(index.searches).toEqual([{ k: 5, documentId: 'doc-1' }]);
  });

  it('treats an id missing from the chunk store as a backend error', async () => {
    const index = new FakeVectorIndex(async () => [
      { chunkId: 'c1', score: 0.9 },
      { chunkId: 'ghost', score: 0.8 },
    ]);
    const retriever = new DenseRetriever(new FakeEmbeddings(), index, store, { timeoutMs: 1000 });

    await expect(retriever.retrieve('q', 5)).rejects.toThrow(
      new RetrievalUnavailable('dense', 'dangling chunk reference ghost')
    );
  });

  it('turns a timeout into RetrievalUnavailable', async () => {
    const retriever = new DenseRetriever(new FakeEmbeddings(), new FakeVectorIndex(never), store, { timeoutMs: 20 });

    await expect(retriever.retrieve('q', 5)).rejects.toThrow('dense retrieval unavailable: timed out after 20ms');
  });

  it('wraps embedding failures', async () => {
    const embeddings = new FakeEmbeddings();
    embeddings.embed = async () => {
      throw new Error('Embedding service returned 502');
    };
    const retriever = new DenseRetriever(embeddings, new FakeVectorIndex(async () => []), store, { timeoutMs: 1000 });

    const error = await retriever.retrieve('q', 5).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetrievalUnavailable);
    expect(error).toMatchObject({ method: 'dense', message: 'dense retrieval unavailable: Embedding service returned 502' });
  });

  it('propagates a caller abort instead of reporting the backend down', async () => {
    const controller = new AbortController();
    const retriever = new DenseRetriever(new FakeEmbeddings(), new FakeVectorIndex(never), store, { timeoutMs: 1000 });

    const pending = retriever.retrieve('q', 5, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationAborted);
  });
});
