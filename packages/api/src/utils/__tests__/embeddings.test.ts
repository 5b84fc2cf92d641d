import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpEmbeddingClient } from '../embeddings';

const client = () => new HttpEmbeddingClient({ workerUrl: 'http://worker.test', model: 'test-model', cacheTtl: 60 });

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('HttpEmbeddingClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('embeds a query through the worker', async () => {
    const fetchMock = stubFetch({ embedding: [0.1, 0.2] });

    expect(await client().embed('Refund policy')).toEqual([0.1, 0.2]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://worker.test/embed');
    expect(fetchMock.mock.calls[0][1]?.body).toBe(JSON.stringify({ text: 'Refund policy', model: 'test-model' }));
  });

  it('reports a worker error status', async () => {
    stubFetch({ detail: 'model not loaded' }, 502);

    await expect(client().embed('q')).rejects.toThrow('Embedding service returned 502');
  });

  it('rejects a reply of the wrong shape', async () => {
    stubFetch({ vector: [1] });

    await expect(client().embed('q')).rejects.toThrow();
  });

  it('checks the batch size', async () => {
    stubFetch({ embeddings: [[1, 0]] });

    await expect(client().embedBatch(['a', 'b'])).rejects.toThrow('Embedding service returned 1 vectors for 2 texts');
  });

  it('skips the worker for an empty batch', async () => {
    const fetchMock = stubFetch({ embeddings: [] });

    expect(await client().embedBatch([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
