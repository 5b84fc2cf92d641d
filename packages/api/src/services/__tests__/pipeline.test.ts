import { describe, expect, it } from 'vitest';
import type { FusedCandidate } from '@ragline/shared';
import {
  GenerationUnavailable,
  OperationAborted,
  QueryDeadlineExceeded,
  RetrievalUnavailable,
} from '../../errors';
import type { Reranker } from '../reranking';
import { FakeLLM, FakeRetriever, buildPipeline, candidate, hang } from '../../__tests__/helpers';

const denseHits = () => [candidate('c1', 'dense', 0.9), candidate('c2', 'dense', 0.7)];
const lexicalHits = () => [candidate('c2', 'lexical', 5.2), candidate('c3', 'lexical', 3.1)];

const input = { query: 'refund policy', k: 5, maxContextTokens: 1000 };

function down(): never {
  throw new Error('connection refused');
}

describe('QueryPipeline', () => {
  it('answers with citations from the fused context', async () => {
    const { pipeline, exporter, metrics } = buildPipeline({
      dense: new FakeRetriever(denseHits),
      lexical: new FakeRetriever(lexicalHits),
    });

    const result = await pipeline.run(input);

    expect(result.answer).toBe('The answer [handbook.md#0].');
    expect(result.citations).toEqual([
      { chunk_id: 'c1', document_id: 'doc-1' },
      { chunk_id: 'c2', document_id: 'doc-1' },
      { chunk_id: 'c3', document_id: 'doc-1' },
    ]);
    expect(result.degraded).toEqual([]);
    expect(result.usedTool).toBeNull();
    expect(result.followups).toEqual([]);
    expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });

    expect(exporter.traces).toHaveLength(1);
    const [trace] = exporter.traces;
    expect(trace.traceId).toBe(result.traceId);
    expect(trace.status).toBe('ok');
    expect(trace.spans.map((span) => span.name)).toEqual([
      'query',
      'planning',
      'retrieval',
      'retrieval.dense',
      'retrieval.lexical',
      'fusion',
      'reranking',
      'context_assembly',
      'generation',
    ]);

    const tokens = await metrics.tokens.get();
    expect(tokens.values.find((value) => value.labels.type === 'total')?.value).toBe(15);
  });

  it('returns the context and the ranked chunks that did not fit it', async () => {
    const { pipeline } = buildPipeline({
      dense: new FakeRetriever(denseHits),
      lexical: new FakeRetriever(lexicalHits),
    });

    // 17 for the first block, 19 for each block after it
    const result = await pipeline.run({ ...input, maxContextTokens: 36 });

    expect(result.context).toBe(
      '[handbook.md#0] (chunk c1)\ncontent of c1\n\n---\n\n[handbook.md#0] (chunk c2)\ncontent of c2'
    );
    expect(result.citations.map((citation) => citation.chunk_id)).toEqual(['c1', 'c2']);
    expect(result.related).toEqual([{ chunk_id: 'c3', document_id: 'doc-1' }]);
    expect(result.plan).toBeNull();
  });

  it('continues on lexical results when dense retrieval fails', async () => {
    const { pipeline, exporter } = buildPipeline({
      dense: new FakeRetriever(down),
      lexical: new FakeRetriever(lexicalHits),
    });

    const result = await pipeline.run(input);

    expect(result.degraded).toEqual(['retrieval']);
    expect(result.citations.map((citation) => citation.chunk_id)).toEqual(['c2', 'c3']);

    const [trace] = exporter.traces;
    expect(trace.status).toBe('degraded');
    expect(trace.spans.find((span) => span.name === 'retrieval.dense')).toMatchObject({
      status: 'error',
      error: 'connection refused',
    });
    expect(trace.spans.find((span) => span.name === 'retrieval')?.attributes.degradedReason).toBe(
      'dense retrieval failed'
    );
  });

  it('fails with RetrievalUnavailable when every method fails', async () => {
    const { pipeline, exporter, llm } = buildPipeline({
      dense: new FakeRetriever(down),
      lexical: new FakeRetriever(down),
    });

    const error = await pipeline.run(input).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetrievalUnavailable);
    expect(error).toMatchObject({
      method: 'all',
      message:
        'all retrieval unavailable: dense retrieval unavailable: connection refused; ' +
        'lexical retrieval unavailable: connection refused',
    });
    expect(llm.calls).toHaveLength(0);
    expect(exporter.traces[0].status).toBe('failed');
  });

  it('retrieves for every planned sub-query', async () => {
    const llm = new FakeLLM((_prompt, options) =>
      options.system?.startsWith('Rewrite the query')
        ? '{"rewritten_query": "refund policy", "subqueries": ["refund window"]}'
        : 'The answer [handbook.md#0].'
    );
    const { pipeline, dense, lexical } = buildPipeline({
      llm,
      dense: new FakeRetriever(denseHits),
      lexical: new FakeRetriever(lexicalHits),
      features: { planning: true },
    });

    const result = await pipeline.run({ ...input, query: 'how do refunds work' });

    expect(result.plan?.queries).toEqual(['refund policy', 'refund window']);
    expect(dense.calls).toEqual(['refund policy', 'refund window']);
    expect(lexical.calls).toEqual(['refund policy', 'refund window']);
    expect(result.citations.map((citation) => citation.chunk_id)).toEqual(['c1', 'c2', 'c3']);
  });

  it('grounds the answer on a routed tool', async () => {
    const llm = new FakeLLM((_prompt, options) =>
      options.system?.startsWith('Summarize') ? 'Refunds: 30 days.' : 'Summary answer [handbook.md#0].'
    );
    const { pipeline } = buildPipeline({
      llm,
      dense: new FakeRetriever(denseHits),
      features: { toolRouter: true },
    });

    const result = await pipeline.run({ ...input, query: 'Please summarize the refund policy' });

    expect(result.usedTool).toBe('summarize');
    expect(result.toolInvocation).toMatchObject({ tool: 'summarize', ok: true, output: { text: 'Refunds: 30 days.' } });
    expect(llm.calls[1].prompt).toContain('Tool output (summarize):\nRefunds: 30 days.');
    expect(result.answer).toBe('Summary answer [handbook.md#0].');
  });

  it('skips tool routing when the context is empty', async () => {
    const { pipeline } = buildPipeline({ features: { toolRouter: true } });

    const result = await pipeline.run({ ...input, query: 'Please summarize the refund policy' });

    expect(result.usedTool).toBeNull();
    expect(result.citations).toEqual([]);
  });

  it('falls back to the fused order when reranking fails', async () => {
    const reranker: Reranker = {
      name: 'flaky',
      score: async (_query: string, _candidates: FusedCandidate[]) => {
        throw new Error('reranker overloaded');
      },
    };
    const { pipeline } = buildPipeline({
      dense: new FakeRetriever(denseHits),
      lexical: new FakeRetriever(lexicalHits),
      reranker,
    });

    const result = await pipeline.run(input);

    expect(result.degraded).toEqual(['reranking']);
    expect(result.citations.map((citation) => citation.chunk_id)).toEqual(['c1', 'c2', 'c3']);
  });

  it('adds follow-ups and marks the query degraded when they fail', async () => {
    const withFollowups = buildPipeline({
      llm: new FakeLLM((_prompt, options) =>
        options.system?.startsWith('Generate 2-3')
          ? '{"follow_ups": ["How long do refunds take?", "Who approves them?"]}'
          : 'The answer [handbook.md#0].'
      ),
      dense: new FakeRetriever(denseHits),
      features: { followups: true },
    });
    const broken = buildPipeline({
      llm: new FakeLLM((_prompt, options) => (options.system?.startsWith('Generate 2-3') ? 'nope' : 'The answer.')),
      dense: new FakeRetriever(denseHits),
      features: { followups: true },
    });

    const ok = await withFollowups.pipeline.run(input);
    const degraded = await broken.pipeline.run(input);

    expect(ok.followups).toEqual(['How long do refunds take?', 'Who approves them?']);
    expect(ok.degraded).toEqual([]);
    expect(degraded.followups).toEqual([]);
    expect(degraded.degraded).toEqual(['followups']);
  });

  it('layers per-request feature overrides over the configured toggles', async () => {
    const llm = new FakeLLM((_prompt, options) => {
      if (options.system?.startsWith('Generate 2-3')) {
        return '{"follow_ups": ["How long do refunds take?", "Who approves them?"]}';
      }
      return options.system?.startsWith('Summarize') ? 'Refunds: 30 days.' : 'The answer [handbook.md#0].';
    });
    const { pipeline } = buildPipeline({
      llm,
      dense: new FakeRetriever(denseHits),
      features: { toolRouter: true },
    });

    const result = await pipeline.run({
      ...input,
      query: 'Please summarize the refund policy',
      overrides: { features: { toolRouter: false, followups: true } },
    });

    expect(result.usedTool).toBeNull();
    expect(result.toolInvocation).toBeNull();
    expect(result.followups).toEqual(['How long do refunds take?', 'Who approves them?']);
    expect(llm.calls.some((call) => call.options.system?.startsWith('Summarize'))).toBe(false);
  });

  it('keeps configured toggles for overrides left unset', async () => {
    const { pipeline } = buildPipeline({
      llm: new FakeLLM((_prompt, options) =>
        options.system?.startsWith('Summarize') ? 'Refunds: 30 days.' : 'Summary answer [handbook.md#0].'
      ),
      dense: new FakeRetriever(denseHits),
      features: { toolRouter: true },
    });

    const result = await pipeline.run({
      ...input,
      query: 'Please summarize the refund policy',
      overrides: { features: { followups: undefined } },
    });

    expect(result.usedTool).toBe('summarize');
  });

  it('skips the reranker when the request turns reranking off', async () => {
    let calls = 0;
    const reranker: Reranker = {
      name: 'flaky',
      score: async () => {
        calls++;
        throw new Error('reranker overloaded');
      },
    };
    const { pipeline, exporter } = buildPipeline({
      dense: new FakeRetriever(denseHits),
      lexical: new FakeRetriever(lexicalHits),
      reranker,
    });

    const result = await pipeline.run({ ...input, overrides: { rerank: false } });

    expect(calls).toBe(0);
    expect(result.degraded).toEqual([]);
    expect(result.citations.map((citation) => citation.chunk_id)).toEqual(['c1', 'c2', 'c3']);
    expect(exporter.traces[0].spans.find((span) => span.name === 'reranking')?.attributes.reranker).toBe('disabled');
  });

  it('passes answer length and temperature overrides to the model', async () => {
    const { pipeline, llm } = buildPipeline({ dense: new FakeRetriever(denseHits) });

    await pipeline.run({ ...input, overrides: { maxAnswerTokens: 120, temperature: 0.7 } });
    await pipeline.run(input);

    expect(llm.calls[0].options).toMatchObject({ maxTokens: 120, temperature: 0.7 });
    expect(llm.calls[1].options).toMatchObject({ maxTokens: 300, temperature: 0.1 });
  });

  it('raises GenerationUnavailable with no partial answer', async () => {
    const { pipeline, exporter } = buildPipeline({
      llm: new FakeLLM(hang),
      dense: new FakeRetriever(denseHits),
      generationTimeoutMs: 20,
    });

    const error = await pipeline.run(input).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationUnavailable);
    expect(error).toMatchObject({ attempts: 2 });
    expect(exporter.traces[0].status).toBe('failed');
    expect(exporter.traces[0].spans.find((span) => span.name === 'generation')?.status).toBe('error');
  });

  it('aborts in-flight work at the query deadline', async () => {
    const { pipeline, exporter } = buildPipeline({
      llm: new FakeLLM(hang),
      dense: new FakeRetriever(denseHits),
      generationTimeoutMs: 5000,
      options: { deadlineMs: 50 },
    });

    await expect(pipeline.run(input)).rejects.toBeInstanceOf(QueryDeadlineExceeded);
    expect(exporter.traces[0].status).toBe('aborted');
  });

  it('stops when the caller has already gone away', async () => {
    const controller = new AbortController();
    controller.abort();
    const { pipeline, dense } = buildPipeline({ dense: new FakeRetriever(denseHits) });

    await expect(pipeline.run({ ...input, signal: controller.signal })).rejects.toBeInstanceOf(OperationAborted);
    expect(dense.calls).toEqual([]);
  });
});
