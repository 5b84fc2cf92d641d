import { Registry } from 'prom-client';
import type { Candidate, Chunk, FeatureToggles, RankedCandidate, RetrievalMethod } from '@ragline/shared';
import type { LLMClient, LLMCompletion, LLMOptions } from '../utils/llm';
import type { EmbeddingClient } from '../utils/embeddings';
import type { ChunkStore } from '../services/retrieval/chunk-store';
import type { RetrieveOptions, Retriever } from '../services/retrieval/dense';
import { createMetrics, type Metrics } from '../observability/metrics';
import { DEFAULT_FUSION } from '../services/fusion';
import { QueryPlanner } from '../services/planner';
import { ToolRouter, createDefaultToolRegistry } from '../services/tools';
import { AnswerGenerator } from '../services/synthesis';
import { FollowupGenerator } from '../services/followups';
import type { Reranker } from '../services/reranking';
import { QueryPipeline, type QueryPipelineOptions } from '../services/pipeline';
import type { TraceExporter, TraceRecord } from '../observability/tracer';

export function makeChunk(id: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id,
    documentId: 'doc-1',
    source: 'handbook.md',
    position: 0,
    content: `content of ${id}`,
    tokenCount: 10,
    metadata: {},
    ...overrides,
  };
}

export function candidate(id: string, method: RetrievalMethod, score: number, chunk?: Partial<Chunk>): Candidate {
  return { chunk: makeChunk(id, chunk), method, score };
}

export function ranked(chunk: Chunk, rank: number): RankedCandidate {
  return {
    chunk,
    methods: ['dense'],
    rawScores: { dense: 1 },
    normalizedScores: { dense: 1 },
    normalizedScore: 1,
    score: 0.5,
    rank,
    rerankScore: null,
  };
}

export type LLMHandler = (prompt: string, options: LLMOptions) => string | Promise<string>;

export class FakeLLM implements LLMClient {
  readonly model = 'fake-model';
  readonly calls: Array<{ prompt: string; options: LLMOptions }> = [];

  constructor(private readonly handler: LLMHandler = () => 'ok') {}

  async generate(prompt: string, options: LLMOptions = {}): Promise<LLMCompletion> {
    this.calls.push({ prompt, options });
    const text = await this.handler(prompt, options);
    return {
      text,
      model: this.model,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    };
  }
}

/** Never answers; rejects once the caller's signal aborts. */
export function hang(_prompt: string, options: LLMOptions): Promise<string> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
  });
}

export class FakeRetriever implements Retriever {
  readonly calls: string[] = [];

  constructor(private readonly respond: (query: string) => Candidate[] | Promise<Candidate[]>) {}

  async retrieve(query: string, k: number, _options: RetrieveOptions = {}): Promise<Candidate[]> {
    this.calls.push(query);
    const results = await this.respond(query);
    return results.slice(0, k);
  }
}

export class MemoryChunkStore implements ChunkStore {
  listCalls = 0;
  failNextList: Error | null = null;

  constructor(public chunks: Chunk[]) {}

  async getChunks(ids: string[]): Promise<Map<string, Chunk>> {
    const wanted = new Set(ids);
    return new Map(this.chunks.filter((chunk) => wanted.has(chunk.id)).map((chunk) => [chunk.id, chunk]));
  }

  async listChunks(): Promise<Chunk[]> {
    this.listCalls++;
    if (this.failNextList) {
      const error = this.failNextList;
      this.failNextList = null;
      throw error;
    }
    return [...this.chunks];
  }
}

export class FakeEmbeddings implements EmbeddingClient {
  readonly calls: string[] = [];

  constructor(private readonly vectors: Record<string, number[]> = {}, private readonly fallback: number[] = [1, 0]) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectors[text] ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectors[text] ?? this.fallback);
  }
}

export class RecordingExporter implements TraceExporter {
  readonly traces: TraceRecord[] = [];

  async export(trace: TraceRecord): Promise<void> {
    this.traces.push(trace);
  }
}

export function testMetrics(): Metrics {
  return createMetrics(new Registry());
}

export const ALL_FEATURES_OFF: FeatureToggles = {
  toolRouter: false,
  docActions: false,
  followups: false,
  planning: false,
};

export interface PipelineFixture {
  pipeline: QueryPipeline;
  dense: FakeRetriever;
  lexical: FakeRetriever;
  llm: FakeLLM;
  metrics: Metrics;
  exporter: RecordingExporter;
}

export interface PipelineFixtureOptions {
  dense?: FakeRetriever;
  lexical?: FakeRetriever;
  llm?: FakeLLM;
  reranker?: Reranker | null;
  features?: Partial<FeatureToggles>;
  options?: Partial<QueryPipelineOptions>;
  generationAttempts?: number;
  generationTimeoutMs?: number;
}

/**
 * A pipeline over in-process fakes. Generation retries without delay.
 */
export function buildPipeline(fixture: PipelineFixtureOptions = {}): PipelineFixture {
  const dense = fixture.dense ?? new FakeRetriever(() => []);
  const lexical = fixture.lexical ?? new FakeRetriever(() => []);
  const llm = fixture.llm ?? new FakeLLM(() => 'The answer [handbook.md#0].');
  const metrics = testMetrics();
  const exporter = new RecordingExporter();
  const features: FeatureToggles = { ...ALL_FEATURES_OFF, ...fixture.features };

  const pipeline = new QueryPipeline(
    {
      planner: new QueryPlanner(llm, { enabled: true, maxSubQueries: 3, timeoutMs: 1000 }),
      dense,
      lexical,
      reranker: fixture.reranker ?? null,
      router: new ToolRouter(createDefaultToolRegistry(llm), llm, {
        mode: 'rules',
        docActions: features.docActions,
        timeoutMs: 1000,
      }),
      generator: new AnswerGenerator(llm, {
        maxAttempts: fixture.generationAttempts ?? 2,
        timeoutMs: fixture.generationTimeoutMs ?? 1000,
        maxAnswerTokens: 300,
        retryDelayMs: 0,
      }),
      followups: new FollowupGenerator(llm, { timeoutMs: 1000 }),
      metrics,
      traceExporter: exporter,
    },
    {
      features,
      fusion: DEFAULT_FUSION,
      rerankPoolSize: 20,
      rerankTimeoutMs: 1000,
      maxFanOut: 2,
      deadlineMs: 5000,
      latencyBudgets: { planning: 2000, retrieval: 500, reranking: 2000, generation: 8000, total: 15000 },
      ...fixture.options,
    }
  );

  return { pipeline, dense, lexical, llm, metrics, exporter };
}
