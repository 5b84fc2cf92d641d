/**
 * Core types for Ragline.
 * Shared between the API package and its tests.
 */

export type RetrievalMethod = 'dense' | 'lexical';

export type ActionKind = 'query' | 'upload';

export interface ChunkMetadata {
  section?: string;
  page?: number;
  table?: boolean;
  [key: string]: unknown;
}

export interface Chunk {
  id: string;
  documentId: string;
  source: string;
  position: number;
  content: string;
  tokenCount: number;
  metadata: ChunkMetadata;
}

/**
 * A single retriever hit. `score` is the raw, method-specific score.
 */
export interface Candidate {
  chunk: Chunk;
  method: RetrievalMethod;
  score: number;
}

export interface FusedCandidate {
  chunk: Chunk;
  methods: RetrievalMethod[];
  rawScores: Partial<Record<RetrievalMethod, number>>;
  normalizedScores: Partial<Record<RetrievalMethod, number>>;
  /** Best of the per-method normalized scores */
  normalizedScore: number;
  /** Weighted fused score */
  score: number;
  /** 1-based position after fusion */
  rank: number;
}

export interface RankedCandidate extends FusedCandidate {
  rerankScore: number | null;
}

export interface Identity {
  id: string;
  source: 'cookie' | 'header' | 'ip';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Citation {
  chunk_id: string;
  document_id: string;
}

export interface QueryPlanSummary {
  queries: string[];
  rewritten_query: string;
  entities: string[];
}

export interface QueryResponse {
  answer: string;
  /** Chunks packed into the context */
  citations: Citation[];
  /** Ranked chunks left out of the context */
  related: Citation[];
  context: string;
  followups: string[];
  used_tool: string | null;
  tool_output: string | null;
  plan: QueryPlanSummary | null;
  degraded: string[];
  trace_id: string;
}

export interface FeatureToggles {
  toolRouter: boolean;
  docActions: boolean;
  followups: boolean;
  planning: boolean;
}
