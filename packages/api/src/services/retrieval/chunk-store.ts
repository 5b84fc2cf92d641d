import type { Chunk, ChunkMetadata } from '@ragline/shared';
import type { Sql } from '../../utils/db';

/**
 * Read access to chunks written by the ingestion worker.
 * The core never writes chunks.
 */
export interface ChunkStore {
  /** Resolve ids to chunks; ids that do not exist are absent from the map. */
  getChunks(ids: string[], signal?: AbortSignal): Promise<Map<string, Chunk>>;
  /** Full snapshot, used to build the lexical index. */
  listChunks(signal?: AbortSignal): Promise<Chunk[]>;
}

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  source: string | null;
  position: number | null;
  content: string;
  token_count: number | null;
  metadata: ChunkMetadata | null;
}

function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.chunk_id,
    documentId: row.document_id,
    source: row.source ?? 'unknown',
    position: row.position ?? 0,
    content: row.content,
    tokenCount: row.token_count ?? Math.ceil(row.content.length / 4),
    metadata: row.metadata ?? {},
  };
}

/**
 * Forward an abort to a running postgres query (best-effort cancel).
 */
export function cancelOnAbort<T extends { cancel(): void }>(query: T, signal?: AbortSignal): T {
  if (signal) {
    if (signal.aborted) {
      query.cancel();
    } else {
      signal.addEventListener('abort', () => query.cancel(), { once: true });
    }
  }
  return query;
}

export class PostgresChunkStore implements ChunkStore {
  constructor(private readonly sql: Sql) {}

  async getChunks(ids: string[], signal?: AbortSignal): Promise<Map<string, Chunk>> {
    if (ids.length === 0) {
      return new Map();
    }

    const rows = await cancelOnAbort(
      this.sql<ChunkRow[]>`
        SELECT
          id::text as chunk_id,
          document_id::text as document_id,
          source,
          chunk_index as position,
          content,
          token_count,
          metadata
        FROM chunks
        WHERE id::text IN ${this.sql(ids)}
      `,
      signal
    );

    return new Map(rows.map((row) => [row.chunk_id, toChunk(row)]));
  }

  async listChunks(signal?: AbortSignal): Promise<Chunk[]> {
    const rows = await cancelOnAbort(
      this.sql<ChunkRow[]>`
        SELECT
          id::text as chunk_id,
          document_id::text as document_id,
          source,
          chunk_index as position,
          content,
          token_count,
          metadata
        FROM chunks
        ORDER BY document_id, chunk_index
      `,
      signal
    );

    return rows.map(toChunk);
  }
}
