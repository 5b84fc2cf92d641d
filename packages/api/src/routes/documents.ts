import { FastifyPluginAsync } from 'fastify';
import { errorMessage } from '../errors';
import type { IndexRefresher } from './ingest';

export interface DocumentRoutesOptions {
  workerUrl: string;
  lexicalIndex: IndexRefresher;
  fetch: typeof fetch;
}

/**
 * Document management routes.
 *
 * Proxies to the ingestion worker for document operations.
 * - GET /documents - List all documents
 * - DELETE /documents/:id - Delete a document
 */
export const documentRoutes: FastifyPluginAsync<DocumentRoutesOptions> = async (fastify, options) => {
  const { workerUrl, lexicalIndex } = options;

  /**
   * GET /api/documents
   * List all uploaded documents
   */
  fastify.get('/', async (_request, reply) => {
    try {
      const response = await options.fetch(`${workerUrl}/documents`);

      if (!response.ok) {
        throw new Error(`Worker returned ${response.status}`);
      }

      const data: unknown = await response.json();
      return data;
    } catch (error) {
      fastify.log.error({ error: errorMessage(error) }, 'Failed to fetch documents');
      return reply.code(503).send({
        error: 'Failed to fetch documents',
        details: errorMessage(error),
      });
    }
  });

  /**
   * DELETE /api/documents/:id
   * Delete a document and its chunks
   */
  fastify.delete<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const { id } = request.params;

    try {
      const response = await options.fetch(`${workerUrl}/documents/${encodeURIComponent(id)}`, {
        method: 'DELETE',
      });

      if (response.status === 404) {
        return reply.code(404).send({
          error: 'Document not found',
        });
      }

      if (!response.ok) {
        throw new Error(`Worker returned ${response.status}`);
      }

      // Deleted chunks must stop matching lexical queries
      lexicalIndex.refresh();

      const data: unknown = await response.json();
      return data;
    } catch (error) {
      fastify.log.error({ error: errorMessage(error), documentId: id }, 'Failed to delete document');
      return reply.code(503).send({
        error: 'Failed to delete document',
        details: errorMessage(error),
      });
    }
  });
};
