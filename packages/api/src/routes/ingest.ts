import { FastifyPluginAsync } from 'fastify';
import type { RateLimiter } from '../services/rate-limiter';
import { resolveIdentity } from '../services/identity';
import type { Metrics } from '../observability/metrics';
import { errorMessage } from '../errors';
import { sendRateLimited } from './responses';

export interface IndexRefresher {
  refresh(): void;
}

export interface IngestRoutesOptions {
  workerUrl: string;
  maxUploadMb: number;
  timeoutMs: number;
  rateLimiter: RateLimiter;
  lexicalIndex: IndexRefresher;
  metrics: Metrics;
  fetch: typeof fetch;
}

const ENDPOINT = '/api/ingest/file';

/** A rejection body may be plain text from a proxy in front of the worker */
async function readRejection(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { error: text.trim() || response.statusText || `Worker returned ${response.status}` };
  }
}

/**
 * Upload proxy.
 *
 * Parsing, chunking and embedding belong to the ingestion worker; this
 * route only rate-limits uploads, enforces the size cap and forwards the
 * multipart body untouched.
 */
export const ingestRoutes: FastifyPluginAsync<IngestRoutesOptions> = async (fastify, options) => {
  const { workerUrl, maxUploadMb, timeoutMs, rateLimiter, lexicalIndex, metrics } = options;
  const bodyLimit = maxUploadMb * 1024 * 1024;

  fastify.addContentTypeParser('multipart/form-data', { parseAs: 'buffer', bodyLimit }, (_request, body, done) => {
    done(null, body);
  });

  fastify.setErrorHandler((error, _request, reply) => {
    if (error.statusCode === 413) {
      return reply.code(413).send({ error: `File too large. Max size is ${maxUploadMb} MB.` });
    }
    return reply.send(error);
  });

  /**
   * POST /api/ingest/file
   */
  fastify.post(
    '/ingest/file',
    {
      bodyLimit,
      // Before the body is read: a limited client never streams its upload
      onRequest: async (request, reply) => {
        metrics.requests.inc({ endpoint: ENDPOINT });
        const admission = await rateLimiter.admit(resolveIdentity(request).id, 'upload');
        if (!admission.allowed) {
          return sendRateLimited(reply, 'upload', admission.retryAfterMs);
        }
      },
    },
    async (request, reply) => {
      const contentType = request.headers['content-type'];
      if (!contentType || !Buffer.isBuffer(request.body)) {
        return reply.code(400).send({ error: 'Expected a multipart/form-data upload' });
      }

      const identity = resolveIdentity(request);
      try {
        const response = await options.fetch(`${workerUrl}/ingest/file`, {
          method: 'POST',
          headers: { 'content-type': contentType, 'x-user-id': identity.id },
          body: request.body,
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          fastify.log.warn({ status: response.status }, 'Ingestion worker rejected upload');
          return reply.code(response.status >= 500 ? 502 : response.status).send(await readRejection(response));
        }

        const payload: unknown = await response.json();

        lexicalIndex.refresh();
        fastify.log.info({ identitySource: identity.source, bytes: request.body.length }, 'Document ingested');
        return payload;
      } catch (error) {
        metrics.errors.inc({ endpoint: ENDPOINT });
        fastify.log.error({ error: errorMessage(error) }, 'Ingestion worker unavailable');
        return reply.code(503).send({
          error: 'Ingestion service unavailable',
          details: errorMessage(error),
        });
      }
    }
  );
};
