import type { FastifyRequest } from 'fastify';
import { SESSION_COOKIE, SESSION_HEADER, type Identity } from '@ragline/shared';

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

/**
 * Who is asking: browser cookie, then session header, then client IP.
 */
export function resolveIdentity(request: FastifyRequest): Identity {
  const cookie = request.cookies?.[SESSION_COOKIE]?.trim();
  if (cookie) {
    return { id: cookie, source: 'cookie' };
  }

  const session = headerValue(request, SESSION_HEADER);
  if (session) {
    return { id: session, source: 'header' };
  }

  const forwarded = headerValue(request, 'x-forwarded-for')?.split(',')[0]?.trim();
  return { id: forwarded || request.ip, source: 'ip' };
}
