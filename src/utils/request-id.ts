import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Reuse the caller's X-Request-Id when it carries a value, otherwise
 * generate one. Used as Fastify's genReqId.
 */
export function requestIdFromHeaders(headers: IncomingHttpHeaders): string {
  const incoming = headers[REQUEST_ID_HEADER_LOWER];
  const value = Array.isArray(incoming) ? incoming[0] : incoming;
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return generateRequestId();
}
