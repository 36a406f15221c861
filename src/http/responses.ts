import type { Response } from './response.js';
import { writeJson, writeText } from './stream.js';

export type HeadersInit = ConstructorParameters<typeof Headers>[0];

export function json({
  status,
  body,
  headers: customHeaders,
}: {
  status: number;
  body?: unknown;
  headers?: HeadersInit;
}): Response {
  const headers = new Headers(customHeaders);
  if (body === undefined) return { status, headers };
  if (!headers.has('Content-Type')) {
    headers.set('Content-Type', 'application/json');
  }
  return { status, headers, body: writeJson(body) };
}

export function text({
  status,
  body,
  headers: customHeaders,
}: {
  status: number;
  body?: string;
  headers?: HeadersInit;
}): Response {
  const headers = new Headers(customHeaders);
  if (body === undefined) return { status, headers };
  if (!headers.has('Content-Type')) {
    headers.set('Content-Type', 'text/plain; charset=utf-8');
  }
  return { status, headers, body: writeText(body) };
}

/**
 * Plain-text response with an exact Content-Length, used for the
 * server's own error replies.
 */
export function status(code: number, reason: string, headers?: HeadersInit): Response {
  const response = text({
    status: code,
    body: reason,
    headers,
  });
  response.headers?.set('Content-Length', String(Buffer.byteLength(reason)));
  return response;
}
