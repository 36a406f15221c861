import type { ReadableStream } from 'node:stream/web';

export type RequestBody = ReadableStream<Uint8Array>;

/**
 * A parsed HTTP request handed to the application handler.
 *
 * Scoped to a single request; nothing in it is shared with other requests.
 */
export interface Request {
  url: URL;
  method: string;
  headers: Headers;
  body: RequestBody;
  /** HTTP version as sent by the client, e.g. "1.1" */
  httpVersion: string;
  remoteAddress?: string;
  /** Aborted when the request deadline expires or the worker is terminated */
  signal: AbortSignal;
}
