/**
 * HTTP value objects exchanged with the application handler.
 */

export type { Application, Handler } from './handler.js';
export type { Request, RequestBody } from './request.js';
export type { Response, ResponseBody } from './response.js';
export { type HeadersInit, json, status, text } from './responses.js';
export { readBytes, readJson, readText, writeJson, writeText } from './stream.js';
