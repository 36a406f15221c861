import type { Request } from './request.js';
import type { Response } from './response.js';

/**
 * Application handler: the single integration point with hosted code.
 */
export type Handler = (request: Request) => Promise<Response> | Response;

/**
 * An object exposing a handle() method, accepted wherever a Handler is.
 */
export interface Application {
  handle(request: Request): Promise<Response> | Response;
}
