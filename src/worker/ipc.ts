/**
 * IPC protocol between the supervisor process and a worker process.
 *
 * Parent -> child:
 * - init: worker id, application reference and worker options
 * - connection: carries an accepted socket as the message handle
 * - drain: stop accepting, finish in-flight requests within graceMs
 *
 * Child -> parent:
 * - status: worker status transition
 * - heartbeat: liveness, sent every heartbeat interval
 * - connection-closed: a transferred connection ended (returns one credit)
 * - exit: the worker loop ended; the process exits with code 0 next
 * - fatal: the worker could not start or failed; the process exits with code 1 next
 */

import { z } from 'zod';

const workerStatusSchema = z.enum(['starting', 'ready', 'busy', 'draining', 'dead']);

export const workerProcessOptionsSchema = z.object({
  requestTimeoutMs: z.number().int().positive().optional(),
  keepAliveTimeoutMs: z.number().int().nonnegative().optional(),
  maxRequestsPerConnection: z.number().int().nonnegative().optional(),
  workerConnections: z.number().int().positive().optional(),
  heartbeatIntervalMs: z.number().int().positive().optional(),
  maxRequests: z.number().int().nonnegative().optional(),
  maxRequestsJitter: z.number().int().nonnegative().optional(),
  gracefulTimeoutMs: z.number().int().nonnegative().optional(),
  maxHeaderSize: z.number().int().positive().optional(),
});

export type WorkerProcessOptions = z.infer<typeof workerProcessOptionsSchema>;

const parentMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('init'),
    workerId: z.string().min(1),
    app: z.string().min(1),
    cwd: z.string().optional(),
    options: workerProcessOptionsSchema,
  }),
  z.object({ type: z.literal('connection') }),
  z.object({ type: z.literal('drain'), graceMs: z.number().int().nonnegative() }),
]);

const childMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('status'), status: workerStatusSchema }),
  z.object({ type: z.literal('heartbeat'), timestamp: z.number() }),
  z.object({ type: z.literal('connection-closed') }),
  z.object({ type: z.literal('exit'), reason: z.enum(['drained', 'recycled', 'closed', 'terminated']) }),
  z.object({ type: z.literal('fatal'), message: z.string() }),
]);

export type ParentMessage = z.infer<typeof parentMessageSchema>;
export type ChildMessage = z.infer<typeof childMessageSchema>;
export type InitMessage = Extract<ParentMessage, { type: 'init' }>;

/**
 * Validate a message received from the supervisor; null when malformed.
 */
export function parseParentMessage(value: unknown): ParentMessage | null {
  const result = parentMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Validate a message received from a worker process; null when malformed.
 */
export function parseChildMessage(value: unknown): ChildMessage | null {
  const result = childMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}
