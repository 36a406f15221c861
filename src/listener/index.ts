/**
 * Listener module.
 */

export { ConnectionQueue, type ConnectionSource } from './connection-queue.js';
export { Listener, type ListenerAddress, type ListenerOptions } from './listener.js';
