/**
 * End-to-end serving tests.
 *
 * A PreforkServer runs inline workers on an ephemeral loopback port and
 * is exercised with real HTTP clients.
 */

import net from 'node:net';
import { afterEach, describe, expect, it } from 'vitest';
import { loadServerConfig } from '../../src/config/server-config.js';
import type { ServerConfigOverrides } from '../../src/config/types.js';
import { SupervisorEventNames } from '../../src/events/event-names.js';
import type { Handler } from '../../src/http/handler.js';
import { text } from '../../src/http/responses.js';
import { PreforkServer } from '../../src/server/prefork-server.js';
import { BindError } from '../../src/types/errors.js';
import { delay, RawClient, rawExchange, request, waitFor } from '../helpers/http.js';

const app: Handler = async (req) => {
  const wait = Number(req.url.searchParams.get('wait') ?? '0');
  if (wait > 0) {
    await delay(wait);
  }
  if (req.url.pathname === '/fail') {
    throw new Error('application bug');
  }
  return text({ status: 200, body: `ok ${req.url.pathname}` });
};

function listenOn(port: number): Promise<net.Server> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => resolve(server));
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('serving', () => {
  const servers: PreforkServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.shutdown('immediate')));
  });

  async function serve(handler: Handler = app, overrides: ServerConfigOverrides = {}): Promise<{
    server: PreforkServer;
    port: number;
  }> {
    const config = loadServerConfig(
      { host: '127.0.0.1', port: 0, workers: 2, workerModel: 'inline', gracefulTimeoutMs: 300, ...overrides },
      {}
    );
    const server = new PreforkServer(config, { handler });
    servers.push(server);
    await server.start();
    const port = server.address()?.port ?? 0;
    return { server, port };
  }

  it('answers requests from the worker pool', async () => {
    const { server, port } = await serve();

    const responses = await Promise.all([request(port, '/a'), request(port, '/b'), request(port, '/c')]);

    expect(responses.map((response) => response.body)).toEqual(['ok /a', 'ok /b', 'ok /c']);
    expect(server.status().supervisor.capacity).toBe(2);
  });

  it('fails to start on a port already in use', async () => {
    const occupied = await listenOn(0);
    const address = occupied.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;

    try {
      await expect(serve(app, { port })).rejects.toBeInstanceOf(BindError);
    } finally {
      await closeServer(occupied);
    }
  });

  it('answers 400 to garbage and keeps serving', async () => {
    const { port } = await serve();

    const reply = await rawExchange(port, 'GARBAGE\r\n\r\n');
    const response = await request(port, '/after');

    expect(reply.startsWith('HTTP/1.1 400 Bad Request\r\n')).toBe(true);
    expect(response.body).toBe('ok /after');
  });

  it('keeps the connection after a handler error', async () => {
    const { port } = await serve();
    const client = await RawClient.connect(port);

    client.send('GET /fail HTTP/1.1\r\nHost: localhost\r\n\r\n');
    await client.waitForText('Internal Server Error');
    client.send('GET /next HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n');
    const transcript = await client.closed;

    expect(transcript.startsWith('HTTP/1.1 500 Internal Server Error\r\n')).toBe(true);
    expect(transcript).toContain('HTTP/1.1 200 OK\r\n');
    expect(transcript).toContain('ok /next');
  });

  it('finishes short requests and cuts long ones on graceful shutdown', async () => {
    let started = 0;
    const { server, port } = await serve(async (req) => {
      started += 1;
      return app(req);
    });

    const short = request(port, '/short?wait=100');
    const long = request(port, '/long?wait=1000');
    await waitFor(() => started === 2);
    const stopping = server.shutdown();

    const shortResponse = await short;
    expect(shortResponse.status).toBe(200);
    expect(shortResponse.body).toBe('ok /short');
    await expect(long).rejects.toThrow();
    await stopping;
    expect(server.getState()).toBe('stopped');
  });

  it('releases the port after immediate shutdown', async () => {
    const { server, port } = await serve();

    await server.shutdown('immediate');

    const rebound = await listenOn(port);
    await closeServer(rebound);
  });

  it('keeps serving capacity through a rolling reload', async () => {
    const { server, port } = await serve(app, { workers: 3 });
    const capacities: number[] = [];
    server.events.on(SupervisorEventNames.WORKER_EXITED, () => {
      capacities.push(server.status().supervisor.capacity);
    });

    await server.reload();

    expect(capacities).toHaveLength(3);
    expect(Math.min(...capacities)).toBeGreaterThanOrEqual(2);
    expect(server.status().supervisor.generation).toBe(1);
    await expect(request(port, '/reloaded')).resolves.toMatchObject({ status: 200, body: 'ok /reloaded' });
  });

  it('answers every request sent while a reload runs', async () => {
    const { server, port } = await serve(app, { workers: 3 });
    let reloading = true;
    const statuses: number[] = [];

    const client = async (id: number): Promise<void> => {
      let sent = 0;
      while (reloading || sent < 3) {
        const response = await request(port, `/client-${id}?wait=5`);
        statuses.push(response.status);
        sent++;
      }
    };
    const clients = [client(1), client(2), client(3), client(4)];

    await delay(20);
    await server.reload();
    reloading = false;
    await Promise.all(clients);

    expect(server.status().supervisor.generation).toBe(1);
    expect(statuses.length).toBeGreaterThanOrEqual(12);
    expect(statuses.every((status) => status === 200)).toBe(true);
  });
});
