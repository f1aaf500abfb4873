/**
 * HTTP prober tests against an in-process server
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { FetchHttpProber } from '../../../../src/infrastructure/http/prober';

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.closeAllConnections();
    server.close(() => resolve());
  });
}

describe('FetchHttpProber', () => {
  const prober = new FetchHttpProber();
  let server: Server;
  let port: number;

  beforeAll(async () => {
    server = createServer((request, response) => {
      if (request.url === '/stall') return;
      response.statusCode = request.url === '/health' ? 200 : 404;
      response.end('ok');
    });
    port = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('should accept a healthy answer', async () => {
    expect(await prober.probe(`http://127.0.0.1:${port}/health`, { timeoutMs: 2000 })).toBe(true);
  });

  it('should accept any status code', async () => {
    expect(await prober.probe(`http://127.0.0.1:${port}/api/health`, { timeoutMs: 2000 })).toBe(
      true,
    );
  });

  it('should give up on a server that never answers', async () => {
    expect(await prober.probe(`http://127.0.0.1:${port}/stall`, { timeoutMs: 100 })).toBe(false);
  });

  it('should report a refused connection', async () => {
    const closed = createServer();
    const unused = await listen(closed);
    await close(closed);

    expect(await prober.probe(`http://127.0.0.1:${unused}/health`, { timeoutMs: 2000 })).toBe(false);
  });
});
