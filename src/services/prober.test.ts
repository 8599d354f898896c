/**
 * Prober Tests
 *
 * Reachable and refused cases use a real listener on 127.0.0.1.
 * Timeouts and other socket errors use a fake connector.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import net from 'node:net';
import { EventEmitter } from 'node:events';
import { TcpProber, connectOnce, type Connector } from './prober.js';
import { ProbeRefusedError, ProbeTimeoutError } from '../errors.js';
import type { ServerDescriptor } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function makeServer(overrides: Partial<ServerDescriptor> = {}): ServerDescriptor {
  return {
    name: 'ftp',
    protocolKind: 'FTP',
    host: '127.0.0.1',
    port: 21,
    lifecycleState: 'Running',
    ready: true,
    podName: 'file-sim-file-simulator-ftp-abc12',
    serviceName: 'file-sim-file-simulator-ftp',
    managedBy: 'Helm',
    isDynamic: false,
    ...overrides,
  };
}

class FakeSocket extends EventEmitter {
  destroyed = false;

  destroy(): void {
    this.destroyed = true;
  }
}

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('listener has no TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

/** A port that was just released, so nothing is listening on it. */
async function closedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('connectOnce()', () => {
  it('rejects with ProbeTimeoutError and destroys the socket', async () => {
    const socket = new FakeSocket();
    const connector: Connector = () => socket;

    await expect(connectOnce('10.0.0.1', 21, 20, connector)).rejects.toBeInstanceOf(ProbeTimeoutError);
    expect(socket.destroyed).toBe(true);
  });

  it('maps ECONNREFUSED to ProbeRefusedError', async () => {
    const socket = new FakeSocket();
    const connector: Connector = () => {
      queueMicrotask(() => socket.emit('error', Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' })));
      return socket;
    };

    await expect(connectOnce('10.0.0.1', 21, 1000, connector)).rejects.toBeInstanceOf(ProbeRefusedError);
  });

  it('resolves with a non-negative integer latency on connect', async () => {
    const socket = new FakeSocket();
    const connector: Connector = () => {
      queueMicrotask(() => socket.emit('connect'));
      return socket;
    };

    const latency = await connectOnce('10.0.0.1', 21, 1000, connector);
    expect(Number.isInteger(latency)).toBe(true);
    expect(latency).toBeGreaterThanOrEqual(0);
    expect(socket.destroyed).toBe(true);
  });
});

describe('TcpProber', () => {
  let listener: net.Server;
  let openPort: number;

  beforeAll(async () => {
    listener = net.createServer(socket => socket.destroy());
    openPort = await listen(listener);
  });

  afterAll(async () => {
    await close(listener);
  });

  it('reports a listening port as reachable with latency', async () => {
    const [result] = await new TcpProber().probe([makeServer({ port: openPort })], 2000);

    expect(result.serverName).toBe('ftp');
    expect(result.isReachable).toBe(true);
    expect(result.latencyMillis).toBeGreaterThanOrEqual(0);
    expect(result.failure).toBeUndefined();
  });

  it('reports a closed port as refused', async () => {
    const port = await closedPort();
    const [result] = await new TcpProber().probe([makeServer({ port })], 2000);

    expect(result).toEqual({
      serverName: 'ftp',
      isReachable: false,
      failure: 'refused',
      message: 'TCP connection refused',
    });
  });

  it('reports a timeout without latency', async () => {
    const prober = new TcpProber(() => new FakeSocket());
    const [result] = await prober.probe([makeServer()], 20);

    expect(result).toEqual({
      serverName: 'ftp',
      isReachable: false,
      failure: 'timeout',
      message: 'TCP connection timed out',
    });
  });

  it('reports other socket errors with their message', async () => {
    const prober = new TcpProber(() => {
      const socket = new FakeSocket();
      queueMicrotask(() => socket.emit('error', Object.assign(new Error('connect EHOSTUNREACH 10.9.9.9:21'), { code: 'EHOSTUNREACH' })));
      return socket;
    });

    const [result] = await prober.probe([makeServer({ host: '10.9.9.9' })], 1000);

    expect(result.failure).toBe('error');
    expect(result.message).toBe('Health check error: connect EHOSTUNREACH 10.9.9.9:21');
  });

  it('probes in parallel and keeps input order', async () => {
    const prober = new TcpProber(host => {
      const socket = new FakeSocket();
      if (host !== 'slow') {
        setTimeout(() => socket.emit('connect'), 5);
      }
      return socket;
    });

    const servers = [
      makeServer({ name: 'slow-one', host: 'slow' }),
      makeServer({ name: 'fast-one', host: 'fast' }),
      makeServer({ name: 'fast-two', host: 'fast' }),
    ];

    const started = Date.now();
    const results = await prober.probe(servers, 200);
    const elapsed = Date.now() - started;

    expect(results.map(r => [r.serverName, r.isReachable])).toEqual([
      ['slow-one', false],
      ['fast-one', true],
      ['fast-two', true],
    ]);
    // bounded by one timeout, not the sum of them
    expect(elapsed).toBeLessThan(400);
  });

  it('returns an empty list for no servers', async () => {
    expect(await new TcpProber().probe([])).toEqual([]);
  });
});
