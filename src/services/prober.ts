/**
 * TCP reachability prober.
 *
 * Latency is the time to establish a TCP connection; no protocol handshake
 * is attempted. Every probe settles to a ProbeResult, never a rejection.
 */

import net from 'node:net';
import { performance } from 'node:perf_hooks';
import type { ProbeResult, ServerDescriptor } from '../types.js';
import { ProbeRefusedError, ProbeTimeoutError, describeError } from '../errors.js';
import { debug, log } from '../logger.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/** The subset of net.Socket a probe touches */
export interface ProbeSocket {
  once(event: 'connect', listener: () => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  destroy(): void;
}

export type Connector = (host: string, port: number) => ProbeSocket;

const defaultConnector: Connector = (host, port) => net.createConnection({ host, port });

export interface Prober {
  probe(servers: readonly ServerDescriptor[], timeoutMs?: number): Promise<ProbeResult[]>;
}

/**
 * Open one connection and resolve with the connect latency in ms.
 * Rejects with ProbeTimeoutError, ProbeRefusedError or the socket error.
 */
export function connectOnce(
  host: string,
  port: number,
  timeoutMs: number,
  connector: Connector = defaultConnector,
): Promise<number> {
  return new Promise((resolve, reject) => {
    const started = performance.now();
    let settled = false;

    const socket = connector(host, port);

    const finish = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      outcome();
    };

    const timer = setTimeout(() => {
      finish(() => reject(new ProbeTimeoutError(host, port, timeoutMs)));
    }, timeoutMs);

    socket.once('connect', () => {
      finish(() => resolve(Math.round(performance.now() - started)));
    });

    socket.once('error', (err: NodeJS.ErrnoException) => {
      finish(() => reject(err.code === 'ECONNREFUSED' ? new ProbeRefusedError(host, port) : err));
    });
  });
}

export class TcpProber implements Prober {
  constructor(private readonly connector: Connector = defaultConnector) {}

  async probe(
    servers: readonly ServerDescriptor[],
    timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS,
  ): Promise<ProbeResult[]> {
    const results = await Promise.all(servers.map(s => this.probeOne(s, timeoutMs)));

    const reachable = results.filter(r => r.isReachable).length;
    log(`[Prober] Probe complete: ${reachable}/${results.length} reachable`);

    return results;
  }

  private async probeOne(server: ServerDescriptor, timeoutMs: number): Promise<ProbeResult> {
    try {
      const latencyMillis = await connectOnce(server.host, server.port, timeoutMs, this.connector);
      return { serverName: server.name, isReachable: true, latencyMillis };
    } catch (err) {
      debug(`[Prober] ${server.name} (${server.host}:${server.port}) unreachable: ${describeError(err)}`);

      if (err instanceof ProbeTimeoutError) {
        return { serverName: server.name, isReachable: false, failure: 'timeout', message: 'TCP connection timed out' };
      }
      if (err instanceof ProbeRefusedError) {
        return { serverName: server.name, isReachable: false, failure: 'refused', message: 'TCP connection refused' };
      }
      return {
        serverName: server.name,
        isReachable: false,
        failure: 'error',
        message: `Health check error: ${describeError(err)}`,
      };
    }
  }
}
