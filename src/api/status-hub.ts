/**
 * Push channels for broadcaster output.
 *
 * Every connected WebSocket client gets one message per broadcaster cycle:
 * /ws/status carries the whole snapshot as ServerStatusUpdate, /ws/metrics
 * carries the cycle's samples as MetricsSample. Nothing is replayed: a
 * client that reconnects reads GET /api/status for the current picture.
 */

import type { StatusSnapshot } from '../types.js';
import type { SnapshotSubscriber } from '../tasks/broadcaster.js';
import { samplesFromSnapshot } from '../tasks/broadcaster.js';
import { debug, warn } from '../logger.js';
import { describeError } from '../errors.js';

const OPEN = 1;

/** A client with this much unsent data is treated as stalled and dropped */
export const MAX_BUFFERED_BYTES = 1024 * 1024;

/** The subset of a ws WebSocket the hubs use */
export interface PushClient {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  terminate(): void;
}

export interface StatusMessage {
  event: 'ServerStatusUpdate';
  data: StatusSnapshot;
}

export interface MetricsSamplePoint {
  serverName: string;
  protocolKind: string;
  isHealthy: boolean;
  latencyMillis: number | null;
}

export interface MetricsSampleMessage {
  event: 'MetricsSample';
  data: {
    timestamp: Date;
    samples: MetricsSamplePoint[];
  };
}

export function encodeStatusMessage(snapshot: StatusSnapshot): string {
  const message: StatusMessage = { event: 'ServerStatusUpdate', data: snapshot };
  return JSON.stringify(message);
}

export function encodeMetricsMessage(snapshot: StatusSnapshot): string {
  const message: MetricsSampleMessage = {
    event: 'MetricsSample',
    data: {
      timestamp: snapshot.takenAt,
      samples: samplesFromSnapshot(snapshot).map(s => ({
        serverName: s.serverName,
        protocolKind: s.protocolKind,
        isHealthy: s.isHealthy,
        latencyMillis: s.latencyMillis,
      })),
    },
  };
  return JSON.stringify(message);
}

/** Fans one encoded message per snapshot out to its connected clients. */
export class PushHub implements SnapshotSubscriber {
  private readonly clients = new Set<PushClient>();

  constructor(
    readonly name: string,
    private readonly encode: (snapshot: StatusSnapshot) => string,
  ) {}

  get clientCount(): number {
    return this.clients.size;
  }

  add(client: PushClient): void {
    this.clients.add(client);
    debug(`[${this.name}] Client connected (${this.clients.size} connected)`);
  }

  remove(client: PushClient): void {
    if (this.clients.delete(client)) {
      debug(`[${this.name}] Client disconnected (${this.clients.size} connected)`);
    }
  }

  publish(snapshot: StatusSnapshot): void {
    if (this.clients.size === 0) return;

    const payload = this.encode(snapshot);
    for (const client of [...this.clients]) {
      if (client.readyState !== OPEN) {
        this.clients.delete(client);
        continue;
      }
      if (client.bufferedAmount > MAX_BUFFERED_BYTES) {
        warn(`[${this.name}] Dropping stalled client (${client.bufferedAmount} bytes unsent)`);
        this.drop(client);
        continue;
      }
      try {
        client.send(payload);
      } catch (err) {
        warn(`[${this.name}] Dropping client after send failure: ${describeError(err)}`);
        this.drop(client);
      }
    }
  }

  private drop(client: PushClient): void {
    this.clients.delete(client);
    client.terminate();
  }
}

export class StatusHub extends PushHub {
  constructor() {
    super('StatusHub', encodeStatusMessage);
  }
}

export class MetricsHub extends PushHub {
  constructor() {
    super('MetricsHub', encodeMetricsMessage);
  }
}
