/**
 * Status Broadcaster
 *
 * One cycle: discover → probe → build snapshot → swap cache → push to
 * subscribers → record one sample per server.
 *
 * Discovery failure skips the cycle and keeps the previous snapshot.
 * A subscriber or store failure is logged; the cycle still completes.
 */

import type { HealthSample, ProbeResult, ServerDescriptor, ServerStatus, StatusSnapshot } from '../types.js';
import type { FleetDiscovery } from '../services/discovery.js';
import type { Prober } from '../services/prober.js';
import type { MetricsStore } from '../services/metrics-store.js';
import { buildSnapshot, type SnapshotCache } from './snapshot-cache.js';
import { describeError } from '../errors.js';
import { debug, log, warn } from '../logger.js';

export type BroadcastPhase = 'idle' | 'collecting' | 'publishing';

/** Receives every published snapshot (WebSocket hub, Redis mirror, ...) */
export interface SnapshotSubscriber {
  readonly name: string;
  publish(snapshot: StatusSnapshot): void | Promise<void>;
}

export interface BroadcasterDeps {
  discovery: FleetDiscovery;
  prober: Prober;
  store: MetricsStore;
  cache: SnapshotCache;
  probeTimeoutMs: number;
  now?: () => Date;
}

/**
 * Healthy = pod Running and Ready AND the TCP probe connected.
 * Latency is only carried for healthy servers.
 */
export function deriveStatus(server: ServerDescriptor, probe: ProbeResult | undefined): ServerStatus {
  const base = {
    name: server.name,
    protocolKind: server.protocolKind,
    lifecycleState: server.lifecycleState,
  };

  if (server.lifecycleState !== 'Running' || !server.ready) {
    return { ...base, isHealthy: false, message: `Pod not ready: ${server.lifecycleState}` };
  }

  if (!probe || !probe.isReachable || probe.latencyMillis === undefined) {
    return { ...base, isHealthy: false, message: probe?.message ?? 'TCP connection failed' };
  }

  return { ...base, isHealthy: true, latencyMillis: probe.latencyMillis };
}

export function samplesFromSnapshot(snapshot: StatusSnapshot): HealthSample[] {
  return snapshot.servers.map(s => ({
    timestampUtc: snapshot.takenAt,
    serverName: s.name,
    protocolKind: s.protocolKind,
    isHealthy: s.isHealthy,
    latencyMillis: s.isHealthy ? s.latencyMillis ?? null : null,
  }));
}

export class StatusBroadcaster {
  private phase: BroadcastPhase = 'idle';
  private readonly subscribers = new Set<SnapshotSubscriber>();
  private readonly now: () => Date;

  constructor(private readonly deps: BroadcasterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get currentPhase(): BroadcastPhase {
    return this.phase;
  }

  /** Returns an unsubscribe function. */
  subscribe(subscriber: SnapshotSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getLatest(): StatusSnapshot | null {
    return this.deps.cache.getLatest();
  }

  /**
   * Run one full cycle. Resolves with the published snapshot, or null when
   * discovery failed and the cycle was skipped.
   */
  async runCycle(): Promise<StatusSnapshot | null> {
    try {
      this.phase = 'collecting';
      const collected = await this.collect();
      if (!collected) return null;

      this.phase = 'publishing';
      const snapshot = buildSnapshot(collected, this.now());
      this.deps.cache.replace(snapshot);

      await this.notifySubscribers(snapshot);
      debug(`[Broadcaster] Broadcast status: ${snapshot.healthyServers}/${snapshot.totalServers} healthy`);

      await this.recordSamples(snapshot);
      return snapshot;
    } finally {
      this.phase = 'idle';
    }
  }

  private async collect(): Promise<ServerStatus[] | null> {
    let servers: ServerDescriptor[];
    try {
      servers = await this.deps.discovery.discover();
    } catch (err) {
      warn(`[Broadcaster] Discovery failed, keeping previous snapshot: ${describeError(err)}`);
      return null;
    }

    if (servers.length === 0) {
      warn('[Broadcaster] No servers discovered - check the label selector and RBAC');
    }

    const probes = await this.deps.prober.probe(servers, this.deps.probeTimeoutMs);
    // probe() keeps input order
    return servers.map((server, i) => deriveStatus(server, probes[i]));
  }

  private async notifySubscribers(snapshot: StatusSnapshot): Promise<void> {
    const subscribers = [...this.subscribers];
    const results = await Promise.allSettled(subscribers.map(async s => s.publish(snapshot)));

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        warn(`[Broadcaster] Subscriber ${subscribers[i].name} failed: ${describeError(result.reason)}`);
      }
    });
  }

  private async recordSamples(snapshot: StatusSnapshot): Promise<void> {
    try {
      await this.deps.store.appendSamples(samplesFromSnapshot(snapshot));
    } catch (err) {
      log(`[Broadcaster] Failed to record health samples: ${describeError(err)}`);
    }
  }
}
