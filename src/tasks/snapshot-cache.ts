import type { ServerStatus, StatusSnapshot } from '../types.js';

/**
 * Holds the one current StatusSnapshot.
 *
 * The snapshot is frozen and replaced by reference, so a reader holding
 * the previous one keeps a complete view while the next is published.
 */
export class SnapshotCache {
  private current: StatusSnapshot | null = null;

  getLatest(): StatusSnapshot | null {
    return this.current;
  }

  replace(snapshot: StatusSnapshot): void {
    this.current = snapshot;
  }
}

export function buildSnapshot(statuses: readonly ServerStatus[], takenAt: Date): StatusSnapshot {
  const servers = Object.freeze(statuses.map(s => Object.freeze({ ...s })));
  return Object.freeze({
    servers,
    takenAt,
    totalServers: servers.length,
    healthyServers: servers.filter(s => s.isHealthy).length,
  });
}
