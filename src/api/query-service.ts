/**
 * Read-only façade over the snapshot cache, discovery and metrics store.
 */

import type {
  HealthHourly,
  HealthSample,
  KnownServer,
  MetricsFilter,
  ServerDescriptor,
  StatusSnapshot,
} from '../types.js';
import { DAY_MS } from '../types.js';
import type { FleetDiscovery } from '../services/discovery.js';
import type { MetricsStore } from '../services/metrics-store.js';

export type Resolution = 'raw' | 'hourly' | 'auto';

/** Raw sample queries longer than this must use hourly rollups */
export const MAX_RAW_RANGE_MS = 7 * DAY_MS;
/** `auto` resolution switches to hourly above this range */
export const AUTO_RAW_THRESHOLD_MS = DAY_MS;

export interface RangeQuery extends MetricsFilter {
  from: Date;
  to: Date;
}

export interface HourlyView extends HealthHourly {
  uptimePercent: number;
}

export type MetricsQueryResult =
  | { resolution: 'raw'; rows: HealthSample[] }
  | { resolution: 'hourly'; rows: HourlyView[] };

export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export function uptimePercent(sampleCount: number, healthyCount: number): number {
  if (sampleCount === 0) return 0;
  return Math.round((healthyCount / sampleCount) * 1000) / 10;
}

export function validateRange(query: RangeQuery, maxRangeMs?: number): void {
  if (Number.isNaN(query.from.getTime()) || Number.isNaN(query.to.getTime())) {
    throw new InvalidRangeError('from and to must be valid ISO 8601 timestamps');
  }
  if (query.to.getTime() <= query.from.getTime()) {
    throw new InvalidRangeError('to must be after from');
  }
  if (maxRangeMs !== undefined && query.to.getTime() - query.from.getTime() > maxRangeMs) {
    throw new InvalidRangeError(
      `Raw sample queries limited to ${maxRangeMs / DAY_MS} days. Use /api/metrics/hourly for longer ranges.`,
    );
  }
}

export interface StatusSource {
  getLatest(): StatusSnapshot | null;
}

export class QueryService {
  constructor(
    private readonly status: StatusSource,
    private readonly discovery: FleetDiscovery,
    private readonly store: MetricsStore,
  ) {}

  /** null until the first broadcast cycle completes */
  getStatus(): StatusSnapshot | null {
    return this.status.getLatest();
  }

  listServers(): Promise<ServerDescriptor[]> {
    return this.discovery.discover();
  }

  getServer(name: string): Promise<ServerDescriptor | null> {
    return this.discovery.getServer(name);
  }

  async querySamples(query: RangeQuery): Promise<HealthSample[]> {
    validateRange(query, MAX_RAW_RANGE_MS);
    return this.store.querySamples(query, query.from, query.to);
  }

  async queryHourly(query: RangeQuery): Promise<HourlyView[]> {
    validateRange(query);
    const rows = await this.store.queryRollups(query, query.from, query.to);
    return rows.map(r => ({ ...r, uptimePercent: uptimePercent(r.sampleCount, r.healthyCount) }));
  }

  /** Picks the store query for the requested resolution. */
  async query(query: RangeQuery, resolution: Resolution): Promise<MetricsQueryResult> {
    validateRange(query);
    const span = query.to.getTime() - query.from.getTime();
    const effective = resolution === 'auto' ? (span <= AUTO_RAW_THRESHOLD_MS ? 'raw' : 'hourly') : resolution;

    if (effective === 'raw') {
      return { resolution: 'raw', rows: await this.querySamples(query) };
    }
    return { resolution: 'hourly', rows: await this.queryHourly(query) };
  }

  listKnownServers(): Promise<string[]> {
    return this.store.listKnownServers();
  }

  summarizeServers(): Promise<KnownServer[]> {
    return this.store.summarizeServers();
  }

  checkStore(): Promise<void> {
    return this.store.ping();
  }
}
