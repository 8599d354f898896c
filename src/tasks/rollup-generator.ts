/**
 * Hourly Rollup Generator
 *
 * Aggregates completed hours of raw samples into one health_hourly row per
 * server present in that hour. Each run walks the last `lookbackHours`
 * completed hours so hours missed while the process was down get filled in.
 *
 * Re-runs are skip-if-exists: a (server, hour) that already has a rollup is
 * left untouched. Completed hours receive no new samples, so the first
 * rollup written for an hour is final.
 */

import type { HealthHourly, HealthSample } from '../types.js';
import { HOUR_MS } from '../types.js';
import type { MetricsStore } from '../services/metrics-store.js';
import { AggregationSkippedError, describeError } from '../errors.js';
import { debug, log } from '../logger.js';
import { latencyStats } from './percentile.js';

export interface RollupGeneratorOptions {
  lookbackHours: number;
  now?: () => Date;
}

export interface RollupRunResult {
  hoursScanned: number;
  rollupsCreated: number;
}

export function floorToHour(date: Date): Date {
  return new Date(Math.floor(date.getTime() / HOUR_MS) * HOUR_MS);
}

/**
 * Build rollups for one hour from that hour's samples.
 * Servers are taken from the samples themselves, not from a fixed list.
 */
export function aggregateHour(hourStart: Date, samples: readonly HealthSample[]): HealthHourly[] {
  const byServer = new Map<string, HealthSample[]>();
  for (const s of samples) {
    const group = byServer.get(s.serverName);
    if (group) group.push(s);
    else byServer.set(s.serverName, [s]);
  }

  const rollups: HealthHourly[] = [];
  for (const [serverName, group] of byServer) {
    const healthy = group.filter(s => s.isHealthy);
    const latencies = healthy.flatMap(s => (s.latencyMillis === null ? [] : [s.latencyMillis]));
    const stats = latencyStats(latencies);

    rollups.push({
      hourStartUtc: hourStart,
      serverName,
      // protocol as of the hour's last sample
      protocolKind: group[group.length - 1].protocolKind,
      sampleCount: group.length,
      healthyCount: healthy.length,
      avgLatencyMillis: stats?.avg ?? null,
      minLatencyMillis: stats?.min ?? null,
      maxLatencyMillis: stats?.max ?? null,
      p95LatencyMillis: stats?.p95 ?? null,
    });
  }

  return rollups;
}

export class RollupGenerator {
  private readonly now: () => Date;

  constructor(
    private readonly store: MetricsStore,
    private readonly options: RollupGeneratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Roll up every completed hour in the lookback window. */
  async run(): Promise<RollupRunResult> {
    const currentHourStart = floorToHour(this.now()).getTime();
    const hours = Math.max(1, this.options.lookbackHours);
    const failures: string[] = [];
    let rollupsCreated = 0;

    for (let h = hours; h >= 1; h--) {
      const hourStart = new Date(currentHourStart - h * HOUR_MS);
      try {
        rollupsCreated += await this.generateForHour(hourStart);
      } catch (err) {
        failures.push(`${hourStart.toISOString()}: ${describeError(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new AggregationSkippedError(
        `Rollup skipped for ${failures.length} hour(s): ${failures.join('; ')}`,
      );
    }

    return { hoursScanned: hours, rollupsCreated };
  }

  /** Roll up one hour; returns the number of new rows. */
  async generateForHour(hourStart: Date): Promise<number> {
    const hourEnd = new Date(hourStart.getTime() + HOUR_MS);
    const samples = await this.store.samplesInRange(hourStart, hourEnd);

    if (samples.length === 0) {
      debug(`[Rollup] No samples found for hour ${hourStart.toISOString()}`);
      return 0;
    }

    const rollups = aggregateHour(hourStart, samples);
    const created = await this.store.insertRollups(rollups);

    if (created > 0) {
      log(`[Rollup] Created ${created} hourly rollups for ${hourStart.toISOString()}`);
    } else {
      debug(`[Rollup] Rollups already exist for ${hourStart.toISOString()}`);
    }
    return created;
  }
}
