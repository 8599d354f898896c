/**
 * Metrics Store
 *
 * SQLite file holding raw health samples and hourly rollups.
 *
 * Every operation opens its own connection and closes it when done, so the
 * broadcaster, rollup generator, retention reaper and HTTP readers never
 * share a handle. WAL journaling lets readers proceed while a writer holds
 * the lock; busy_timeout makes a second writer wait instead of failing.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { HealthHourly, HealthSample, KnownServer, MetricsFilter } from '../types.js';
import { StoreUnavailableError } from '../errors.js';
import { debug, log } from '../logger.js';

const BUSY_TIMEOUT_MS = 5_000;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS health_samples (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp      INTEGER NOT NULL,
    server_name    TEXT    NOT NULL,
    protocol_kind  TEXT    NOT NULL,
    is_healthy     INTEGER NOT NULL,
    latency_ms     REAL,
    CHECK ((is_healthy = 1) = (latency_ms IS NOT NULL))
  );
  CREATE INDEX IF NOT EXISTS ix_health_samples_server_timestamp ON health_samples(server_name, timestamp);
  CREATE INDEX IF NOT EXISTS ix_health_samples_timestamp ON health_samples(timestamp);

  CREATE TABLE IF NOT EXISTS health_hourly (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    hour_start         INTEGER NOT NULL,
    server_name        TEXT    NOT NULL,
    protocol_kind      TEXT    NOT NULL,
    sample_count       INTEGER NOT NULL,
    healthy_count      INTEGER NOT NULL,
    avg_latency_ms     REAL,
    min_latency_ms     REAL,
    max_latency_ms     REAL,
    p95_latency_ms     REAL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_health_hourly_server_hour ON health_hourly(server_name, hour_start);
  CREATE INDEX IF NOT EXISTS ix_health_hourly_hour_start ON health_hourly(hour_start);
`;

interface SampleRow {
  id: number;
  timestamp: number;
  server_name: string;
  protocol_kind: string;
  is_healthy: number;
  latency_ms: number | null;
}

interface HourlyRow {
  id: number;
  hour_start: number;
  server_name: string;
  protocol_kind: string;
  sample_count: number;
  healthy_count: number;
  avg_latency_ms: number | null;
  min_latency_ms: number | null;
  max_latency_ms: number | null;
  p95_latency_ms: number | null;
}

interface KnownServerRow {
  server_name: string;
  protocol_kind: string;
  first_sample: number;
  last_sample: number;
  total_samples: number;
}

interface RangeParams {
  from: number;
  to: number;
  server: string | null;
  protocol: string | null;
}

export interface DeletedCounts {
  samples: number;
  rollups: number;
}

export interface MetricsStore {
  initialize(): Promise<void>;
  appendSample(sample: HealthSample): Promise<void>;
  /** Writes all samples in one transaction; returns rows written */
  appendSamples(samples: readonly HealthSample[]): Promise<number>;
  /** Inclusive range, newest first; server and protocol filters ignore case */
  querySamples(filter: MetricsFilter, from: Date, to: Date): Promise<HealthSample[]>;
  /** Inclusive range on hour start, newest first */
  queryRollups(filter: MetricsFilter, from: Date, to: Date): Promise<HealthHourly[]>;
  /** Half-open range [from, to), oldest first; used for aggregation */
  samplesInRange(from: Date, to: Date): Promise<HealthSample[]>;
  /** Inserts rollups, skipping any (server, hour) that already has one */
  insertRollups(rows: readonly HealthHourly[]): Promise<number>;
  /** Deletes samples and rollups strictly older than cutoff */
  deleteOlderThan(cutoff: Date): Promise<DeletedCounts>;
  listKnownServers(): Promise<string[]>;
  summarizeServers(): Promise<KnownServer[]>;
  ping(): Promise<void>;
}

export function assertSampleInvariant(sample: HealthSample): void {
  if (sample.isHealthy !== (sample.latencyMillis !== null)) {
    throw new RangeError(
      `Sample for ${sample.serverName}: latency must be present iff healthy (isHealthy=${sample.isHealthy}, latency=${sample.latencyMillis})`,
    );
  }
}

function toSample(row: SampleRow): HealthSample {
  return {
    id: row.id,
    timestampUtc: new Date(row.timestamp),
    serverName: row.server_name,
    protocolKind: row.protocol_kind,
    isHealthy: row.is_healthy === 1,
    latencyMillis: row.latency_ms,
  };
}

function toHourly(row: HourlyRow): HealthHourly {
  return {
    id: row.id,
    hourStartUtc: new Date(row.hour_start),
    serverName: row.server_name,
    protocolKind: row.protocol_kind,
    sampleCount: row.sample_count,
    healthyCount: row.healthy_count,
    avgLatencyMillis: row.avg_latency_ms,
    minLatencyMillis: row.min_latency_ms,
    maxLatencyMillis: row.max_latency_ms,
    p95LatencyMillis: row.p95_latency_ms,
  };
}

function rangeParams(filter: MetricsFilter, from: Date, to: Date): RangeParams {
  return {
    from: from.getTime(),
    to: to.getTime(),
    server: filter.serverName || null,
    protocol: filter.protocolKind || null,
  };
}

export class SqliteMetricsStore implements MetricsStore {
  constructor(readonly path: string) {}

  async initialize(): Promise<void> {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      const db = new Database(this.path);
      try {
        db.pragma('journal_mode = WAL');
        db.exec(SCHEMA);
      } finally {
        db.close();
      }
    } catch (err) {
      throw new StoreUnavailableError(`Cannot initialize metrics database at ${this.path}`, { cause: err });
    }
    log(`[MetricsStore] Database initialized at ${this.path}`);
  }

  async appendSample(sample: HealthSample): Promise<void> {
    await this.appendSamples([sample]);
  }

  async appendSamples(samples: readonly HealthSample[]): Promise<number> {
    samples.forEach(assertSampleInvariant);
    if (samples.length === 0) return 0;

    return this.withConnection('appendSamples', db => {
      const insert = db.prepare<[number, string, string, number, number | null]>(
        `INSERT INTO health_samples (timestamp, server_name, protocol_kind, is_healthy, latency_ms)
         VALUES (?, ?, ?, ?, ?)`,
      );
      const insertAll = db.transaction((rows: readonly HealthSample[]) => {
        for (const s of rows) {
          insert.run(s.timestampUtc.getTime(), s.serverName, s.protocolKind, s.isHealthy ? 1 : 0, s.latencyMillis);
        }
      });
      insertAll(samples);
      debug(`[MetricsStore] Recorded ${samples.length} health samples`);
      return samples.length;
    });
  }

  async querySamples(filter: MetricsFilter, from: Date, to: Date): Promise<HealthSample[]> {
    return this.withConnection('querySamples', db => {
      const rows = db
        .prepare<RangeParams, SampleRow>(
          `SELECT id, timestamp, server_name, protocol_kind, is_healthy, latency_ms
             FROM health_samples
            WHERE timestamp >= @from AND timestamp <= @to
              AND (@server IS NULL OR server_name = @server COLLATE NOCASE)
              AND (@protocol IS NULL OR protocol_kind = @protocol COLLATE NOCASE)
            ORDER BY timestamp DESC, id DESC`,
        )
        .all(rangeParams(filter, from, to));
      return rows.map(toSample);
    });
  }

  async queryRollups(filter: MetricsFilter, from: Date, to: Date): Promise<HealthHourly[]> {
    return this.withConnection('queryRollups', db => {
      const rows = db
        .prepare<RangeParams, HourlyRow>(
          `SELECT id, hour_start, server_name, protocol_kind, sample_count, healthy_count,
                  avg_latency_ms, min_latency_ms, max_latency_ms, p95_latency_ms
             FROM health_hourly
            WHERE hour_start >= @from AND hour_start <= @to
              AND (@server IS NULL OR server_name = @server COLLATE NOCASE)
              AND (@protocol IS NULL OR protocol_kind = @protocol COLLATE NOCASE)
            ORDER BY hour_start DESC, server_name`,
        )
        .all(rangeParams(filter, from, to));
      return rows.map(toHourly);
    });
  }

  async samplesInRange(from: Date, to: Date): Promise<HealthSample[]> {
    return this.withConnection('samplesInRange', db => {
      const rows = db
        .prepare<[number, number], SampleRow>(
          `SELECT id, timestamp, server_name, protocol_kind, is_healthy, latency_ms
             FROM health_samples
            WHERE timestamp >= ? AND timestamp < ?
            ORDER BY timestamp, id`,
        )
        .all(from.getTime(), to.getTime());
      return rows.map(toSample);
    });
  }

  async insertRollups(rollups: readonly HealthHourly[]): Promise<number> {
    if (rollups.length === 0) return 0;

    return this.withConnection('insertRollups', db => {
      const insert = db.prepare<
        [number, string, string, number, number, number | null, number | null, number | null, number | null]
      >(
        `INSERT OR IGNORE INTO health_hourly
           (hour_start, server_name, protocol_kind, sample_count, healthy_count,
            avg_latency_ms, min_latency_ms, max_latency_ms, p95_latency_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const insertAll = db.transaction((rows: readonly HealthHourly[]) => {
        let inserted = 0;
        for (const r of rows) {
          const result = insert.run(
            r.hourStartUtc.getTime(),
            r.serverName,
            r.protocolKind,
            r.sampleCount,
            r.healthyCount,
            r.avgLatencyMillis,
            r.minLatencyMillis,
            r.maxLatencyMillis,
            r.p95LatencyMillis,
          );
          inserted += result.changes;
        }
        return inserted;
      });
      return insertAll(rollups);
    });
  }

  async deleteOlderThan(cutoff: Date): Promise<DeletedCounts> {
    return this.withConnection('deleteOlderThan', db => {
      const ts = cutoff.getTime();
      const deleteSamples = db.prepare<[number]>('DELETE FROM health_samples WHERE timestamp < ?');
      const deleteRollups = db.prepare<[number]>('DELETE FROM health_hourly WHERE hour_start < ?');
      const deleteAll = db.transaction((): DeletedCounts => ({
        samples: deleteSamples.run(ts).changes,
        rollups: deleteRollups.run(ts).changes,
      }));
      return deleteAll();
    });
  }

  async listKnownServers(): Promise<string[]> {
    return this.withConnection('listKnownServers', db => {
      const rows = db
        .prepare<[], { server_name: string }>(
          `SELECT server_name FROM health_samples
           UNION
           SELECT server_name FROM health_hourly
           ORDER BY server_name`,
        )
        .all();
      return rows.map(r => r.server_name);
    });
  }

  async summarizeServers(): Promise<KnownServer[]> {
    return this.withConnection('summarizeServers', db => {
      const rows = db
        .prepare<[], KnownServerRow>(
          `SELECT server_name, protocol_kind,
                  MIN(timestamp) AS first_sample,
                  MAX(timestamp) AS last_sample,
                  COUNT(*)       AS total_samples
             FROM health_samples
            GROUP BY server_name, protocol_kind
            ORDER BY server_name`,
        )
        .all();
      return rows.map(r => ({
        serverName: r.server_name,
        protocolKind: r.protocol_kind,
        firstSample: new Date(r.first_sample),
        lastSample: new Date(r.last_sample),
        totalSamples: r.total_samples,
      }));
    });
  }

  async ping(): Promise<void> {
    await this.withConnection('ping', db => db.prepare('SELECT 1').get());
  }

  private async withConnection<T>(operation: string, fn: (db: Database.Database) => T): Promise<T> {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.path, { fileMustExist: true });
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      return fn(db);
    } catch (err) {
      throw new StoreUnavailableError(`Metrics store ${operation} failed`, { cause: err });
    } finally {
      db?.close();
    }
  }
}
