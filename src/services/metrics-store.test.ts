/**
 * Metrics Store Tests
 *
 * Each test gets its own SQLite file under the OS temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SqliteMetricsStore } from './metrics-store.js';
import { StoreUnavailableError } from '../errors.js';
import type { HealthSample } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const T0 = new Date('2026-03-10T08:00:00.000Z').getTime();

function makeSample(overrides: Partial<HealthSample> = {}): HealthSample {
  return {
    timestampUtc: new Date(T0),
    serverName: 'ftp',
    protocolKind: 'FTP',
    isHealthy: true,
    latencyMillis: 42,
    ...overrides,
  };
}

describe('SqliteMetricsStore', () => {
  let dir: string;
  let store: SqliteMetricsStore;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-store-test-'));
    store = new SqliteMetricsStore(join(dir, 'nested', 'metrics.db'));
    await store.initialize();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('initialize()', () => {
    it('is idempotent', async () => {
      await store.appendSample(makeSample());
      await store.initialize();

      const rows = await store.querySamples({}, new Date(T0), new Date(T0));
      expect(rows).toHaveLength(1);
    });

    it('raises StoreUnavailableError when the path cannot be created', async () => {
      const blocker = join(dir, 'not-a-dir');
      writeFileSync(blocker, 'x');

      const broken = new SqliteMetricsStore(join(blocker, 'sub', 'metrics.db'));
      await expect(broken.initialize()).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });

  describe('appendSample() / querySamples()', () => {
    it('round-trips a sample at its exact timestamp', async () => {
      const sample = makeSample({ timestampUtc: new Date(T0 + 123) });
      await store.appendSample(sample);

      const rows = await store.querySamples({ serverName: 'ftp' }, new Date(T0 + 123), new Date(T0 + 123));

      expect(rows).toEqual([{ ...sample, id: expect.any(Number) }]);
    });

    it('stores an unhealthy sample with null latency', async () => {
      await store.appendSample(makeSample({ isHealthy: false, latencyMillis: null }));

      const [row] = await store.querySamples({}, new Date(T0), new Date(T0));
      expect(row.isHealthy).toBe(false);
      expect(row.latencyMillis).toBeNull();
    });

    it('rejects a healthy sample without latency', async () => {
      await expect(store.appendSample(makeSample({ latencyMillis: null }))).rejects.toBeInstanceOf(RangeError);
    });

    it('rejects an unhealthy sample carrying latency', async () => {
      await expect(
        store.appendSamples([makeSample(), makeSample({ isHealthy: false, latencyMillis: 5 })]),
      ).rejects.toBeInstanceOf(RangeError);

      // nothing from the rejected batch was written
      expect(await store.querySamples({}, new Date(T0), new Date(T0))).toEqual([]);
    });

    it('returns 0 for an empty batch', async () => {
      expect(await store.appendSamples([])).toBe(0);
    });

    it('returns samples newest first within the inclusive range', async () => {
      await store.appendSamples([
        makeSample({ timestampUtc: new Date(T0 - 1) }),
        makeSample({ timestampUtc: new Date(T0), latencyMillis: 1 }),
        makeSample({ timestampUtc: new Date(T0 + 5000), latencyMillis: 2 }),
        makeSample({ timestampUtc: new Date(T0 + 10_000), latencyMillis: 3 }),
        makeSample({ timestampUtc: new Date(T0 + 10_001) }),
      ]);

      const rows = await store.querySamples({}, new Date(T0), new Date(T0 + 10_000));
      expect(rows.map(r => r.latencyMillis)).toEqual([3, 2, 1]);
    });

    it('filters by server name and protocol (protocol case-insensitive)', async () => {
      await store.appendSamples([
        makeSample({ serverName: 'ftp', protocolKind: 'FTP' }),
        makeSample({ serverName: 'sftp', protocolKind: 'SFTP' }),
        makeSample({ serverName: 'nas-input-1', protocolKind: 'NFS' }),
      ]);

      const byServer = await store.querySamples({ serverName: 'sftp' }, new Date(T0), new Date(T0));
      expect(byServer.map(r => r.serverName)).toEqual(['sftp']);

      const byProtocol = await store.querySamples({ protocolKind: 'nfs' }, new Date(T0), new Date(T0));
      expect(byProtocol.map(r => r.serverName)).toEqual(['nas-input-1']);
    });
  });

  describe('server name filter', () => {
    it('matches server names case-insensitively for samples and rollups', async () => {
      await store.appendSamples([
        makeSample({ serverName: 'nas-input-1', protocolKind: 'NFS' }),
        makeSample({ serverName: 'ftp' }),
      ]);
      await store.insertRollups([
        {
          hourStartUtc: new Date(T0),
          serverName: 'nas-input-1',
          protocolKind: 'NFS',
          sampleCount: 1,
          healthyCount: 1,
          avgLatencyMillis: 42,
          minLatencyMillis: 42,
          maxLatencyMillis: 42,
          p95LatencyMillis: 42,
        },
      ]);

      const samples = await store.querySamples({ serverName: 'NAS-Input-1' }, new Date(T0), new Date(T0));
      expect(samples.map(r => r.serverName)).toEqual(['nas-input-1']);

      const rollups = await store.queryRollups({ serverName: 'NAS-INPUT-1' }, new Date(T0), new Date(T0));
      expect(rollups.map(r => r.serverName)).toEqual(['nas-input-1']);
    });
  });

  describe('samplesInRange()', () => {
    it('is half-open and oldest first', async () => {
      await store.appendSamples([
        makeSample({ timestampUtc: new Date(T0 + 2), latencyMillis: 2 }),
        makeSample({ timestampUtc: new Date(T0), latencyMillis: 1 }),
        makeSample({ timestampUtc: new Date(T0 + 3), latencyMillis: 3 }),
      ]);

      const rows = await store.samplesInRange(new Date(T0), new Date(T0 + 3));
      expect(rows.map(r => r.latencyMillis)).toEqual([1, 2]);
    });
  });

  describe('insertRollups()', () => {
    it('skips a (server, hour) that already exists', async () => {
      const rollup = {
        hourStartUtc: new Date(T0),
        serverName: 'ftp',
        protocolKind: 'FTP',
        sampleCount: 10,
        healthyCount: 9,
        avgLatencyMillis: 5,
        minLatencyMillis: 1,
        maxLatencyMillis: 9,
        p95LatencyMillis: 8.5,
      };

      expect(await store.insertRollups([rollup])).toBe(1);
      expect(await store.insertRollups([{ ...rollup, sampleCount: 99 }])).toBe(0);

      const rows = await store.queryRollups({}, new Date(T0), new Date(T0));
      expect(rows).toHaveLength(1);
      expect(rows[0].sampleCount).toBe(10);
      expect(rows[0].p95LatencyMillis).toBe(8.5);
    });
  });

  describe('listKnownServers() / summarizeServers()', () => {
    it('lists distinct names from samples and rollups, sorted', async () => {
      await store.appendSamples([
        makeSample({ serverName: 'sftp', protocolKind: 'SFTP' }),
        makeSample({ serverName: 'ftp' }),
        makeSample({ serverName: 'ftp', timestampUtc: new Date(T0 + 1000) }),
      ]);
      await store.insertRollups([
        {
          hourStartUtc: new Date(T0 - 3_600_000),
          serverName: 'http',
          protocolKind: 'HTTP',
          sampleCount: 1,
          healthyCount: 0,
          avgLatencyMillis: null,
          minLatencyMillis: null,
          maxLatencyMillis: null,
          p95LatencyMillis: null,
        },
      ]);

      expect(await store.listKnownServers()).toEqual(['ftp', 'http', 'sftp']);
    });

    it('summarizes sample range and count per server', async () => {
      await store.appendSamples([
        makeSample({ timestampUtc: new Date(T0) }),
        makeSample({ timestampUtc: new Date(T0 + 5000) }),
        makeSample({ serverName: 'smb', protocolKind: 'SMB', isHealthy: false, latencyMillis: null }),
      ]);

      expect(await store.summarizeServers()).toEqual([
        { serverName: 'ftp', protocolKind: 'FTP', firstSample: new Date(T0), lastSample: new Date(T0 + 5000), totalSamples: 2 },
        { serverName: 'smb', protocolKind: 'SMB', firstSample: new Date(T0), lastSample: new Date(T0), totalSamples: 1 },
      ]);
    });
  });

  describe('operations before initialize()', () => {
    it('raise StoreUnavailableError when the database file is missing', async () => {
      const missing = new SqliteMetricsStore(join(dir, 'missing.db'));
      await expect(missing.ping()).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(missing.querySamples({}, new Date(T0), new Date(T0))).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });

  describe('concurrent access', () => {
    it('serves 50 concurrent readers while a writer appends', async () => {
      await store.appendSamples(
        Array.from({ length: 20 }, (_, i) => makeSample({ timestampUtc: new Date(T0 + i * 1000) })),
      );

      const writes = Array.from({ length: 5 }, (_, i) =>
        store.appendSamples([
          makeSample({ serverName: 'sftp', timestampUtc: new Date(T0 + 100_000 + i), isHealthy: false, latencyMillis: null }),
        ]),
      );
      const reads = Array.from({ length: 50 }, () =>
        store.querySamples({ serverName: 'ftp' }, new Date(T0), new Date(T0 + 19_000)),
      );

      const [written, results] = await Promise.all([Promise.all(writes), Promise.all(reads)]);

      expect(written).toEqual([1, 1, 1, 1, 1]);
      for (const rows of results) {
        expect(rows).toHaveLength(20);
        expect(rows.every(r => r.isHealthy === (r.latencyMillis !== null))).toBe(true);
      }
    });
  });
});
