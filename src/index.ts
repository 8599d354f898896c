/**
 * Fleet Health Monitor
 *
 * Discovers protocol servers in Kubernetes, probes them every few seconds,
 * broadcasts the status snapshot, records samples to SQLite, and keeps
 * hourly rollups and retention in the background.
 *
 * Usage:
 *   npx tsx src/index.ts
 *
 * Data Flow:
 *   Kubernetes API → Discovery → Prober → Broadcaster → WebSocket / Redis
 *                                                    ↘ SQLite → HTTP API
 *   Rollup Generator (hourly) and Retention Reaper (hourly) → SQLite
 */

import { loadConfig } from './config.js';
import { createClusterReader } from './services/kube-client.js';
import { KubernetesDiscovery } from './services/discovery.js';
import { TcpProber } from './services/prober.js';
import { SqliteMetricsStore } from './services/metrics-store.js';
import { RedisSnapshotMirror, createRedisClient } from './services/redis-mirror.js';
import { SnapshotCache } from './tasks/snapshot-cache.js';
import { StatusBroadcaster } from './tasks/broadcaster.js';
import { RollupGenerator } from './tasks/rollup-generator.js';
import { RetentionReaper } from './tasks/retention-reaper.js';
import { PeriodicTask } from './tasks/periodic-task.js';
import { QueryService } from './api/query-service.js';
import { MetricsHub, StatusHub } from './api/status-hub.js';
import { buildServer } from './api/server.js';
import { describeError } from './errors.js';
import { log } from './logger.js';

const MINUTE_MS = 60_000;

async function main(): Promise<void> {
  const config = loadConfig();

  log('Fleet Health Monitor starting');
  log(`Namespace: ${config.kubernetes.namespace}, selector: ${config.kubernetes.labelSelector}`);
  log(`Probe timeout: ${config.probeTimeoutMs}ms, broadcast interval: ${config.broadcastIntervalMs}ms`);
  log(`Retention: ${config.retentionDays} days, database: ${config.dbPath}`);

  // Schema must exist before any task starts; an unwritable path is fatal
  const store = new SqliteMetricsStore(config.dbPath);
  await store.initialize();

  const discovery = new KubernetesDiscovery(createClusterReader(config.kubernetes), config.kubernetes);
  const cache = new SnapshotCache();
  const broadcaster = new StatusBroadcaster({
    discovery,
    prober: new TcpProber(),
    store,
    cache,
    probeTimeoutMs: config.probeTimeoutMs,
  });

  const statusHub = new StatusHub();
  const metricsHub = new MetricsHub();
  broadcaster.subscribe(statusHub);
  broadcaster.subscribe(metricsHub);

  const redis = config.redisUrl ? createRedisClient(config.redisUrl) : null;
  if (redis) {
    broadcaster.subscribe(new RedisSnapshotMirror(redis));
    log('[Monitor] Mirroring snapshots to Redis');
  }

  const rollups = new RollupGenerator(store, { lookbackHours: config.rollupLookbackHours });
  const reaper = new RetentionReaper(store, { retentionDays: config.retentionDays });

  const tasks = [
    new PeriodicTask(
      'Broadcaster',
      { intervalMs: config.broadcastIntervalMs, initialDelayMs: config.broadcastInitialDelayMs },
      async () => {
        await broadcaster.runCycle();
      },
    ),
    new PeriodicTask(
      'Rollup',
      {
        intervalMs: config.rollupIntervalMinutes * MINUTE_MS,
        initialDelayMs: config.rollupInitialDelayMinutes * MINUTE_MS,
      },
      async () => {
        await rollups.run();
      },
    ),
    new PeriodicTask(
      'Retention',
      {
        intervalMs: config.retentionIntervalMinutes * MINUTE_MS,
        initialDelayMs: config.retentionInitialDelayMinutes * MINUTE_MS,
      },
      async () => {
        await reaper.run();
      },
    ),
  ];

  const app = await buildServer({
    queries: new QueryService(broadcaster, discovery, store),
    statusHub,
    metricsHub,
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log('[Monitor] Shutting down...');
    // In-flight cycles finish their current phase before stop() resolves
    await Promise.all(tasks.map(t => t.stop()));
    await app.close();
    redis?.disconnect();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch(err => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  for (const task of tasks) task.start();

  await app.listen({ host: config.httpHost, port: config.httpPort });
  log(`[Monitor] HTTP API listening on ${config.httpHost}:${config.httpPort}`);
  log('[Monitor] Push channels available at /ws/status and /ws/metrics');
}

main().catch(err => {
  console.error('Fatal error:', describeError(err));
  process.exit(1);
});
