/**
 * Fleet monitor configuration.
 *
 * All values can be overridden via environment variables.
 */

export interface KubernetesConfig {
  /** Use the pod's service account instead of a kubeconfig file */
  inCluster: boolean;
  namespace: string;
  /** Label selector identifying fleet pods and services */
  labelSelector: string;
  /** When set, servers are addressed as externalHost:nodePort */
  externalHost?: string;
  /** Pods whose name contains this are the monitor itself */
  selfName: string;
}

export interface Config {
  kubernetes: KubernetesConfig;

  /** Per-probe TCP connect timeout */
  probeTimeoutMs: number;

  /** Status broadcast loop */
  broadcastIntervalMs: number;
  broadcastInitialDelayMs: number;

  /** Hourly rollups */
  rollupIntervalMinutes: number;
  rollupInitialDelayMinutes: number;
  rollupLookbackHours: number;

  /** Retention */
  retentionDays: number;
  retentionIntervalMinutes: number;
  retentionInitialDelayMinutes: number;

  /** SQLite file holding samples and rollups */
  dbPath: string;

  /** HTTP + WebSocket query surface */
  httpHost: string;
  httpPort: number;

  /** Optional Redis mirror of the latest snapshot */
  redisUrl?: string;
}

export function loadConfig(): Config {
  return {
    kubernetes: {
      inCluster: bool(process.env.K8S_IN_CLUSTER, true),
      namespace: process.env.K8S_NAMESPACE || 'file-simulator',
      labelSelector: process.env.FLEET_LABEL_SELECTOR || 'app.kubernetes.io/name=file-simulator',
      externalHost: process.env.K8S_EXTERNAL_HOST || undefined,
      selfName: process.env.MONITOR_SELF_NAME || 'control-api',
    },

    probeTimeoutMs: int(process.env.PROBE_TIMEOUT_MS, 5_000),

    broadcastIntervalMs: int(process.env.BROADCAST_INTERVAL_MS, 5_000),
    broadcastInitialDelayMs: int(process.env.BROADCAST_INITIAL_DELAY_MS, 2_000),

    rollupIntervalMinutes: int(process.env.ROLLUP_INTERVAL_MINUTES, 60),
    rollupInitialDelayMinutes: int(process.env.ROLLUP_INITIAL_DELAY_MINUTES, 5),
    rollupLookbackHours: int(process.env.ROLLUP_LOOKBACK_HOURS, 24),

    retentionDays: int(process.env.RETENTION_DAYS, 7),
    retentionIntervalMinutes: int(process.env.RETENTION_INTERVAL_MINUTES, 60),
    retentionInitialDelayMinutes: int(process.env.RETENTION_INITIAL_DELAY_MINUTES, 10),

    dbPath: process.env.METRICS_DB_PATH || './data/metrics.db',

    httpHost: process.env.HTTP_HOST || '0.0.0.0',
    httpPort: int(process.env.HTTP_PORT, 5000),

    redisUrl: process.env.REDIS_URL || undefined,
  };
}

export function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function bool(val: string | undefined, fallback: boolean): boolean {
  if (!val) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(val.trim().toLowerCase());
}
