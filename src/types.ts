/** Protocols served by the fleet */
export type ProtocolKind = 'FTP' | 'SFTP' | 'NFS' | 'HTTP' | 'WebDAV' | 'S3' | 'SMB' | 'Management';

/** A fleet server as seen by one discovery pass */
export interface ServerDescriptor {
  readonly name: string;
  readonly protocolKind: ProtocolKind;
  readonly host: string;
  readonly port: number;
  /** Pod phase: Running, Pending, Failed, ... */
  readonly lifecycleState: string;
  /** Pod Ready condition */
  readonly ready: boolean;
  readonly podName: string;
  readonly serviceName: string;
  readonly nodePort?: number;
  readonly managedBy: string;
  readonly isDynamic: boolean;
}

export type ProbeFailure = 'timeout' | 'refused' | 'error';

/** Outcome of one TCP reachability check */
export interface ProbeResult {
  serverName: string;
  isReachable: boolean;
  /** Present only when reachable */
  latencyMillis?: number;
  failure?: ProbeFailure;
  message?: string;
}

export interface ServerStatus {
  readonly name: string;
  readonly protocolKind: ProtocolKind;
  readonly lifecycleState: string;
  readonly isHealthy: boolean;
  readonly latencyMillis?: number;
  readonly message?: string;
}

/** One complete picture of the fleet; never mutated after construction */
export interface StatusSnapshot {
  readonly servers: readonly ServerStatus[];
  readonly takenAt: Date;
  readonly totalServers: number;
  readonly healthyServers: number;
}

/** Raw per-cycle sample. latencyMillis is null iff isHealthy is false. */
export interface HealthSample {
  id?: number;
  timestampUtc: Date;
  serverName: string;
  protocolKind: string;
  isHealthy: boolean;
  latencyMillis: number | null;
}

/** Hourly rollup for one server. Latency stats are null when healthyCount is 0. */
export interface HealthHourly {
  id?: number;
  hourStartUtc: Date;
  serverName: string;
  protocolKind: string;
  sampleCount: number;
  healthyCount: number;
  avgLatencyMillis: number | null;
  minLatencyMillis: number | null;
  maxLatencyMillis: number | null;
  p95LatencyMillis: number | null;
}

/** Distinct server with stored samples */
export interface KnownServer {
  serverName: string;
  protocolKind: string;
  firstSample: Date;
  lastSample: Date;
  totalSamples: number;
}

export interface MetricsFilter {
  serverName?: string;
  protocolKind?: string;
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
