/**
 * Fleet Discovery
 *
 * Lists pods and services carrying the fleet label and turns each
 * pod+service pair into a ServerDescriptor.
 *
 * Skips:
 * 1. The monitor's own pod (self-exclusion by name)
 * 2. Pods whose name maps to no known protocol
 * 3. Pods with no service selecting them
 */

import type { V1Pod, V1Service } from '@kubernetes/client-node';
import type { KubernetesConfig } from '../config.js';
import type { ProtocolKind, ServerDescriptor } from '../types.js';
import type { ClusterReader } from './kube-client.js';
import { PlatformUnavailableError } from '../errors.js';
import { debug, log, warn } from '../logger.js';

const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
const INSTANCE_LABEL = 'app.kubernetes.io/instance';
const DYNAMIC_MANAGER = 'control-api';

// Most specific first: "sftp" contains "ftp", "webdav" pods often contain "http"
const PROTOCOL_RULES: ReadonlyArray<readonly [string, ProtocolKind]> = [
  ['management', 'Management'],
  ['sftp', 'SFTP'],
  ['ftp', 'FTP'],
  ['nas', 'NFS'],
  ['webdav', 'WebDAV'],
  ['http', 'HTTP'],
  ['s3', 'S3'],
  ['smb', 'SMB'],
];

export interface FleetDiscovery {
  discover(): Promise<ServerDescriptor[]>;
  getServer(name: string): Promise<ServerDescriptor | null>;
}

export function detectProtocol(podName: string): ProtocolKind | null {
  const lower = podName.toLowerCase();
  for (const [key, protocol] of PROTOCOL_RULES) {
    if (lower.includes(key)) return protocol;
  }
  return null;
}

/**
 * Derive a stable server name from a Helm-managed pod name.
 *
 *   file-sim-file-simulator-nas-input-1-6c9f-x2x  → nas-input-1
 *   file-sim-file-simulator-nas-backup-55d-kq8    → nas-backup
 *   file-sim-file-simulator-sftp-7b9c-abcde       → sftp
 */
export function serverNameFromPod(podName: string): string {
  const parts = podName.split('-');

  for (let i = 0; i < parts.length - 1; i++) {
    if (parts[i] !== 'nas') continue;
    const kind = parts[i + 1];
    if (kind === 'backup') return 'nas-backup';
    const index = parts[i + 2];
    if (index !== undefined && /^\d+$/.test(index)) return `nas-${kind}-${index}`;
  }

  // Exact segment match so "sftp" never resolves to "ftp"
  for (const [key] of PROTOCOL_RULES) {
    if (parts.some(p => p.toLowerCase() === key)) return key;
  }

  return podName;
}

function findMatchingService(pod: V1Pod, services: V1Service[]): V1Service | undefined {
  const podLabels = pod.metadata?.labels ?? {};
  return services.find(svc => {
    const selector = svc.spec?.selector;
    if (!selector) return false;
    return Object.entries(selector).every(([k, v]) => podLabels[k] === v);
  });
}

function isPodReady(pod: V1Pod): boolean {
  return pod.status?.conditions?.some(c => c.type === 'Ready' && c.status === 'True') ?? false;
}

export class KubernetesDiscovery implements FleetDiscovery {
  constructor(
    private readonly reader: ClusterReader,
    private readonly config: KubernetesConfig,
  ) {}

  async discover(): Promise<ServerDescriptor[]> {
    const { namespace, labelSelector } = this.config;

    let pods: V1Pod[];
    let services: V1Service[];
    try {
      [pods, services] = await Promise.all([
        this.reader.listPods(namespace, labelSelector),
        this.reader.listServices(namespace, labelSelector),
      ]);
    } catch (err) {
      throw new PlatformUnavailableError(
        `Kubernetes API unavailable listing ${labelSelector} in ${namespace}`,
        { cause: err },
      );
    }

    debug(`[Discovery] Found ${pods.length} pods, ${services.length} services`);

    const servers: ServerDescriptor[] = [];
    for (const pod of pods) {
      const server = this.toDescriptor(pod, services);
      if (server) servers.push(server);
    }

    log(`[Discovery] Discovered ${servers.length} protocol servers`);
    return servers;
  }

  async getServer(name: string): Promise<ServerDescriptor | null> {
    const wanted = name.toLowerCase();
    const servers = await this.discover();
    return servers.find(s => s.name.toLowerCase() === wanted) ?? null;
  }

  private toDescriptor(pod: V1Pod, services: V1Service[]): ServerDescriptor | null {
    const podName = pod.metadata?.name;
    if (!podName) return null;

    const { selfName } = this.config;
    if (selfName && podName.includes(selfName)) return null;

    const protocolKind = detectProtocol(podName);
    if (!protocolKind) {
      debug(`[Discovery] Skipping pod ${podName} - unknown protocol`);
      return null;
    }

    const service = findMatchingService(pod, services);
    if (!service) {
      warn(`[Discovery] No service found for pod ${podName}`);
      return null;
    }

    const labels = pod.metadata?.labels ?? {};
    const managedBy = labels[MANAGED_BY_LABEL] ?? 'Helm';
    const isDynamic = managedBy === DYNAMIC_MANAGER;
    const instance = labels[INSTANCE_LABEL];
    const name = isDynamic && instance ? instance : serverNameFromPod(podName);

    const port = service.spec?.ports?.[0];
    const nodePort = port?.nodePort;
    const external = this.config.externalHost;

    return {
      name,
      protocolKind,
      host: external && nodePort !== undefined ? external : service.spec?.clusterIP ?? '',
      port: external && nodePort !== undefined ? nodePort : port?.port ?? 0,
      lifecycleState: pod.status?.phase ?? 'Unknown',
      ready: isPodReady(pod),
      podName,
      serviceName: service.metadata?.name ?? '',
      nodePort,
      managedBy,
      isDynamic,
    };
  }
}
