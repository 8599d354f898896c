/**
 * Kubernetes API access for discovery.
 *
 * Wraps CoreV1Api behind a two-method reader so discovery can be tested
 * without a cluster.
 */

import { CoreV1Api, KubeConfig, type V1Pod, type V1Service } from '@kubernetes/client-node';
import type { KubernetesConfig } from '../config.js';
import { log } from '../logger.js';

export interface ClusterReader {
  listPods(namespace: string, labelSelector: string): Promise<V1Pod[]>;
  listServices(namespace: string, labelSelector: string): Promise<V1Service[]>;
}

export function createClusterReader(config: KubernetesConfig): ClusterReader {
  const kc = new KubeConfig();

  if (config.inCluster) {
    kc.loadFromCluster();
    log('[Kubernetes] Client configured for in-cluster access');
  } else {
    kc.loadFromDefault();
    log(`[Kubernetes] Client configured from kubeconfig (context: ${kc.getCurrentContext()})`);
  }

  const core = kc.makeApiClient(CoreV1Api);

  return {
    async listPods(namespace, labelSelector) {
      const list = await core.listNamespacedPod({ namespace, labelSelector });
      return list.items;
    },
    async listServices(namespace, labelSelector) {
      const list = await core.listNamespacedService({ namespace, labelSelector });
      return list.items;
    },
  };
}
