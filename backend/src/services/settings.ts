import type { SystemConfig } from './config';
import { KubernetesService } from './kubernetes';
import { HttpMeshAdminClient } from './meshAdmin';
import { SoaConfigLoader } from './soaConfig';
import { NodeTopologyResolver } from './topology';
import type { JobConfigLoader, MeshAdminClient, OrchestrationClient, TopologyResolver } from './types';

/**
 * Collaborators of one status query, bound to a single cluster
 */
export interface StatusSettings {
  cluster: string;
  system: SystemConfig;
  /** null when this process has no access to the cluster */
  kube: OrchestrationClient | null;
  meshAdmin: MeshAdminClient;
  topology: TopologyResolver;
  configLoader: JobConfigLoader;
}

export function createStatusSettings(system: SystemConfig): StatusSettings {
  const kube = new KubernetesService(system.labelPrefix);
  return {
    cluster: system.cluster,
    system,
    kube,
    meshAdmin: new HttpMeshAdminClient(system.meshAdminTimeoutMs),
    topology: new NodeTopologyResolver(kube, system),
    configLoader: new SoaConfigLoader(system.soaDir, system.cluster),
  };
}
