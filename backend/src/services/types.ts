import type * as k8s from '@kubernetes/client-node';
import type {
  ContainerState,
  DesiredState,
  InstanceTypeName,
  MeshBackend,
  PodEventMessage,
  PodPhase,
  ReplicaGroupKind,
  SettableDesiredState,
  TailLines,
} from '@fleetstat/shared';
import type { CRDConfig } from './instanceTypes';

/**
 * Typed records produced at the fetch boundary. Everything downstream of
 * the orchestration client works on these, never on raw API objects.
 */

export interface OwnerReference {
  kind: string;
  name: string;
}

export interface ContainerRecord {
  name: string;
  restartCount: number;
  state?: ContainerState;
  reason?: string;
  message?: string;
  startedAt?: number;
  lastState?: ContainerState;
  lastReason?: string;
  lastMessage?: string;
  lastDurationSeconds?: number;
  healthcheckGracePeriod?: number;
}

export interface PodRecord {
  name: string;
  namespace: string;
  ip?: string;
  hostIp?: string;
  nodeName?: string;
  phase: PodPhase;
  reason?: string;
  message?: string;
  gitSha?: string;
  configSha?: string;
  ownerReferences: OwnerReference[];
  createdAt: number;
  deletedAt?: number;
  scheduled: boolean;
  /** Scheduler readiness, before any mesh correction */
  schedulerReady: boolean;
  /** Reason and message of the PodScheduled condition */
  schedulingReason?: string;
  schedulingMessage?: string;
  containers: ContainerRecord[];
}

export interface ReplicaGroupRecord {
  kind: ReplicaGroupKind;
  name: string;
  /** Declared replicas; revisions declare none */
  replicas?: number;
  readyReplicas: number;
  createdAt: number;
  gitSha?: string;
  configSha?: string;
}

export interface AppRecord {
  kind: 'Deployment' | 'StatefulSet';
  name: string;
  namespace: string;
  createdAt: number;
  replicas?: number;
  readyReplicas?: number;
  updatedReplicas?: number;
  gitSha?: string;
  configSha?: string;
}

export interface NodeRecord {
  name: string;
  labels: Record<string, string>;
}

/** A mesh backend as the admin endpoint reports it, before pod matching */
export type MeshBackendRecord = Omit<MeshBackend, 'hasAssociatedTask'>;

/**
 * Pods and replica groups of one service instance
 */
export interface WorkloadTarget {
  service: string;
  instance: string;
  namespace: string;
}

export interface CustomResourceId extends CRDConfig {
  namespace: string;
  name: string;
}

/**
 * Queries against the orchestration backend
 */
export interface OrchestrationClient {
  listPods(target: WorkloadTarget): Promise<PodRecord[]>;
  listReplicaSets(target: WorkloadTarget): Promise<ReplicaGroupRecord[]>;
  listControllerRevisions(target: WorkloadTarget): Promise<ReplicaGroupRecord[]>;
  /** Deployment or StatefulSet by name; null when neither exists */
  getApp(name: string, namespace: string): Promise<AppRecord | null>;
  /** null when no autoscaler exists */
  getAutoscaler(name: string, namespace: string): Promise<k8s.V2HorizontalPodAutoscaler | null>;
  /** null when the resource does not exist */
  getCustomResource(id: CustomResourceId): Promise<Record<string, unknown> | null>;
  setCustomResourceDesiredState(id: CustomResourceId, desiredState: SettableDesiredState): Promise<void>;
  listNodes(labelSelector?: string): Promise<NodeRecord[]>;
  getPodEvents(podName: string, namespace: string): Promise<PodEventMessage[]>;
  getContainerTailLines(
    podName: string,
    namespace: string,
    container: string,
    lines: number
  ): Promise<TailLines>;
}

export interface MeshAdminClient {
  fetchText(url: string): Promise<string>;
}

export interface TopologyResolver {
  /** Location name to the hosts serving it, for nodes in the given pool */
  locationsAndHostsForPool(discover: string, pool: string): Promise<Map<string, string[]>>;
}

/**
 * Per-instance job config, as read from the service's YAML files
 */
export interface JobConfig {
  service: string;
  instance: string;
  cluster: string;
  instances: number;
  desiredState: Exclude<DesiredState, 'unknown'>;
  bounceMethod: string;
  registrations: string[];
  pool: string;
  namespace: string;
  persistentVolumes: unknown[];
  minInstances?: number;
  maxInstances?: number;
  autoscaling: {
    decisionPolicy?: string;
  };
}

/**
 * Mesh settings of one registration namespace
 */
export interface ServiceNamespaceConfig {
  proxyPort?: number;
  discover: string;
}

export interface JobConfigLoader {
  loadJobConfig(service: string, instance: string, instanceType: InstanceTypeName): Promise<JobConfig>;
  loadServiceNamespaceConfig(service: string, namespace: string): Promise<ServiceNamespaceConfig>;
  expectedInstanceCountForNamespace(service: string, namespace: string): Promise<number>;
  /** Instance type declaring the instance; NotFoundError when none does */
  resolveInstanceType(service: string, instance: string): Promise<InstanceTypeName>;
  /** Instance names of a service in this cluster, with their types */
  listInstances(service: string): Promise<Array<{ instance: string; instanceType: InstanceTypeName }>>;
}
