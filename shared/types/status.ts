import type { AutoscalingStatus } from './autoscaling';
import type { InstanceMeshStatus, MeshStatusResult } from './mesh';

export type InstanceTypeName = 'kubernetes' | 'flink' | 'cassandracluster' | 'kafkacluster';
export type DesiredState = 'start' | 'stop' | 'unknown';
export type SettableDesiredState = Exclude<DesiredState, 'unknown'>;
export type PodPhase = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Unknown';
export type ContainerState = 'running' | 'waiting' | 'terminated';
export type ReplicaGroupKind = 'ReplicaSet' | 'ControllerRevision';
export type DeployStatus = 'Running' | 'Deploying' | 'Waiting' | 'Stopped';

export interface ServiceInstanceKey {
  cluster: string;
  service: string;
  instance: string;
  instanceType: InstanceTypeName;
}

/** Immutable version identity of a deployable build + config */
export interface VersionIdentity {
  gitSha: string;
  configSha: string;
}

export interface ContainerStatus {
  name: string;
  restartCount: number;
  state?: ContainerState;
  reason?: string;
  message?: string;
  lastState?: ContainerState;
  lastReason?: string;
  lastMessage?: string;
  lastDuration?: number;           // Seconds the previous container ran
  timestamp?: number;              // Start of the current state, epoch seconds
  healthcheckGracePeriod?: number; // Liveness probe initial delay, seconds
}

export interface PodStatus {
  name: string;
  ip?: string;
  host?: string;
  phase: PodPhase;
  reason?: string;
  message?: string;
  scheduled: boolean;
  ready: boolean;
  containers: ContainerStatus[];
  createTimestamp: number;
  deleteTimestamp?: number;
}

export interface ReplicaVersion {
  name: string;
  type: ReplicaGroupKind;
  replicas: number;
  readyReplicas: number;
  createTimestamp: number;
  gitSha?: string;
  configSha?: string;
  pods: PodStatus[];
}

/**
 * Per-version, bounce-aware shape of a scheduler-native instance
 */
export interface KubernetesStatusV2 {
  appName: string;
  desiredState: DesiredState;
  desiredInstances: number;
  currentInstances: number;
  bounceMethod: string;
  evictedCount: number;
  versions: ReplicaVersion[];
  autoscaling?: AutoscalingStatus;
  errorMessage?: string;
  smartstack?: MeshStatusResult;
  envoy?: MeshStatusResult;
}

export interface TailLines {
  stdout: string[];
  stderr: string[];
  errorMessage?: string;
}

export interface PodEventMessage {
  message: string;
  timeStamp?: string;
}

export interface PodInfo {
  name: string;
  host?: string;
  deployedTimestamp: number;
  phase: PodPhase;
  ready: boolean;
  containers: Array<{ name: string; tailLines: TailLines }>;
  reason?: string;
  message?: string;
  events: PodEventMessage[];
  gitSha?: string;
  configSha?: string;
}

export interface ReplicaSetSummary {
  name: string;
  replicas: number;
  readyReplicas: number;
  createTimestamp: number;
  gitSha?: string;
  configSha?: string;
}

/**
 * Legacy per-pod / per-replicaset shape of a scheduler-native instance
 */
export interface KubernetesStatus {
  appId: string;
  appCount: number;
  activeShas: VersionIdentity[];
  desiredState: DesiredState;
  bounceMethod: string;
  pods: PodInfo[];
  replicasets: ReplicaSetSummary[];
  expectedInstanceCount: number;
  deployStatus: DeployStatus;
  deployStatusMessage: string;
  runningInstanceCount: number;
  createTimestamp?: number;
  namespace: string;
  evictedCount: number;
  autoscalingStatus?: AutoscalingStatus;
  errorMessage?: string;
  smartstack?: MeshStatusResult;
  envoy?: MeshStatusResult;
}

export interface CustomResourceStatus {
  status?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/**
 * Snapshot returned for one service instance. Scheduler-native and
 * custom-resource sub-statuses are built independently and may both be set.
 */
export interface InstanceStatus extends ServiceInstanceKey {
  kubernetes?: KubernetesStatus;
  kubernetesV2?: KubernetesStatusV2;
  customResource?: CustomResourceStatus;
}

export type MeshInstanceResponse = InstanceMeshStatus;

export interface SetDesiredStateResponse {
  message: string;
  desiredState: SettableDesiredState;
}

export interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  cluster: string;
}
