import type * as k8s from '@kubernetes/client-node';
import type { ContainerState, PodPhase } from '@fleetstat/shared';
import type {
  AppRecord,
  ContainerRecord,
  NodeRecord,
  OwnerReference,
  PodRecord,
  ReplicaGroupRecord,
} from './types';

/**
 * Label keys under the configured prefix
 */
export interface LabelKeys {
  gitSha: string;
  configSha: string;
  service: string;
  instance: string;
  desiredState: string;
}

export function labelKeys(prefix: string): LabelKeys {
  return {
    gitSha: `${prefix}/git_sha`,
    configSha: `${prefix}/config_sha`,
    service: `${prefix}/service`,
    instance: `${prefix}/instance`,
    desiredState: `${prefix}/desired_state`,
  };
}

const POD_PHASES: readonly PodPhase[] = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'];

function toPodPhase(phase: string | undefined): PodPhase {
  return POD_PHASES.find((known) => known === phase) || 'Unknown';
}

export function toEpochSeconds(date: Date | undefined): number | undefined {
  return date ? date.getTime() / 1000 : undefined;
}

function findCondition(pod: k8s.V1Pod, type: string): k8s.V1PodCondition | undefined {
  return pod.status?.conditions?.find((condition) => condition.type === type);
}

interface StateDetails {
  state?: ContainerState;
  reason?: string;
  message?: string;
  startedAt?: Date;
  finishedAt?: Date;
}

/**
 * At most one of running / waiting / terminated is populated
 */
function describeState(state: k8s.V1ContainerState | undefined): StateDetails {
  if (state?.running) {
    return { state: 'running', startedAt: state.running.startedAt };
  }
  if (state?.waiting) {
    return { state: 'waiting', reason: state.waiting.reason, message: state.waiting.message };
  }
  if (state?.terminated) {
    return {
      state: 'terminated',
      reason: state.terminated.reason,
      message: state.terminated.message,
      startedAt: state.terminated.startedAt,
      finishedAt: state.terminated.finishedAt,
    };
  }
  return {};
}

function toContainerRecord(status: k8s.V1ContainerStatus, specs: k8s.V1Container[]): ContainerRecord {
  const spec = specs.find((container) => container.name === status.name);
  const current = describeState(status.state);
  const last = describeState(status.lastState);

  let lastDurationSeconds: number | undefined;
  if (last.startedAt && last.finishedAt) {
    lastDurationSeconds = Math.floor((last.finishedAt.getTime() - last.startedAt.getTime()) / 1000);
  }

  return {
    name: status.name,
    restartCount: status.restartCount,
    state: current.state,
    reason: current.reason,
    message: current.message,
    startedAt: toEpochSeconds(current.startedAt),
    lastState: last.state,
    lastReason: last.reason,
    lastMessage: last.message,
    lastDurationSeconds,
    healthcheckGracePeriod: spec?.livenessProbe?.initialDelaySeconds,
  };
}

function toOwnerReferences(metadata: k8s.V1ObjectMeta | undefined): OwnerReference[] {
  return (metadata?.ownerReferences || []).map((ref) => ({ kind: ref.kind, name: ref.name }));
}

export function toPodRecord(pod: k8s.V1Pod, labels: LabelKeys): PodRecord {
  const podLabels = pod.metadata?.labels || {};
  const scheduledCondition = findCondition(pod, 'PodScheduled');
  const readyCondition = findCondition(pod, 'Ready');

  return {
    name: pod.metadata?.name || '',
    namespace: pod.metadata?.namespace || '',
    ip: pod.status?.podIP,
    hostIp: pod.status?.hostIP,
    nodeName: pod.spec?.nodeName,
    phase: toPodPhase(pod.status?.phase),
    reason: pod.status?.reason,
    message: pod.status?.message,
    gitSha: podLabels[labels.gitSha],
    configSha: podLabels[labels.configSha],
    ownerReferences: toOwnerReferences(pod.metadata),
    createdAt: toEpochSeconds(pod.metadata?.creationTimestamp) ?? 0,
    deletedAt: toEpochSeconds(pod.metadata?.deletionTimestamp),
    scheduled: scheduledCondition?.status === 'True',
    schedulerReady: readyCondition?.status === 'True',
    schedulingReason: scheduledCondition?.reason,
    schedulingMessage: scheduledCondition?.message,
    containers: (pod.status?.containerStatuses || []).map((status) =>
      toContainerRecord(status, pod.spec?.containers || [])
    ),
  };
}

export function toReplicaSetRecord(replicaSet: k8s.V1ReplicaSet, labels: LabelKeys): ReplicaGroupRecord {
  const rsLabels = replicaSet.metadata?.labels || {};
  return {
    kind: 'ReplicaSet',
    name: replicaSet.metadata?.name || '',
    replicas: replicaSet.spec?.replicas,
    readyReplicas: replicaSet.status?.readyReplicas ?? 0,
    createdAt: toEpochSeconds(replicaSet.metadata?.creationTimestamp) ?? 0,
    gitSha: rsLabels[labels.gitSha],
    configSha: rsLabels[labels.configSha],
  };
}

export function toControllerRevisionRecord(
  revision: k8s.V1ControllerRevision,
  labels: LabelKeys
): ReplicaGroupRecord {
  const revisionLabels = revision.metadata?.labels || {};
  return {
    kind: 'ControllerRevision',
    name: revision.metadata?.name || '',
    readyReplicas: 0,
    createdAt: toEpochSeconds(revision.metadata?.creationTimestamp) ?? 0,
    gitSha: revisionLabels[labels.gitSha],
    configSha: revisionLabels[labels.configSha],
  };
}

export function toAppRecord(
  kind: AppRecord['kind'],
  app: k8s.V1Deployment | k8s.V1StatefulSet,
  labels: LabelKeys
): AppRecord {
  const appLabels = app.metadata?.labels || {};
  return {
    kind,
    name: app.metadata?.name || '',
    namespace: app.metadata?.namespace || '',
    createdAt: toEpochSeconds(app.metadata?.creationTimestamp) ?? 0,
    replicas: app.status?.replicas,
    readyReplicas: app.status?.readyReplicas,
    updatedReplicas: app.status?.updatedReplicas,
    gitSha: appLabels[labels.gitSha],
    configSha: appLabels[labels.configSha],
  };
}

export function toNodeRecord(node: k8s.V1Node): NodeRecord {
  return {
    name: node.metadata?.name || '',
    labels: node.metadata?.labels || {},
  };
}
