import type { ContainerStatus, PodStatus, ReplicaVersion } from '@fleetstat/shared';
import type { ContainerRecord, PodRecord, ReplicaGroupRecord } from './types';

/**
 * Addresses registered in the mesh, or null when mesh membership is unknown
 */
export type MeshAddresses = ReadonlySet<string> | null;

/**
 * Replica groups scaled to zero with nothing ready are history, not versions
 */
export function filterActuallyRunningReplicaSets(groups: ReplicaGroupRecord[]): ReplicaGroupRecord[] {
  return groups.filter((group) => !(group.replicas === 0 && group.readyReplicas === 0));
}

function toContainerStatus(container: ContainerRecord): ContainerStatus {
  return {
    name: container.name,
    restartCount: container.restartCount,
    state: container.state,
    reason: container.reason,
    message: container.message,
    lastState: container.lastState,
    lastReason: container.lastReason,
    lastMessage: container.lastMessage,
    lastDuration: container.lastDurationSeconds,
    timestamp: container.startedAt,
    healthcheckGracePeriod: container.healthcheckGracePeriod,
  };
}

/**
 * Output status of one pod. A scheduler-ready pod only counts as ready when
 * its address is registered in the mesh, if mesh membership is known.
 */
export function getPodStatus(pod: PodRecord, meshAddresses: MeshAddresses): PodStatus {
  let reason = pod.reason;
  let message = pod.message;
  if (!pod.scheduled) {
    reason = pod.schedulingReason;
    message = pod.schedulingMessage;
  }

  let ready = pod.schedulerReady;
  if (ready && meshAddresses) {
    ready = pod.ip !== undefined && meshAddresses.has(pod.ip);
  }

  return {
    name: pod.name,
    ip: pod.ip,
    host: pod.hostIp,
    phase: pod.phase,
    reason,
    message,
    scheduled: pod.scheduled,
    ready,
    containers: pod.containers.map(toContainerStatus),
    createTimestamp: pod.createdAt,
    deleteTimestamp: pod.deletedAt,
  };
}

function newestFirst(versions: ReplicaVersion[]): ReplicaVersion[] {
  return [...versions].sort((a, b) => b.createTimestamp - a.createTimestamp);
}

export function getPodsByReplicaSet(pods: PodRecord[]): Map<string, PodRecord[]> {
  const podsByReplicaSet = new Map<string, PodRecord[]>();
  for (const pod of pods) {
    for (const owner of pod.ownerReferences) {
      if (owner.kind !== 'ReplicaSet') {
        continue;
      }
      const members = podsByReplicaSet.get(owner.name) || [];
      members.push(pod);
      podsByReplicaSet.set(owner.name, members);
    }
  }
  return podsByReplicaSet;
}

/**
 * One version per running ReplicaSet, carrying the pods it owns
 */
export function getVersionsForReplicaSets(
  replicaSets: ReplicaGroupRecord[],
  pods: PodRecord[],
  meshAddresses: MeshAddresses
): ReplicaVersion[] {
  const podsByReplicaSet = getPodsByReplicaSet(pods);
  return newestFirst(
    filterActuallyRunningReplicaSets(replicaSets).map((replicaSet): ReplicaVersion => ({
      name: replicaSet.name,
      type: 'ReplicaSet',
      replicas: replicaSet.replicas ?? 0,
      readyReplicas: replicaSet.readyReplicas,
      createTimestamp: replicaSet.createdAt,
      gitSha: replicaSet.gitSha,
      configSha: replicaSet.configSha,
      pods: (podsByReplicaSet.get(replicaSet.name) || []).map((pod) => getPodStatus(pod, meshAddresses)),
    }))
  );
}

function shaKey(gitSha: string | undefined, configSha: string | undefined): string {
  return `${gitSha || ''}/${configSha || ''}`;
}

/**
 * One version per (git sha, config sha) pair of the controller revisions.
 * Revisions declare no replica counts, so both come from the member pods.
 */
export function getVersionsForControllerRevisions(
  revisions: ReplicaGroupRecord[],
  pods: PodRecord[],
  meshAddresses: MeshAddresses
): ReplicaVersion[] {
  const revisionsByShas = new Map<string, ReplicaGroupRecord>();
  for (const revision of revisions) {
    revisionsByShas.set(shaKey(revision.gitSha, revision.configSha), revision);
  }

  const podsByShas = new Map<string, PodRecord[]>();
  for (const pod of pods) {
    const key = shaKey(pod.gitSha, pod.configSha);
    const members = podsByShas.get(key) || [];
    members.push(pod);
    podsByShas.set(key, members);
  }

  const versions: ReplicaVersion[] = [];
  for (const [key, revision] of revisionsByShas) {
    const members = podsByShas.get(key) || [];
    versions.push({
      name: revision.name,
      type: 'ControllerRevision',
      replicas: members.length,
      readyReplicas: members.filter((pod) => pod.schedulerReady).length,
      createTimestamp: revision.createdAt,
      gitSha: revision.gitSha,
      configSha: revision.configSha,
      pods: members.map((pod) => getPodStatus(pod, meshAddresses)),
    });
  }
  return newestFirst(versions);
}
