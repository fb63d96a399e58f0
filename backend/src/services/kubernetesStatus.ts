import type {
  AutoscalingStatus,
  DeployStatus,
  KubernetesStatus,
  KubernetesStatusV2,
  MeshFlavor,
  MeshStatusResult,
  PodInfo,
  ReplicaSetSummary,
  VersionIdentity,
} from '@fleetstat/shared';
import { isMeshStatusError } from '@fleetstat/shared';
import logger from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { autoscalingStatus } from './autoscaling';
import { sanitisedName } from './instanceTypes';
import { buildMeshStatus, meshAddresses } from './meshStatus';
import { isAutoscalingEnabled, meshNamespace } from './soaConfig';
import {
  filterActuallyRunningReplicaSets,
  getVersionsForControllerRevisions,
  getVersionsForReplicaSets,
  type MeshAddresses,
} from './versions';
import type { StatusSettings } from './settings';
import type {
  AppRecord,
  JobConfig,
  OrchestrationClient,
  PodRecord,
  ServiceNamespaceConfig,
  WorkloadTarget,
} from './types';

export interface SchedulerStatusOptions {
  verbose: number;
  includeSmartstack: boolean;
  includeEnvoy: boolean;
}

/**
 * Log lines fetched per container: none below verbosity 2, then 10, 100, ...
 */
export function calculateTailLines(verbose: number): number {
  return verbose < 2 ? 0 : 10 ** (verbose - 1);
}

/**
 * Distinct (git sha, config sha) pairs across the given objects
 */
export function getActiveShas(
  objects: Array<{ gitSha?: string; configSha?: string } | null>
): VersionIdentity[] {
  const seen = new Map<string, VersionIdentity>();
  for (const object of objects) {
    if (!object?.gitSha) {
      continue;
    }
    const identity = { gitSha: object.gitSha, configSha: object.configSha || '' };
    seen.set(`${identity.gitSha}/${identity.configSha}`, identity);
  }
  return Array.from(seen.values());
}

/**
 * Deploy status from the app's replica counts. StatefulSets may not report
 * updated replicas, in which case a deploy in progress reads as Running.
 */
export function getDeployStatus(app: AppRecord | null, desiredInstances: number): DeployStatus {
  const readyReplicas = app?.readyReplicas;
  if (readyReplicas === undefined) {
    return desiredInstances === 0 ? 'Stopped' : 'Waiting';
  }
  if (readyReplicas !== desiredInstances) {
    return 'Waiting';
  }
  if (app?.updatedReplicas !== undefined && app.updatedReplicas < desiredInstances) {
    return 'Deploying';
  }
  if (app?.replicas === 0 && desiredInstances === 0) {
    return 'Stopped';
  }
  return 'Running';
}

export function desiredInstancesOf(job: JobConfig): number {
  return job.desiredState !== 'stop' ? job.instances : 0;
}

export function countEvicted(pods: PodRecord[]): number {
  return pods.filter((pod) => pod.reason === 'Evicted').length;
}

function workloadTarget(job: JobConfig): WorkloadTarget {
  return { service: job.service, instance: job.instance, namespace: job.namespace };
}

async function podInfo(pod: PodRecord, kube: OrchestrationClient, tailLines: number): Promise<PodInfo> {
  const events = await kube.getPodEvents(pod.name, pod.namespace);
  const containers: PodInfo['containers'] = [];
  for (const container of pod.containers) {
    containers.push({
      name: container.name,
      tailLines: await kube.getContainerTailLines(pod.name, pod.namespace, container.name, tailLines),
    });
  }

  return {
    name: pod.name,
    host: pod.nodeName,
    deployedTimestamp: pod.createdAt,
    phase: pod.phase,
    ready: pod.schedulerReady,
    containers,
    reason: pod.reason,
    message: pod.message,
    events,
    gitSha: pod.gitSha,
    configSha: pod.configSha,
  };
}

interface AutoscalingResult {
  status?: AutoscalingStatus;
  errorMessage?: string;
}

/**
 * Autoscaling status when the job autoscales through an HPA. Failures are
 * reported as a message; they never fail the instance status.
 */
async function readAutoscaling(kube: OrchestrationClient, job: JobConfig): Promise<AutoscalingResult> {
  if (!isAutoscalingEnabled(job) || job.autoscaling.decisionPolicy === 'bespoke') {
    return {};
  }
  try {
    return { status: await autoscalingStatus(kube, sanitisedName(job.service, job.instance), job.namespace) };
  } catch (error) {
    logger.warn({ service: job.service, instance: job.instance, error: errorMessage(error) }, 'Autoscaling status failed');
    return { errorMessage: `Unknown error occurred while fetching autoscaling status: ${errorMessage(error)}` };
  }
}

/**
 * Mesh status of one flavor, with failures turned into an error entry
 */
async function meshStatusResult(
  flavor: MeshFlavor,
  job: JobConfig,
  namespaceConfig: ServiceNamespaceConfig,
  pods: PodRecord[],
  includeBackends: boolean,
  settings: StatusSettings
): Promise<MeshStatusResult> {
  try {
    return await buildMeshStatus(
      { service: job.service, flavor, job, namespaceConfig, pods, includeBackends },
      settings
    );
  } catch (error) {
    logger.warn(
      { service: job.service, instance: job.instance, flavor, error: errorMessage(error) },
      `Could not build ${flavor} status`
    );
    return { error: errorMessage(error) };
  }
}

/**
 * Per-pod and per-replicaset status of a scheduler-native instance
 */
export async function kubernetesStatus(
  job: JobConfig,
  options: SchedulerStatusOptions,
  kube: OrchestrationClient,
  settings: StatusSettings
): Promise<KubernetesStatus> {
  const appId = sanitisedName(job.service, job.instance);
  const target = workloadTarget(job);

  const app = await kube.getApp(appId, job.namespace);
  const pods = await kube.listPods(target);
  const replicaSets = await kube.listReplicaSets(target);

  // Replica sets at 0/0 are not active versions
  const activeShas = getActiveShas([app, ...pods, ...filterActuallyRunningReplicaSets(replicaSets)]);

  let podInfos: PodInfo[] = [];
  if (options.verbose > 0) {
    const tailLines = calculateTailLines(options.verbose);
    podInfos = await Promise.all(pods.map((pod) => podInfo(pod, kube, tailLines)));
  }

  const replicasets: ReplicaSetSummary[] = replicaSets.map((replicaSet) => ({
    name: replicaSet.name,
    replicas: replicaSet.replicas ?? 0,
    readyReplicas: replicaSet.readyReplicas,
    createTimestamp: replicaSet.createdAt,
    gitSha: replicaSet.gitSha,
    configSha: replicaSet.configSha,
  }));

  const status: KubernetesStatus = {
    appId,
    appCount: activeShas.length,
    activeShas,
    desiredState: job.desiredState,
    bounceMethod: job.bounceMethod,
    pods: podInfos,
    replicasets,
    expectedInstanceCount: job.instances,
    deployStatus: getDeployStatus(app, desiredInstancesOf(job)),
    deployStatusMessage: '',
    runningInstanceCount: app?.readyReplicas ?? 0,
    createTimestamp: app?.createdAt,
    namespace: app?.namespace || job.namespace,
    evictedCount: countEvicted(pods),
  };

  const autoscaling = await readAutoscaling(kube, job);
  if (autoscaling.status) status.autoscalingStatus = autoscaling.status;
  if (autoscaling.errorMessage) status.errorMessage = autoscaling.errorMessage;

  if (options.includeSmartstack || options.includeEnvoy) {
    const namespaceConfig = await settings.configLoader.loadServiceNamespaceConfig(job.service, meshNamespace(job));
    if (namespaceConfig.proxyPort !== undefined) {
      const includeBackends = options.verbose > 0;
      if (options.includeSmartstack) {
        status.smartstack = await meshStatusResult('smartstack', job, namespaceConfig, pods, includeBackends, settings);
      }
      if (options.includeEnvoy) {
        status.envoy = await meshStatusResult('envoy', job, namespaceConfig, pods, includeBackends, settings);
      }
    }
  }

  return status;
}

/**
 * Per-version status of a scheduler-native instance. When the instance is in
 * the mesh, envoy status is always built so pod readiness reflects mesh
 * registration; it is only returned when asked for.
 */
export async function kubernetesStatusV2(
  job: JobConfig,
  options: SchedulerStatusOptions,
  kube: OrchestrationClient,
  settings: StatusSettings
): Promise<KubernetesStatusV2> {
  const target = workloadTarget(job);
  const pods = await kube.listPods(target);
  const namespaceConfig = await settings.configLoader.loadServiceNamespaceConfig(job.service, meshNamespace(job));

  let addresses: MeshAddresses = null;
  let envoy: MeshStatusResult | undefined;
  let smartstack: MeshStatusResult | undefined;
  if (namespaceConfig.proxyPort !== undefined) {
    envoy = await meshStatusResult('envoy', job, namespaceConfig, pods, true, settings);
    if (!isMeshStatusError(envoy)) {
      addresses = meshAddresses(envoy);
    }
    if (options.includeSmartstack) {
      smartstack = await meshStatusResult('smartstack', job, namespaceConfig, pods, options.verbose > 0, settings);
    }
  }

  const versions =
    job.persistentVolumes.length > 0
      ? getVersionsForControllerRevisions(await kube.listControllerRevisions(target), pods, addresses)
      : getVersionsForReplicaSets(await kube.listReplicaSets(target), pods, addresses);

  const status: KubernetesStatusV2 = {
    appName: sanitisedName(job.service, job.instance),
    desiredState: job.desiredState,
    desiredInstances: desiredInstancesOf(job),
    currentInstances: versions.reduce(
      (total, version) => total + version.pods.filter((pod) => pod.ready).length,
      0
    ),
    bounceMethod: job.bounceMethod,
    evictedCount: countEvicted(pods),
    versions,
  };

  const autoscaling = await readAutoscaling(kube, job);
  if (autoscaling.status) status.autoscaling = autoscaling.status;
  if (autoscaling.errorMessage) status.errorMessage = autoscaling.errorMessage;

  if (envoy && options.includeEnvoy) status.envoy = envoy;
  if (smartstack) status.smartstack = smartstack;

  return status;
}
