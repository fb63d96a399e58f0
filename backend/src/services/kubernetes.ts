import * as k8s from '@kubernetes/client-node';
import type { PodEventMessage, SettableDesiredState, TailLines } from '@fleetstat/shared';
import logger from '../lib/logger';
import { NotFoundError, errorMessage, getStatusCode, isNotFoundError } from '../lib/errors';
import {
  labelKeys,
  toAppRecord,
  toControllerRevisionRecord,
  toNodeRecord,
  toPodRecord,
  toReplicaSetRecord,
  type LabelKeys,
} from './records';
import type {
  AppRecord,
  CustomResourceId,
  NodeRecord,
  OrchestrationClient,
  PodRecord,
  ReplicaGroupRecord,
  WorkloadTarget,
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Kubernetes Service
 * Reads workloads, autoscalers, custom resources and nodes, mapping every
 * object to a typed record before it leaves this class. Errors other than
 * "not found" propagate to the caller.
 */
export class KubernetesService implements OrchestrationClient {
  private coreV1Api: k8s.CoreV1Api;
  private appsV1Api: k8s.AppsV1Api;
  private autoscalingV2Api: k8s.AutoscalingV2Api;
  private customObjectsApi: k8s.CustomObjectsApi;
  private labels: LabelKeys;

  constructor(labelPrefix: string, kc?: k8s.KubeConfig) {
    const kubeConfig = kc || new k8s.KubeConfig();

    if (!kc) {
      try {
        kubeConfig.loadFromDefault();
      } catch {
        logger.warn('No kubeconfig found, Kubernetes requests will fail');
      }
    }

    this.coreV1Api = kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.appsV1Api = kubeConfig.makeApiClient(k8s.AppsV1Api);
    this.autoscalingV2Api = kubeConfig.makeApiClient(k8s.AutoscalingV2Api);
    this.customObjectsApi = kubeConfig.makeApiClient(k8s.CustomObjectsApi);
    this.labels = labelKeys(labelPrefix);
  }

  private workloadSelector(target: WorkloadTarget): string {
    return `${this.labels.service}=${target.service},${this.labels.instance}=${target.instance}`;
  }

  async listPods(target: WorkloadTarget): Promise<PodRecord[]> {
    const response = await this.coreV1Api.listNamespacedPod(
      target.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      this.workloadSelector(target)
    );
    logger.debug({ ...target, count: response.body.items.length }, 'Listed pods');
    return response.body.items.map((pod) => toPodRecord(pod, this.labels));
  }

  async listReplicaSets(target: WorkloadTarget): Promise<ReplicaGroupRecord[]> {
    const response = await this.appsV1Api.listNamespacedReplicaSet(
      target.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      this.workloadSelector(target)
    );
    return response.body.items.map((replicaSet) => toReplicaSetRecord(replicaSet, this.labels));
  }

  async listControllerRevisions(target: WorkloadTarget): Promise<ReplicaGroupRecord[]> {
    const response = await this.appsV1Api.listNamespacedControllerRevision(
      target.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      this.workloadSelector(target)
    );
    return response.body.items.map((revision) => toControllerRevisionRecord(revision, this.labels));
  }

  /**
   * Deployment by name, falling back to a StatefulSet of the same name
   */
  async getApp(name: string, namespace: string): Promise<AppRecord | null> {
    try {
      const response = await this.appsV1Api.readNamespacedDeployment(name, namespace);
      return toAppRecord('Deployment', response.body, this.labels);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }

    try {
      const response = await this.appsV1Api.readNamespacedStatefulSet(name, namespace);
      return toAppRecord('StatefulSet', response.body, this.labels);
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug({ name, namespace }, 'No Deployment or StatefulSet found');
        return null;
      }
      throw error;
    }
  }

  async getAutoscaler(name: string, namespace: string): Promise<k8s.V2HorizontalPodAutoscaler | null> {
    try {
      const response = await this.autoscalingV2Api.readNamespacedHorizontalPodAutoscaler(name, namespace);
      return response.body;
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async getCustomResource(id: CustomResourceId): Promise<Record<string, unknown> | null> {
    try {
      const response = await this.customObjectsApi.getNamespacedCustomObject(
        id.apiGroup,
        id.apiVersion,
        id.namespace,
        id.plural,
        id.name
      );
      return isRecord(response.body) ? response.body : null;
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug({ kind: id.kind, name: id.name, namespace: id.namespace }, 'Custom resource not found');
        return null;
      }
      throw error;
    }
  }

  /**
   * Write the desired state annotation on the custom resource. The
   * resource's controller acts on it.
   */
  async setCustomResourceDesiredState(id: CustomResourceId, desiredState: SettableDesiredState): Promise<void> {
    const resource = await this.getCustomResource(id);
    if (!resource) {
      throw new NotFoundError(`${id.kind} ${id.namespace}/${id.name} not found`);
    }

    const metadata = isRecord(resource.metadata) ? resource.metadata : {};
    const annotations = isRecord(metadata.annotations) ? metadata.annotations : {};
    const updated = {
      ...resource,
      metadata: {
        ...metadata,
        annotations: {
          ...annotations,
          [this.labels.desiredState]: desiredState,
        },
      },
    };

    await this.customObjectsApi.replaceNamespacedCustomObject(
      id.apiGroup,
      id.apiVersion,
      id.namespace,
      id.plural,
      id.name,
      updated
    );
    logger.info({ kind: id.kind, name: id.name, desiredState }, `Set desired state of ${id.name} to ${desiredState}`);
  }

  async listNodes(labelSelector?: string): Promise<NodeRecord[]> {
    const response = await this.coreV1Api.listNode(undefined, undefined, undefined, undefined, labelSelector);
    return response.body.items.map(toNodeRecord);
  }

  async getPodEvents(podName: string, namespace: string): Promise<PodEventMessage[]> {
    const response = await this.coreV1Api.listNamespacedEvent(
      namespace,
      undefined,
      undefined,
      undefined,
      `involvedObject.name=${podName}`
    );

    return response.body.items.map((event) => ({
      message: event.message || '',
      timeStamp: (event.lastTimestamp || event.eventTime)?.toISOString(),
    }));
  }

  /**
   * Last lines of a container's log. Log read failures are reported in the
   * result rather than thrown; a missing log should not hide the pod.
   */
  async getContainerTailLines(
    podName: string,
    namespace: string,
    container: string,
    lines: number
  ): Promise<TailLines> {
    const tailLines: TailLines = { stdout: [], stderr: [] };
    if (lines <= 0) {
      return tailLines;
    }

    try {
      const response = await this.coreV1Api.readNamespacedPodLog(
        podName,
        namespace,
        container,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        lines
      );
      tailLines.stdout = response.body.split('\n').filter((line) => line.length > 0);
    } catch (error) {
      logger.debug(
        { podName, container, statusCode: getStatusCode(error) },
        'Could not read container logs'
      );
      tailLines.errorMessage = `Couldn't read logs of ${container}: ${errorMessage(error)}`;
    }
    return tailLines;
  }
}
