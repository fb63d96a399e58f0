import type {
  CustomResourceStatus,
  InstanceMeshStatus,
  InstanceStatus,
  InstanceTypeName,
  SetDesiredStateResponse,
  SettableDesiredState,
} from '@fleetstat/shared';
import logger from '../lib/logger';
import {
  MeshNotConfiguredError,
  MeshNotSupportedError,
  StatusError,
  errorMessage,
  getStatusCode,
} from '../lib/errors';
import {
  capabilitiesOf,
  customResourceNamespace,
  parseInstanceType,
  sanitisedName,
  type CRDConfig,
} from './instanceTypes';
import { kubernetesStatus, kubernetesStatusV2 } from './kubernetesStatus';
import { buildMeshStatus } from './meshStatus';
import { meshNamespace } from './soaConfig';
import type { StatusSettings } from './settings';
import type { CustomResourceId } from './types';

export interface InstanceStatusRequest {
  service: string;
  instance: string;
  /** Checked against the known instance types */
  instanceType: string;
  verbose: number;
  includeSmartstack: boolean;
  includeEnvoy: boolean;
  /** Per-version shape instead of the per-pod / per-replicaset one */
  useNew: boolean;
}

export interface MeshStatusQuery {
  service: string;
  instance: string;
  instanceType: string;
  verbose: number;
  includeSmartstack: boolean;
  includeEnvoy: boolean;
}

export interface SetDesiredStateRequest {
  service: string;
  instance: string;
  instanceType: string;
  desiredState: SettableDesiredState;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function customResourceId(crd: CRDConfig, service: string, instance: string): CustomResourceId {
  return {
    ...crd,
    namespace: customResourceNamespace(crd),
    name: sanitisedName(service, instance),
  };
}

/**
 * Status and metadata of the instance's custom resource, as the controller
 * reports them. A missing resource yields an empty status.
 */
export async function customResourceStatus(
  service: string,
  instance: string,
  crd: CRDConfig,
  settings: StatusSettings
): Promise<CustomResourceStatus> {
  if (!settings.kube) {
    return {};
  }
  const resource: Record<string, unknown> =
    (await settings.kube.getCustomResource(customResourceId(crd, service, instance))) ?? {};

  const status: CustomResourceStatus = {};
  if (isRecord(resource.status)) status.status = resource.status;
  if (isRecord(resource.metadata)) status.metadata = resource.metadata;
  return status;
}

/**
 * Status snapshot of one service instance, built from whatever backs its
 * instance type: a custom resource, native workloads, or both.
 *
 * @throws ConfigurationError for an unknown instance type
 */
export async function instanceStatus(
  request: InstanceStatusRequest,
  settings: StatusSettings
): Promise<InstanceStatus> {
  const instanceType = parseInstanceType(request.instanceType);
  const capabilities = capabilitiesOf(instanceType);
  const { service, instance } = request;

  const status: InstanceStatus = {
    cluster: settings.cluster,
    service,
    instance,
    instanceType,
  };

  if (capabilities.customResource) {
    status.customResource = await customResourceStatus(service, instance, capabilities.customResource, settings);
  }

  if (capabilities.schedulerNative && settings.kube) {
    const job = await settings.configLoader.loadJobConfig(service, instance, instanceType);
    const options = {
      verbose: request.verbose,
      includeSmartstack: request.includeSmartstack,
      includeEnvoy: request.includeEnvoy,
    };
    if (request.useNew) {
      status.kubernetesV2 = await kubernetesStatusV2(job, options, settings.kube, settings);
    } else {
      status.kubernetes = await kubernetesStatus(job, options, settings.kube, settings);
    }
  }

  logger.debug({ service, instance, instanceType, useNew: request.useNew }, 'Built instance status');
  return status;
}

/**
 * Mesh status of a scheduler-native instance, without the rest of its status.
 * Mesh failures propagate here: the mesh status is the whole answer.
 */
export async function kubernetesMeshStatus(
  request: MeshStatusQuery,
  settings: StatusSettings
): Promise<InstanceMeshStatus> {
  if (!request.includeSmartstack && !request.includeEnvoy) {
    return {};
  }

  const instanceType = parseInstanceType(request.instanceType);
  const { service, instance } = request;
  if (!capabilitiesOf(instanceType).schedulerNative) {
    throw new MeshNotSupportedError(instanceType);
  }

  const job = await settings.configLoader.loadJobConfig(service, instance, instanceType);
  const namespaceConfig = await settings.configLoader.loadServiceNamespaceConfig(service, meshNamespace(job));
  if (namespaceConfig.proxyPort === undefined) {
    throw new MeshNotConfiguredError(service, instance);
  }

  if (!settings.kube) {
    return {};
  }
  const pods = await settings.kube.listPods({ service, instance, namespace: job.namespace });

  const includeBackends = request.verbose > 0;
  const mesh: InstanceMeshStatus = {};
  if (request.includeSmartstack) {
    mesh.smartstack = await buildMeshStatus(
      { service, flavor: 'smartstack', job, namespaceConfig, pods, includeBackends },
      settings
    );
  }
  if (request.includeEnvoy) {
    mesh.envoy = await buildMeshStatus(
      { service, flavor: 'envoy', job, namespaceConfig, pods, includeBackends },
      settings
    );
  }
  return mesh;
}

export function canSetState(instanceType: InstanceTypeName): boolean {
  return capabilitiesOf(instanceType).canSetState;
}

/**
 * Ask the controller of a custom-resource instance to start or stop it
 */
export async function setCustomResourceDesiredState(
  request: SetDesiredStateRequest,
  settings: StatusSettings
): Promise<SetDesiredStateResponse> {
  const instanceType = parseInstanceType(request.instanceType);
  const { service, instance, desiredState } = request;
  const crd = capabilitiesOf(instanceType).customResource;

  if (!crd || !canSetState(instanceType)) {
    throw new StatusError(`Setting desired state is not supported for instance type '${instanceType}'`, 405);
  }
  if (!settings.kube) {
    throw new StatusError('No Kubernetes access configured for this cluster', 503);
  }

  try {
    await settings.kube.setCustomResourceDesiredState(customResourceId(crd, service, instance), desiredState);
  } catch (error) {
    throw new StatusError(
      `Error while setting state ${desiredState} of ${service}.${instance}: ${errorMessage(error)}`,
      getStatusCode(error) ?? 500
    );
  }

  return {
    message: `Desired state of ${service}.${instance} set to ${desiredState}`,
    desiredState,
  };
}
