/**
 * Service instance status API
 */

import type { RequestFn } from './client';
import type {
  InstanceStatus,
  InstanceTypeName,
  MeshInstanceResponse,
  SetDesiredStateResponse,
  SettableDesiredState,
} from '../types';

export interface InstanceStatusOptions {
  instanceType?: InstanceTypeName;
  verbose?: number;
  includeSmartstack?: boolean;
  includeEnvoy?: boolean;
  useNew?: boolean;
}

export interface MeshStatusOptions {
  instanceType?: InstanceTypeName;
  verbose?: number;
  includeSmartstack?: boolean;
  includeEnvoy?: boolean;
}

export interface InstancesApi {
  /** Full status snapshot of one instance */
  status: (service: string, instance: string, options?: InstanceStatusOptions) => Promise<InstanceStatus>;

  /** Mesh status of one instance; 405 when the instance is not in the mesh */
  mesh: (service: string, instance: string, options?: MeshStatusOptions) => Promise<MeshInstanceResponse>;

  /** Set the desired state of a custom-resource instance */
  setState: (
    service: string,
    instance: string,
    desiredState: SettableDesiredState
  ) => Promise<SetDesiredStateResponse>;
}

function buildQuery(params: Record<string, string | number | boolean | undefined>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      query.set(key, String(value));
    }
  }
  const encoded = query.toString();
  return encoded ? `?${encoded}` : '';
}

function instancePath(service: string, instance: string): string {
  return `/services/${encodeURIComponent(service)}/instances/${encodeURIComponent(instance)}`;
}

export function createInstancesApi(request: RequestFn): InstancesApi {
  return {
    status: (service, instance, options = {}) =>
      request<InstanceStatus>(
        `${instancePath(service, instance)}/status${buildQuery({
          type: options.instanceType,
          verbose: options.verbose,
          includeSmartstack: options.includeSmartstack,
          includeEnvoy: options.includeEnvoy,
          new: options.useNew,
        })}`
      ),

    mesh: (service, instance, options = {}) =>
      request<MeshInstanceResponse>(
        `${instancePath(service, instance)}/mesh${buildQuery({
          type: options.instanceType,
          verbose: options.verbose,
          includeSmartstack: options.includeSmartstack,
          includeEnvoy: options.includeEnvoy,
        })}`
      ),

    setState: (service, instance, desiredState) =>
      request<SetDesiredStateResponse>(`${instancePath(service, instance)}/state`, {
        method: 'POST',
        body: JSON.stringify({ desiredState }),
      }),
  };
}
