import type { MeshInstanceResponse } from '@fleetstat/shared';
import type { ApiClient } from '@fleetstat/shared/api';
import { getEnvoyStatusHuman, getSmartstackStatusHuman } from './format';
import { apiErrorResult } from './report';
import type { InstanceSelection, TaskResult } from './batch';

export interface MeshStatusOptions {
  verbose: number;
  includeSmartstack: boolean;
}

/**
 * Mesh status of one instance, rendered for the terminal. A 405 means the
 * instance is not in the mesh; its message is shown as is.
 */
export async function meshStatusOnApiEndpoint(
  client: ApiClient,
  service: string,
  selection: InstanceSelection,
  options: MeshStatusOptions
): Promise<TaskResult> {
  let mesh: MeshInstanceResponse;
  try {
    mesh = await client.instances.mesh(service, selection.instance, {
      instanceType: selection.instanceType,
      verbose: options.verbose,
      includeSmartstack: options.includeSmartstack,
      includeEnvoy: true,
    });
  } catch (error) {
    return apiErrorResult(error);
  }

  const lines: string[] = [];
  if (mesh.smartstack) {
    lines.push(...getSmartstackStatusHuman(mesh.smartstack));
  }
  if (mesh.envoy) {
    lines.push(...getEnvoyStatusHuman(mesh.envoy));
  }
  return { exitCode: 0, lines };
}
