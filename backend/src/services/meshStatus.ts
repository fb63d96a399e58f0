import type { MeshBackend, MeshFlavor, MeshLocation, MeshStatus } from '@fleetstat/shared';
import logger from '../lib/logger';
import { ConfigurationError } from '../lib/errors';
import { meshProviderRegistry } from '../providers';
import { meshNamespace } from './soaConfig';
import type { StatusSettings } from './settings';
import type { JobConfig, MeshBackendRecord, PodRecord, ServiceNamespaceConfig } from './types';

export interface MeshStatusRequest {
  service: string;
  flavor: MeshFlavor;
  job: JobConfig;
  namespaceConfig: ServiceNamespaceConfig;
  pods: PodRecord[];
  includeBackends: boolean;
}

/**
 * Flag each backend with whether a pod of this instance owns its address.
 * Backends without a pod are kept.
 */
export function matchBackendsAndPods(backends: MeshBackendRecord[], pods: PodRecord[]): MeshBackend[] {
  const podAddresses = new Set(pods.flatMap((pod) => (pod.ip ? [pod.ip] : [])));
  return backends.map((backend) => ({
    ...backend,
    hasAssociatedTask: podAddresses.has(backend.address),
  }));
}

export function buildLocation(
  name: string,
  backends: MeshBackend[],
  expectedBackendsCount: number,
  includeBackends: boolean
): MeshLocation {
  return {
    name,
    expectedBackendsCount,
    runningBackendsCount: backends.filter((backend) => backend.health === 'UP').length,
    ...(includeBackends ? { backends } : {}),
  };
}

/**
 * Addresses of every backend reported in any location
 */
export function meshAddresses(status: MeshStatus): Set<string> {
  return new Set(
    status.locations.flatMap((location) => (location.backends || []).map((backend) => backend.address))
  );
}

/**
 * Mesh status of one instance for one flavor: for every location serving
 * the instance's pool, the backends the mesh reports at the first host of
 * that location, matched against the instance's pods.
 *
 * Any location failing to answer fails the whole flavor.
 */
export async function buildMeshStatus(request: MeshStatusRequest, settings: StatusSettings): Promise<MeshStatus> {
  const { service, flavor, job, namespaceConfig, pods, includeBackends } = request;
  const registration = job.registrations[0];
  const provider = meshProviderRegistry.getProvider(flavor);

  const hostsByLocation = await settings.topology.locationsAndHostsForPool(namespaceConfig.discover, job.pool);
  if (hostsByLocation.size === 0) {
    throw new ConfigurationError(
      `No locations found for pool '${job.pool}' at discover level '${namespaceConfig.discover}'`
    );
  }

  const expectedTotal = await settings.configLoader.expectedInstanceCountForNamespace(service, meshNamespace(job));
  const expectedPerLocation = Math.floor(expectedTotal / hostsByLocation.size);

  const locations: MeshLocation[] = [];
  for (const [location, hosts] of hostsByLocation) {
    const url = provider.adminUrl(hosts[0], settings.system);
    const payload = await settings.meshAdmin.fetchText(url);
    const backends = provider.parseBackends(payload, registration).sort((a, b) => provider.compareBackends(a, b));
    logger.debug({ registration, location, count: backends.length }, `Fetched ${provider.name} backends`);
    locations.push(buildLocation(location, matchBackendsAndPods(backends, pods), expectedPerLocation, includeBackends));
  }

  return {
    registration,
    expectedBackendsPerLocation: expectedPerLocation,
    locations,
  };
}
