import type { MeshHealth } from '@fleetstat/shared';
import type { MeshAdminSettings, MeshProvider } from '../types';
import type { MeshBackendRecord } from '../../services/types';
import { formatAdminUrl } from '../../services/meshAdmin';
import { envoyClustersSchema, type EnvoyHostStatus } from './schema';

function toHealth(status: string): MeshHealth {
  switch (status) {
    case 'HEALTHY':
      return 'UP';
    case 'UNHEALTHY':
    case 'TIMEOUT':
      return 'DOWN';
    case 'DRAINING':
      return 'MAINT';
    default:
      return 'OTHER';
  }
}

function toBackend(host: EnvoyHostStatus): MeshBackendRecord {
  const status = host.health_status.eds_health_status;
  return {
    hostname: host.hostname || host.address.socket_address.address,
    address: host.address.socket_address.address,
    port: host.address.socket_address.port_value,
    health: toHealth(status),
    status,
    weight: host.weight,
  };
}

/**
 * Envoy Provider
 * Reads backends of the egress cluster from the Envoy admin interface
 */
export class EnvoyProvider implements MeshProvider {
  id = 'envoy' as const;
  name = 'Envoy';

  adminUrl(host: string, settings: MeshAdminSettings): string {
    return formatAdminUrl(settings.envoyAdminEndpointFormat, {
      host,
      port: settings.envoyAdminPort,
      endpoint: 'clusters?format=json',
    });
  }

  parseBackends(payload: string, registration: string): MeshBackendRecord[] {
    const result = envoyClustersSchema.safeParse(JSON.parse(payload));
    if (!result.success) {
      throw new Error(`Malformed Envoy clusters response: ${result.error.errors[0]?.message}`);
    }

    const clusterName = `${registration}.egress_cluster`;
    return result.data.cluster_statuses
      .filter((cluster) => cluster.name === clusterName)
      .flatMap((cluster) => cluster.host_statuses.map(toBackend));
  }

  // Ascending by EDS health label
  compareBackends(a: MeshBackendRecord, b: MeshBackendRecord): number {
    if (a.status === b.status) return 0;
    return a.status < b.status ? -1 : 1;
  }
}

export const envoyProvider = new EnvoyProvider();
