import logger from '../lib/logger';
import { ConfigurationError } from '../lib/errors';
import type { SystemConfig } from './config';
import type { OrchestrationClient, TopologyResolver } from './types';

/**
 * Resolves locations from node labels: nodes of a pool are grouped by the
 * label configured for the discover level (region, zone, ...).
 */
export class NodeTopologyResolver implements TopologyResolver {
  constructor(
    private readonly kube: OrchestrationClient,
    private readonly config: Pick<SystemConfig, 'locationLabels' | 'hostnameLabel' | 'poolLabel'>
  ) {}

  async locationsAndHostsForPool(discover: string, pool: string): Promise<Map<string, string[]>> {
    const locationLabel = this.config.locationLabels[discover];
    if (!locationLabel) {
      throw new ConfigurationError(
        `Unknown discover level '${discover}', known: ${Object.keys(this.config.locationLabels).join(', ')}`
      );
    }

    const nodes = await this.kube.listNodes(`${this.config.poolLabel}=${pool}`);
    const hostsByLocation = new Map<string, string[]>();
    for (const node of nodes) {
      const location = node.labels[locationLabel];
      if (!location) {
        continue;
      }
      const hosts = hostsByLocation.get(location) || [];
      hosts.push(node.labels[this.config.hostnameLabel] || node.name);
      hostsByLocation.set(location, hosts);
    }

    const sorted = new Map(
      [...hostsByLocation.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([location, hosts]): [string, string[]] => [location, [...hosts].sort()])
    );
    logger.debug({ discover, pool, locations: [...sorted.keys()] }, 'Resolved mesh locations');
    return sorted;
  }
}
