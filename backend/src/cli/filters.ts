import { ConfigurationError } from '../lib/errors';
import { SoaConfigLoader, listClustersForService } from '../services/soaConfig';
import type { Selection } from './batch';

export interface FilterOptions {
  service: string;
  soaDir: string;
  clusters?: string[];
  instances?: string[];
}

/**
 * Split a comma separated option value
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Targets of a CLI run: the service's instances in every selected cluster,
 * narrowed by the cluster and instance filters. Clusters with no matching
 * instance are left out.
 */
export async function buildSelections(options: FilterOptions): Promise<Selection[]> {
  const clusters = options.clusters ?? (await listClustersForService(options.soaDir, options.service));
  const wanted = options.instances ? new Set(options.instances) : null;

  const selections: Selection[] = [];
  const seen = new Set<string>();
  for (const cluster of clusters) {
    const loader = new SoaConfigLoader(options.soaDir, cluster);
    const instances = (await loader.listInstances(options.service)).filter(
      (entry) => !wanted || wanted.has(entry.instance)
    );
    instances.forEach((entry) => seen.add(entry.instance));
    if (instances.length > 0) {
      selections.push({ cluster, service: options.service, instances });
    }
  }

  if (wanted) {
    const missing = [...wanted].filter((instance) => !seen.has(instance));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `${options.service} has no instance named ${missing.join(', ')} in clusters ${clusters.join(', ')}`
      );
    }
  }
  if (selections.length === 0) {
    throw new ConfigurationError(`No instances of ${options.service} found in ${options.soaDir}`);
  }
  return selections;
}
