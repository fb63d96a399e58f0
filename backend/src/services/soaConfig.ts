import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { InstanceTypeName } from '@fleetstat/shared';
import logger from '../lib/logger';
import { ConfigurationError, NotFoundError } from '../lib/errors';
import { formatIssues } from '../lib/validation';
import { INSTANCE_TYPE_NAMES, isInstanceTypeName } from './instanceTypes';
import type { JobConfig, JobConfigLoader, ServiceNamespaceConfig } from './types';

/**
 * One instance entry of `<instanceType>-<cluster>.yaml`
 */
const jobConfigFileSchema = z.object({
  instances: z.number().int().min(0).optional(),
  desired_state: z.enum(['start', 'stop']).default('start'),
  bounce_method: z.string().default('crossover'),
  registrations: z.array(z.string().min(1)).optional(),
  pool: z.string().default('default'),
  namespace: z.string().default('fleetstat'),
  persistent_volumes: z.array(z.unknown()).default([]),
  min_instances: z.number().int().min(0).optional(),
  max_instances: z.number().int().min(0).optional(),
  autoscaling: z
    .object({
      decision_policy: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

const serviceNamespaceFileSchema = z.object({
  proxy_port: z.number().int().nullable().optional(),
  discover: z.string().default('region'),
});

const instanceFileSchema = z.record(z.unknown());

function isMissingFile(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
}

/**
 * Mesh namespace a job registers under: the part after the service name
 * of its first registration
 */
export function meshNamespace(job: JobConfig): string {
  const registration = job.registrations[0];
  const dot = registration.indexOf('.');
  return dot === -1 ? registration : registration.slice(dot + 1);
}

export function isAutoscalingEnabled(job: JobConfig): boolean {
  return job.maxInstances !== undefined;
}

/**
 * Reads per-service YAML config for one cluster from a config directory laid
 * out as `<soaDir>/<service>/<instanceType>-<cluster>.yaml` and
 * `<soaDir>/<service>/smartstack.yaml`.
 */
export class SoaConfigLoader implements JobConfigLoader {
  constructor(
    private readonly soaDir: string,
    private readonly cluster: string
  ) {}

  private async readYaml(path: string): Promise<Record<string, unknown> | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(text);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    const result = instanceFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(`Expected a mapping in ${path}`);
    }
    return result.data;
  }

  private instanceFilePath(service: string, instanceType: InstanceTypeName): string {
    return join(this.soaDir, service, `${instanceType}-${this.cluster}.yaml`);
  }

  /**
   * Instance entries of one file; keys starting with '_' are templates
   */
  private async readInstances(
    service: string,
    instanceType: InstanceTypeName
  ): Promise<Record<string, unknown>> {
    const entries = (await this.readYaml(this.instanceFilePath(service, instanceType))) || {};
    return Object.fromEntries(Object.entries(entries).filter(([name]) => !name.startsWith('_')));
  }

  private toJobConfig(service: string, instance: string, raw: unknown, path: string): JobConfig {
    const result = jobConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config for ${service}.${instance} in ${path}: ${formatIssues(result.error)}`
      );
    }
    const data = result.data;
    return {
      service,
      instance,
      cluster: this.cluster,
      instances: data.instances ?? data.min_instances ?? 1,
      desiredState: data.desired_state,
      bounceMethod: data.bounce_method,
      registrations: data.registrations && data.registrations.length > 0
        ? data.registrations
        : [`${service}.${instance}`],
      pool: data.pool,
      namespace: data.namespace,
      persistentVolumes: data.persistent_volumes,
      minInstances: data.min_instances,
      maxInstances: data.max_instances,
      autoscaling: {
        decisionPolicy: data.autoscaling.decision_policy,
      },
    };
  }

  async loadJobConfig(service: string, instance: string, instanceType: InstanceTypeName): Promise<JobConfig> {
    const path = this.instanceFilePath(service, instanceType);
    const instances = await this.readInstances(service, instanceType);
    if (!(instance in instances)) {
      throw new NotFoundError(
        `No ${instanceType} instance '${instance}' of service '${service}' in cluster '${this.cluster}'`
      );
    }
    return this.toJobConfig(service, instance, instances[instance], path);
  }

  async loadServiceNamespaceConfig(service: string, namespace: string): Promise<ServiceNamespaceConfig> {
    const path = join(this.soaDir, service, 'smartstack.yaml');
    const namespaces = (await this.readYaml(path)) || {};
    const result = serviceNamespaceFileSchema.safeParse(namespaces[namespace] ?? {});
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid mesh config for ${service}.${namespace} in ${path}: ${formatIssues(result.error)}`
      );
    }
    return {
      proxyPort: result.data.proxy_port ?? undefined,
      discover: result.data.discover,
    };
  }

  /**
   * Instances across the cluster expected to register as `<service>.<namespace>`
   */
  async expectedInstanceCountForNamespace(service: string, namespace: string): Promise<number> {
    const registration = `${service}.${namespace}`;
    const path = this.instanceFilePath(service, 'kubernetes');
    const instances = await this.readInstances(service, 'kubernetes');

    let total = 0;
    for (const [instance, raw] of Object.entries(instances)) {
      const job = this.toJobConfig(service, instance, raw, path);
      if (job.registrations.includes(registration)) {
        total += job.instances;
      }
    }
    return total;
  }

  async listInstances(service: string): Promise<Array<{ instance: string; instanceType: InstanceTypeName }>> {
    const found: Array<{ instance: string; instanceType: InstanceTypeName }> = [];
    for (const instanceType of INSTANCE_TYPE_NAMES) {
      const instances = await this.readInstances(service, instanceType);
      for (const instance of Object.keys(instances)) {
        found.push({ instance, instanceType });
      }
    }
    return found;
  }

  /**
   * Instance type declaring `instance`; the first type in table order wins
   */
  async resolveInstanceType(service: string, instance: string): Promise<InstanceTypeName> {
    const instances = await this.listInstances(service);
    const match = instances.find((entry) => entry.instance === instance);
    if (!match) {
      throw new NotFoundError(
        `Instance '${instance}' of service '${service}' is not configured in cluster '${this.cluster}'`
      );
    }
    return match.instanceType;
  }
}

/**
 * Clusters a service is deployed to, from its config file names
 */
export async function listClustersForService(soaDir: string, service: string): Promise<string[]> {
  let files: string[];
  try {
    files = await readdir(join(soaDir, service));
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigurationError(`Service '${service}' has no config directory in ${soaDir}`);
    }
    throw error;
  }

  const clusters = new Set<string>();
  for (const file of files) {
    const match = /^([a-z]+)-(.+)\.yaml$/.exec(file);
    if (match && isInstanceTypeName(match[1])) {
      clusters.add(match[2]);
    }
  }
  logger.debug({ service, clusters: [...clusters] }, `Found ${clusters.size} clusters for ${service}`);
  return [...clusters].sort();
}
