import type * as k8s from '@kubernetes/client-node';
import type { InstanceTypeName, PodEventMessage, SettableDesiredState, TailLines } from '@fleetstat/shared';
import { NotFoundError } from '../lib/errors';
import { systemConfigSchema, type SystemConfig } from '../services/config';
import type { StatusSettings } from '../services/settings';
import type {
  AppRecord,
  CustomResourceId,
  JobConfig,
  JobConfigLoader,
  MeshAdminClient,
  NodeRecord,
  OrchestrationClient,
  PodRecord,
  ReplicaGroupRecord,
  ServiceNamespaceConfig,
  TopologyResolver,
  WorkloadTarget,
} from '../services/types';

/**
 * In-process stand-ins for the cluster, the mesh admin endpoints and the
 * service config directory
 */

export function makePod(overrides: Partial<PodRecord> = {}): PodRecord {
  return {
    name: 'web-main-abc12',
    namespace: 'fleetstat',
    ip: '10.0.0.1',
    hostIp: '192.168.0.1',
    nodeName: 'node-1',
    phase: 'Running',
    ownerReferences: [],
    createdAt: 1000,
    scheduled: true,
    schedulerReady: true,
    containers: [],
    ...overrides,
  };
}

export function makeReplicaSet(overrides: Partial<ReplicaGroupRecord> = {}): ReplicaGroupRecord {
  return {
    kind: 'ReplicaSet',
    name: 'web-main-rs1',
    replicas: 1,
    readyReplicas: 1,
    createdAt: 1000,
    gitSha: 'aaaaaaaa',
    configSha: 'config1',
    ...overrides,
  };
}

export function makeJob(overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    service: 'web',
    instance: 'main',
    cluster: 'test-cluster',
    instances: 2,
    desiredState: 'start',
    bounceMethod: 'crossover',
    registrations: ['web.main'],
    pool: 'default',
    namespace: 'fleetstat',
    persistentVolumes: [],
    autoscaling: {},
    ...overrides,
  };
}

export class FakeOrchestrationClient implements OrchestrationClient {
  pods: PodRecord[] = [];
  replicaSets: ReplicaGroupRecord[] = [];
  controllerRevisions: ReplicaGroupRecord[] = [];
  app: AppRecord | null = null;
  autoscaler: k8s.V2HorizontalPodAutoscaler | null = null;
  autoscalerError: Error | null = null;
  customResources = new Map<string, Record<string, unknown>>();
  setStateError: Error | null = null;
  desiredStates: Array<{ id: CustomResourceId; desiredState: SettableDesiredState }> = [];
  nodes: NodeRecord[] = [];
  nodeSelectors: Array<string | undefined> = [];
  events: PodEventMessage[] = [];

  async listPods(_target: WorkloadTarget): Promise<PodRecord[]> {
    return this.pods;
  }

  async listReplicaSets(_target: WorkloadTarget): Promise<ReplicaGroupRecord[]> {
    return this.replicaSets;
  }

  async listControllerRevisions(_target: WorkloadTarget): Promise<ReplicaGroupRecord[]> {
    return this.controllerRevisions;
  }

  async getApp(_name: string, _namespace: string): Promise<AppRecord | null> {
    return this.app;
  }

  async getAutoscaler(_name: string, _namespace: string): Promise<k8s.V2HorizontalPodAutoscaler | null> {
    if (this.autoscalerError) {
      throw this.autoscalerError;
    }
    return this.autoscaler;
  }

  async getCustomResource(id: CustomResourceId): Promise<Record<string, unknown> | null> {
    return this.customResources.get(`${id.namespace}/${id.name}`) ?? null;
  }

  async setCustomResourceDesiredState(id: CustomResourceId, desiredState: SettableDesiredState): Promise<void> {
    if (this.setStateError) {
      throw this.setStateError;
    }
    this.desiredStates.push({ id, desiredState });
  }

  async listNodes(labelSelector?: string): Promise<NodeRecord[]> {
    this.nodeSelectors.push(labelSelector);
    return this.nodes;
  }

  async getPodEvents(_podName: string, _namespace: string): Promise<PodEventMessage[]> {
    return this.events;
  }

  async getContainerTailLines(
    _podName: string,
    _namespace: string,
    container: string,
    lines: number
  ): Promise<TailLines> {
    return { stdout: lines > 0 ? [`${container} started`] : [], stderr: [] };
  }
}

/**
 * Serves canned admin payloads by URL; unknown URLs fail like an
 * unreachable host
 */
export class FakeMeshAdminClient implements MeshAdminClient {
  payloads = new Map<string, string>();
  requested: string[] = [];

  async fetchText(url: string): Promise<string> {
    this.requested.push(url);
    const payload = this.payloads.get(url);
    if (payload === undefined) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return payload;
  }
}

export class FakeTopologyResolver implements TopologyResolver {
  constructor(public locations: Map<string, string[]> = new Map([['uswest1', ['host-a']]])) {}

  async locationsAndHostsForPool(_discover: string, _pool: string): Promise<Map<string, string[]>> {
    return this.locations;
  }
}

export class FakeJobConfigLoader implements JobConfigLoader {
  jobs = new Map<string, { instanceType: InstanceTypeName; job: JobConfig }>();
  namespaces = new Map<string, ServiceNamespaceConfig>();

  addJob(instanceType: InstanceTypeName, job: JobConfig): this {
    this.jobs.set(`${job.service}.${job.instance}`, { instanceType, job });
    return this;
  }

  async loadJobConfig(service: string, instance: string, _instanceType: InstanceTypeName): Promise<JobConfig> {
    const entry = this.jobs.get(`${service}.${instance}`);
    if (!entry) {
      throw new NotFoundError(`No config for ${service}.${instance}`);
    }
    return entry.job;
  }

  async loadServiceNamespaceConfig(service: string, namespace: string): Promise<ServiceNamespaceConfig> {
    return this.namespaces.get(`${service}.${namespace}`) ?? { discover: 'region' };
  }

  async expectedInstanceCountForNamespace(service: string, namespace: string): Promise<number> {
    let total = 0;
    for (const { job } of this.jobs.values()) {
      if (job.service === service && job.registrations.includes(`${service}.${namespace}`)) {
        total += job.instances;
      }
    }
    return total;
  }

  async resolveInstanceType(service: string, instance: string): Promise<InstanceTypeName> {
    const entry = this.jobs.get(`${service}.${instance}`);
    if (!entry) {
      throw new NotFoundError(`${service}.${instance} not found in any instance type config`);
    }
    return entry.instanceType;
  }

  async listInstances(service: string): Promise<Array<{ instance: string; instanceType: InstanceTypeName }>> {
    return [...this.jobs.values()]
      .filter(({ job }) => job.service === service)
      .map(({ job, instanceType }) => ({ instance: job.instance, instanceType }));
  }
}

export interface FakeSettings extends StatusSettings {
  kube: FakeOrchestrationClient;
  meshAdmin: FakeMeshAdminClient;
  topology: FakeTopologyResolver;
  configLoader: FakeJobConfigLoader;
}

export function testSystemConfig(overrides: Partial<SystemConfig> = {}): SystemConfig {
  return { ...systemConfigSchema.parse({ cluster: 'test-cluster' }), ...overrides };
}

export function makeSettings(): FakeSettings {
  return {
    cluster: 'test-cluster',
    system: testSystemConfig(),
    kube: new FakeOrchestrationClient(),
    meshAdmin: new FakeMeshAdminClient(),
    topology: new FakeTopologyResolver(),
    configLoader: new FakeJobConfigLoader(),
  };
}

/** Envoy admin URL for a host under the default config */
export function envoyUrl(host: string): string {
  return `http://${host}:9901/clusters?format=json`;
}

/** HAProxy stats URL for a host under the default config */
export function haproxyUrl(host: string): string {
  return `http://${host}:3212/;csv;norefresh`;
}

export function envoyPayload(
  registration: string,
  hosts: Array<{ address: string; port?: number; health: string; hostname?: string }>
): string {
  return JSON.stringify({
    cluster_statuses: [
      {
        name: `${registration}.egress_cluster`,
        host_statuses: hosts.map((host) => ({
          address: { socket_address: { address: host.address, port_value: host.port ?? 8888 } },
          health_status: { eds_health_status: host.health },
          weight: 1,
          ...(host.hostname ? { hostname: host.hostname } : {}),
        })),
      },
    ],
  });
}

const HAPROXY_HEADER = '# pxname,svname,qcur,status,weight,check_status,check_code,check_duration,lastchg';

export function haproxyPayload(
  rows: Array<{ pxname: string; svname: string; status: string; lastchg?: string }>
): string {
  return [
    HAPROXY_HEADER,
    ...rows.map((row) => `${row.pxname},${row.svname},0,${row.status},1,L7OK,200,3,${row.lastchg ?? '60'}`),
    '',
  ].join('\n');
}
