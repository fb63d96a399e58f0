import type { InstanceTypeName } from '@fleetstat/shared';
import { ConfigurationError } from '../lib/errors';

/**
 * API coordinates of a custom resource kind
 */
export interface CRDConfig {
  apiGroup: string;
  apiVersion: string;
  plural: string;
  kind: string;
}

export interface InstanceTypeCapabilities {
  /** Backed by a custom resource whose status is passed through */
  customResource: CRDConfig | null;
  /** Runs as native Deployments / StatefulSets with pods, versions and mesh status */
  schedulerNative: boolean;
  /** Desired state can be set through the custom resource */
  canSetState: boolean;
}

export const INSTANCE_TYPE_NAMES = [
  'kubernetes',
  'flink',
  'cassandracluster',
  'kafkacluster',
] as const satisfies readonly InstanceTypeName[];

export const INSTANCE_TYPES = {
  kubernetes: {
    customResource: null,
    schedulerNative: true,
    canSetState: false,
  },
  flink: {
    customResource: { apiGroup: 'flink.fleetstat.io', apiVersion: 'v1alpha1', plural: 'flinks', kind: 'Flink' },
    schedulerNative: false,
    canSetState: true,
  },
  cassandracluster: {
    customResource: {
      apiGroup: 'cassandra.fleetstat.io',
      apiVersion: 'v1alpha1',
      plural: 'cassandraclusters',
      kind: 'CassandraCluster',
    },
    schedulerNative: true,
    canSetState: false,
  },
  kafkacluster: {
    customResource: {
      apiGroup: 'kafka.fleetstat.io',
      apiVersion: 'v1beta1',
      plural: 'kafkaclusters',
      kind: 'KafkaCluster',
    },
    schedulerNative: false,
    canSetState: false,
  },
} as const satisfies Record<InstanceTypeName, InstanceTypeCapabilities>;

export function isInstanceTypeName(value: string): value is InstanceTypeName {
  return Object.prototype.hasOwnProperty.call(INSTANCE_TYPES, value);
}

/**
 * Resolve an instance type name, rejecting anything outside the table
 */
export function parseInstanceType(value: string): InstanceTypeName {
  if (!isInstanceTypeName(value)) {
    throw new ConfigurationError(
      `Unknown instance type: '${value}', can handle: ${INSTANCE_TYPE_NAMES.join(', ')}`
    );
  }
  return value;
}

export function capabilitiesOf(instanceType: InstanceTypeName): InstanceTypeCapabilities {
  return INSTANCE_TYPES[instanceType];
}

/**
 * Name under which workloads and custom resources of an instance are created:
 * lowercase, underscores turned into double dashes
 */
export function sanitisedName(service: string, instance: string): string {
  return `${service}-${instance}`.replace(/_/g, '--').toLowerCase();
}

/**
 * Namespace custom resources of a kind live in
 */
export function customResourceNamespace(crd: CRDConfig): string {
  return `fleetstat-${crd.plural}`;
}
