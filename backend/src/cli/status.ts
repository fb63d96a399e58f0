import chalk from 'chalk';
import {
  isMeshStatusError,
  type CustomResourceStatus,
  type InstanceStatus,
  type KubernetesStatusV2,
  type MeshStatusResult,
  type PodStatus,
  type ReplicaVersion,
} from '@fleetstat/shared';
import type { ApiClient } from '@fleetstat/shared/api';
import { getEnvoyStatusHuman, getSmartstackStatusHuman, healthBand } from './format';
import { apiErrorResult } from './report';
import type { InstanceSelection, TaskResult } from './batch';

export interface StatusOptions {
  verbose: number;
  includeSmartstack: boolean;
  includeEnvoy: boolean;
}

function shortSha(sha: string | undefined): string {
  return sha ? sha.slice(0, 8) : 'unknown';
}

function podLine(pod: PodStatus): string {
  const state = pod.ready ? chalk.green('Ready') : chalk.red('Not ready');
  const reason = pod.reason ? ` (${pod.reason})` : '';
  return `${pod.name}  ${pod.host ?? 'unscheduled'}  ${state}${reason}`;
}

function versionLines(version: ReplicaVersion, verbose: number): string[] {
  const config = version.configSha ? ` config ${shortSha(version.configSha)}` : '';
  const lines = [
    `git ${shortSha(version.gitSha)}${config} - ${version.readyReplicas}/${version.replicas} ready (${version.name})`,
  ];
  if (verbose > 0) {
    lines.push(...version.pods.map((pod) => `  ${podLine(pod)}`));
  }
  return lines;
}

function meshLines(
  label: string,
  result: MeshStatusResult,
  render: typeof getEnvoyStatusHuman
): string[] {
  if (isMeshStatusError(result)) {
    return [chalk.red(`${label}: ERROR - ${result.error}`)];
  }
  return render(result);
}

export function kubernetesStatusHuman(status: KubernetesStatusV2, verbose: number): string[] {
  const band = healthBand(status.desiredInstances, status.currentInstances);
  const running = `${status.currentInstances}/${status.desiredInstances}`;
  const lines = [
    `App: ${status.appName}`,
    `State: ${status.desiredState} - Bounce method: ${status.bounceMethod}`,
    `Running instances: ${band === 'Healthy' ? chalk.green(running) : chalk.yellow(running)}`,
  ];
  if (status.evictedCount > 0) {
    lines.push(chalk.yellow(`Evicted pods: ${status.evictedCount}`));
  }
  if (status.autoscaling) {
    const { minInstances, maxInstances, desiredReplicas } = status.autoscaling;
    lines.push(`Autoscaling: min ${minInstances}, max ${maxInstances}, desired ${desiredReplicas}`);
    for (const metric of status.autoscaling.metrics) {
      lines.push(`  ${metric.name}: ${metric.currentValue ?? '-'} / ${metric.targetValue ?? '-'}`);
    }
  }
  if (status.errorMessage) {
    lines.push(chalk.red(status.errorMessage));
  }
  lines.push('Versions:');
  if (status.versions.length === 0) {
    lines.push('  none');
  }
  for (const version of status.versions) {
    lines.push(...versionLines(version, verbose).map((line) => `  ${line}`));
  }
  if (status.smartstack) {
    lines.push(...meshLines('Smartstack', status.smartstack, getSmartstackStatusHuman));
  }
  if (status.envoy) {
    lines.push(...meshLines('Envoy', status.envoy, getEnvoyStatusHuman));
  }
  return lines;
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Top-level scalar fields of a custom resource's status; nested objects are
 * only shown at higher verbosity
 */
export function customResourceStatusHuman(resource: CustomResourceStatus, verbose: number): string[] {
  const status = resource.status;
  if (!status) {
    return [chalk.yellow('Custom resource has no status yet')];
  }
  const lines = ['Custom resource status:'];
  for (const [key, value] of Object.entries(status)) {
    if (isScalar(value)) {
      lines.push(`  ${key}: ${value}`);
    } else if (verbose > 1) {
      lines.push(`  ${key}: ${JSON.stringify(value)}`);
    }
  }
  return lines;
}

export function instanceStatusHuman(status: InstanceStatus, verbose: number): string[] {
  const lines: string[] = [];
  if (status.kubernetesV2) {
    lines.push(...kubernetesStatusHuman(status.kubernetesV2, verbose));
  }
  if (status.customResource) {
    lines.push(...customResourceStatusHuman(status.customResource, verbose));
  }
  if (lines.length === 0) {
    lines.push(chalk.yellow(`No status available for ${status.instanceType} instance`));
  }
  return lines;
}

/**
 * Status of one instance in the per-version shape, rendered for the terminal
 */
export async function statusOnApiEndpoint(
  client: ApiClient,
  service: string,
  selection: InstanceSelection,
  options: StatusOptions
): Promise<TaskResult> {
  let status: InstanceStatus;
  try {
    status = await client.instances.status(service, selection.instance, {
      instanceType: selection.instanceType,
      verbose: options.verbose,
      includeSmartstack: options.includeSmartstack,
      includeEnvoy: options.includeEnvoy,
      useNew: true,
    });
  } catch (error) {
    return apiErrorResult(error);
  }
  return { exitCode: 0, lines: instanceStatusHuman(status, options.verbose) };
}
