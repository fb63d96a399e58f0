import { STATUS_CODES } from 'node:http';
import chalk from 'chalk';
import { ApiError } from '@fleetstat/shared/api';
import type { InstanceSelection, Selection, TaskResult } from './batch';

function isConnectionError(error: Error): string | null {
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return 'TimeoutError';
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return 'ConnectionError';
  }
  return null;
}

/**
 * Report lines for a failed API call. The exit code is the HTTP status when
 * the API answered, 1 otherwise. Only a 405 carries a message worth showing:
 * the instance is outside the mesh or its type has no mesh status.
 */
export function apiErrorResult(error: unknown): TaskResult {
  if (error instanceof ApiError) {
    const line =
      error.statusCode === 405 ? error.message : error.reason || STATUS_CODES[error.statusCode] || error.message;
    return { exitCode: error.statusCode, lines: [chalk.red(line)] };
  }
  if (error instanceof Error) {
    const connection = isConnectionError(error);
    if (connection) {
      return { exitCode: 1, lines: [chalk.red(`Could not connect to API: ${connection}`)] };
    }
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    exitCode: 1,
    lines: [chalk.red('Exception when talking to the API:'), ...message.split('\n')],
  };
}

/**
 * Query every instance of a selection in turn and collect one report:
 * `service:` and `cluster:` headers, then each instance's lines indented
 * under it
 */
export async function reportForCluster(
  selection: Selection,
  perInstance: (instance: InstanceSelection) => Promise<TaskResult>
): Promise<TaskResult> {
  const lines = [`service: ${selection.service}`, `cluster: ${selection.cluster}`];
  let failed = false;

  for (const instance of selection.instances) {
    const result = await perInstance(instance);
    failed = failed || result.exitCode !== 0;
    lines.push(`  instance: ${chalk.cyan(instance.instance)}`);
    lines.push(...result.lines.map((line) => `    ${line}`));
  }

  return { exitCode: failed ? 1 : 0, lines };
}
