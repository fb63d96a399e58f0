import type { InstanceTypeName } from '@fleetstat/shared';
import logger from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { processPooled } from '../lib/pool';

export interface InstanceSelection {
  instance: string;
  instanceType: InstanceTypeName;
}

/**
 * Instances of one service in one cluster
 */
export interface Selection {
  cluster: string;
  service: string;
  instances: InstanceSelection[];
}

export interface TaskResult {
  exitCode: number;
  lines: string[];
}

export interface BatchOptions {
  concurrency: number;
  /** Called as each target completes, in completion order */
  onResult?: (result: TaskResult, selection: Selection) => void;
}

/**
 * Run `task` for every (cluster, service) selection on a bounded pool.
 * A failing target never cancels the others; its error becomes its result.
 * Returns 1 when any target failed, 0 otherwise.
 */
export async function runBatch(
  selections: Selection[],
  task: (selection: Selection) => Promise<TaskResult>,
  options: BatchOptions
): Promise<number> {
  const settle = async (selection: Selection): Promise<TaskResult> => {
    try {
      return await task(selection);
    } catch (error) {
      logger.debug({ cluster: selection.cluster, service: selection.service, error: errorMessage(error) }, 'Task failed');
      return {
        exitCode: 1,
        lines: [`service: ${selection.service}`, `cluster: ${selection.cluster}`, `  ${errorMessage(error)}`],
      };
    }
  };

  const results = await processPooled(selections, settle, options.concurrency, options.onResult);
  return results.some((result) => result.exitCode !== 0) ? 1 : 0;
}
