import chalk from 'chalk';
import { Command } from 'commander';
import { createApiClient, type ApiClient } from '@fleetstat/shared/api';
import { StatusError } from '../lib/errors';
import { loadSystemConfig, type SystemConfig } from '../services/config';
import { runBatch, type InstanceSelection, type Selection, type TaskResult } from './batch';
import { buildSelections, parseList } from './filters';
import { meshStatusOnApiEndpoint } from './meshStatus';
import { reportForCluster } from './report';
import { statusOnApiEndpoint } from './status';

/** Exit code for bad arguments or config, before anything is fetched */
export const USAGE_EXIT_CODE = 2;

export interface CliDependencies {
  loadConfig?: (path: string | undefined) => SystemConfig;
  createClient?: (baseUrl: string) => ApiClient;
  print?: (text: string) => void;
  setExitCode?: (code: number) => void;
}

interface CommonOptions {
  service: string;
  clusters?: string[];
  instances?: string[];
  verbose: number;
  soaDir?: string;
  config?: string;
}

interface StatusCommandOptions extends CommonOptions {
  smartstack?: boolean;
  envoy?: boolean;
}

interface MeshStatusCommandOptions extends CommonOptions {
  smartstack?: boolean;
}

type InstanceTask = (client: ApiClient, service: string, instance: InstanceSelection) => Promise<TaskResult>;

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function addCommonOptions(command: Command): Command {
  return command
    .requiredOption('-s, --service <service>', 'service to report on')
    .option('-c, --clusters <clusters>', 'comma separated clusters to query', parseList)
    .option('-i, --instances <instances>', 'comma separated instances to query', parseList)
    .option('-v, --verbose', 'show more detail, repeat for more', increaseVerbosity, 0)
    .option('-d, --soa-dir <dir>', 'service config directory')
    .option('--config <path>', 'system config file');
}

export function createProgram(deps: CliDependencies = {}): Command {
  const loadConfig = deps.loadConfig ?? ((path) => loadSystemConfig({ path }));
  const createClient = deps.createClient ?? ((baseUrl) => createApiClient({ baseUrl }));
  const print = deps.print ?? ((text) => console.log(text));
  const setExitCode =
    deps.setExitCode ??
    ((code) => {
      process.exitCode = code;
    });

  const run = async (options: CommonOptions, task: InstanceTask): Promise<number> => {
    let config: SystemConfig;
    let selections: Selection[];
    try {
      config = loadConfig(options.config);
      selections = await buildSelections({
        service: options.service,
        soaDir: options.soaDir ?? config.soaDir,
        clusters: options.clusters,
        instances: options.instances,
      });
      const unknown = selections.filter((selection) => !config.apiEndpoints[selection.cluster]);
      if (unknown.length > 0) {
        throw new StatusError(
          `No status API endpoint configured for ${unknown.map((selection) => selection.cluster).join(', ')}`,
          400
        );
      }
    } catch (error) {
      if (error instanceof StatusError) {
        print(chalk.red(error.message));
        return USAGE_EXIT_CODE;
      }
      throw error;
    }

    return runBatch(
      selections,
      (selection) => {
        const client = createClient(config.apiEndpoints[selection.cluster]);
        return reportForCluster(selection, (instance) => task(client, selection.service, instance));
      },
      {
        concurrency: config.fanoutConcurrency,
        onResult: (result) => print(result.lines.join('\n')),
      }
    );
  };

  const program = new Command();
  program.name('fleetstat').description('Runtime status of service instances across clusters');

  addCommonOptions(program.command('status').description('Show the status of service instances'))
    .option('--smartstack', 'include smartstack mesh status')
    .option('--envoy', 'include envoy mesh status')
    .action(async (options: StatusCommandOptions) => {
      const code = await run(options, (client, service, instance) =>
        statusOnApiEndpoint(client, service, instance, {
          verbose: options.verbose,
          includeSmartstack: options.smartstack ?? false,
          includeEnvoy: options.envoy ?? false,
        })
      );
      setExitCode(code);
    });

  addCommonOptions(
    program.command('mesh-status').description('Show the service mesh status of service instances')
  )
    .option('--smartstack', 'include smartstack alongside envoy')
    .action(async (options: MeshStatusCommandOptions) => {
      const code = await run(options, (client, service, instance) =>
        meshStatusOnApiEndpoint(client, service, instance, {
          verbose: options.verbose,
          includeSmartstack: options.smartstack ?? false,
        })
      );
      setExitCode(code);
    });

  return program;
}
