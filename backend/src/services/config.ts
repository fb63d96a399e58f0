import { readFileSync } from 'node:fs';
import { z } from 'zod';
import logger from '../lib/logger';
import { ConfigurationError } from '../lib/errors';
import { formatIssues } from '../lib/validation';

const DEFAULT_CONFIG_PATH = '/etc/fleetstat/config.json';

/**
 * System configuration shared by the API server and the CLI
 */
export const systemConfigSchema = z.object({
  cluster: z.string().min(1).default('local'),
  soaDir: z.string().min(1).default('/etc/fleetstat/services'),
  port: z.number().int().min(1).max(65535).default(5054),
  /** Status API base URL per cluster, used by the CLI */
  apiEndpoints: z.record(z.string().url()).default({}),
  synapsePort: z.number().int().default(3212),
  synapseHaproxyUrlFormat: z.string().default('http://{host}:{port}/;csv;norefresh'),
  envoyAdminPort: z.number().int().default(9901),
  envoyAdminEndpointFormat: z.string().default('http://{host}:{port}/{endpoint}'),
  meshAdminTimeoutMs: z.number().int().min(1).default(5000),
  /** Discover level (region, zone, ...) to node label */
  locationLabels: z.record(z.string()).default({
    region: 'topology.kubernetes.io/region',
    zone: 'topology.kubernetes.io/zone',
  }),
  hostnameLabel: z.string().default('kubernetes.io/hostname'),
  poolLabel: z.string().default('fleetstat.io/pool'),
  labelPrefix: z.string().default('fleetstat.io'),
  fanoutConcurrency: z.number().int().min(1).default(20),
});

export type SystemConfig = z.infer<typeof systemConfigSchema>;

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Read a file's text; missing files yield null */
  readFile?: (path: string) => string | null;
}

function readFileOrNull(path: string): string | null {
  try {
    return readFileSync(path, 'utf8');
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const port = parseInt(value, 10);
  if (Number.isNaN(port)) {
    throw new ConfigurationError(`Invalid PORT: ${value}`);
  }
  return port;
}

/**
 * Load system config: defaults, then the JSON file, then environment
 */
export function loadSystemConfig(options: LoadConfigOptions = {}): SystemConfig {
  const env = options.env || process.env;
  const path = options.path || env.FLEETSTAT_CONFIG || DEFAULT_CONFIG_PATH;
  const readFile = options.readFile || readFileOrNull;

  let fileConfig: unknown = {};
  const text = readFile(path);
  if (text === null) {
    logger.debug({ path }, 'System config file not found, using defaults');
  } else {
    try {
      fileConfig = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const overrides = {
    cluster: env.FLEETSTAT_CLUSTER,
    soaDir: env.FLEETSTAT_SOA_DIR,
    port: parsePort(env.PORT),
  };

  const merged = {
    ...(fileConfig && typeof fileConfig === 'object' ? fileConfig : {}),
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
  };

  const result = systemConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid system config in ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Config Service
 * Loads the system configuration once and caches it
 */
class ConfigService {
  private cachedConfig: SystemConfig | null = null;

  getConfig(): SystemConfig {
    if (!this.cachedConfig) {
      this.cachedConfig = loadSystemConfig();
    }
    return this.cachedConfig;
  }
}

// Export singleton instance
export const configService = new ConfigService();
