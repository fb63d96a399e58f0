import type { MeshHealth } from '@fleetstat/shared';
import type { MeshAdminSettings, MeshProvider } from '../types';
import type { MeshBackendRecord } from '../../services/types';
import { formatAdminUrl } from '../../services/meshAdmin';
import { haproxyStatsRowSchema, type HaproxyStatsRow } from './schema';

const AGGREGATE_ROWS = new Set(['FRONTEND', 'BACKEND']);

function toHealth(status: string): MeshHealth {
  if (status.startsWith('UP')) return 'UP';
  if (status.startsWith('DOWN')) return 'DOWN';
  if (status.startsWith('MAINT')) return 'MAINT';
  return 'OTHER';
}

function optionalInt(value: string): number | undefined {
  if (value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse HAProxy's CSV stats. The header line starts with '# '.
 */
export function parseHaproxyCsv(payload: string): HaproxyStatsRow[] {
  const lines = payload.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return [];
  }

  const header = lines[0].replace(/^#\s*/, '').split(',');
  return lines.slice(1).map((line, index) => {
    const cells = line.split(',');
    const row = Object.fromEntries(header.map((column, i) => [column, cells[i] ?? '']));
    const result = haproxyStatsRowSchema.safeParse(row);
    if (!result.success) {
      throw new Error(`Malformed HAProxy stats row ${index + 1}: ${result.error.errors[0]?.message}`);
    }
    return result.data;
  });
}

/**
 * Server names are `<ip>:<port>_<hostname>`
 */
function toBackend(row: HaproxyStatsRow): MeshBackendRecord {
  const separator = row.svname.indexOf('_');
  const endpoint = separator === -1 ? row.svname : row.svname.slice(0, separator);
  const hostname = separator === -1 ? row.svname : row.svname.slice(separator + 1);
  const colon = endpoint.lastIndexOf(':');

  return {
    hostname,
    address: colon === -1 ? endpoint : endpoint.slice(0, colon),
    port: colon === -1 ? 0 : parseInt(endpoint.slice(colon + 1), 10) || 0,
    health: toHealth(row.status),
    status: row.status,
    checkStatus: row.check_status,
    checkCode: row.check_code,
    checkDurationMs: optionalInt(row.check_duration),
    lastChangeSeconds: optionalInt(row.lastchg),
  };
}

/**
 * Smartstack Provider
 * Reads backends from the HAProxy stats page exposed by Synapse
 */
export class SmartstackProvider implements MeshProvider {
  id = 'smartstack' as const;
  name = 'Smartstack';

  adminUrl(host: string, settings: MeshAdminSettings): string {
    return formatAdminUrl(settings.synapseHaproxyUrlFormat, { host, port: settings.synapsePort });
  }

  parseBackends(payload: string, registration: string): MeshBackendRecord[] {
    return parseHaproxyCsv(payload)
      .filter((row) => row.pxname === registration && !AGGREGATE_ROWS.has(row.svname))
      .map(toBackend);
  }

  /**
   * Descending by status label, which puts UP above MAINT
   */
  compareBackends(a: MeshBackendRecord, b: MeshBackendRecord): number {
    if (a.status === b.status) return 0;
    return a.status > b.status ? -1 : 1;
  }
}

export const smartstackProvider = new SmartstackProvider();
