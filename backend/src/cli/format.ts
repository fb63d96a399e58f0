import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';
import type { MeshBackend, MeshStatus } from '@fleetstat/shared';

export type HealthBand = 'Healthy' | 'Warning' | 'Critical';

/**
 * Healthy at or above the expected count, critical below half of it
 */
export function healthBand(expected: number, running: number): HealthBand {
  if (running >= expected) return 'Healthy';
  if (running < expected / 2) return 'Critical';
  return 'Warning';
}

function colorBand(band: HealthBand, text: string): string {
  switch (band) {
    case 'Healthy':
      return chalk.green(text);
    case 'Warning':
      return chalk.yellow(text);
    case 'Critical':
      return chalk.red(text);
  }
}

export function backendReport(proxy: string, expected: number, running: number): string {
  const band = healthBand(expected, running);
  const count = colorBand(band, `(${running}/${expected})`);
  return `${colorBand(band, band)} - in ${proxy} with ${count} total backends UP in this namespace.`;
}

export function formatAgo(seconds: number): string {
  const units: Array<[string, number]> = [
    ['day', 86400],
    ['hour', 3600],
    ['minute', 60],
  ];
  for (const [unit, size] of units) {
    if (seconds >= size) {
      const count = Math.floor(seconds / size);
      return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
    }
  }
  return seconds === 1 ? '1 second ago' : `${seconds} seconds ago`;
}

/**
 * Left-aligned columns separated by two spaces; widths ignore color codes
 */
export function formatTable(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, stripVTControlCharacters(cell).length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) =>
        i === row.length - 1 ? cell : cell + ' '.repeat(widths[i] - stripVTControlCharacters(cell).length)
      )
      .join('  ')
  );
}

function colorSmartstackStatus(status: string): string {
  if (status.startsWith('UP')) return status;
  if (status.startsWith('DOWN')) return chalk.red(status);
  if (status.startsWith('MAINT')) return chalk.gray(status);
  return chalk.yellow(status);
}

function colorEnvoyStatus(status: string): string {
  switch (status) {
    case 'HEALTHY':
      return status;
    case 'UNHEALTHY':
    case 'TIMEOUT':
      return chalk.red(status);
    case 'DRAINING':
      return chalk.gray(status);
    default:
      return chalk.yellow(status);
  }
}

/**
 * Backends with no pod of this instance behind them are greyed out
 */
function backendRow(backend: MeshBackend, cells: string[]): string[] {
  return backend.hasAssociatedTask ? cells : cells.map((cell) => chalk.gray(stripVTControlCharacters(cell)));
}

export function buildSmartstackBackendsTable(backends: MeshBackend[]): string[] {
  const rows = [['Name', 'LastCheck', 'LastChange', 'Status']];
  for (const backend of backends) {
    const lastCheck = `${backend.checkStatus ?? ''}/${backend.checkCode ?? ''} in ${backend.checkDurationMs ?? 0}ms`;
    const lastChange = backend.lastChangeSeconds === undefined ? 'Unknown' : formatAgo(backend.lastChangeSeconds);
    rows.push(
      backendRow(backend, [
        `${backend.hostname}:${backend.port}`,
        lastCheck,
        lastChange,
        colorSmartstackStatus(backend.status),
      ])
    );
  }
  return formatTable(rows);
}

export function buildEnvoyBackendsTable(backends: MeshBackend[]): string[] {
  const rows = [['Hostname:Port', 'Weight', 'Status']];
  for (const backend of backends) {
    rows.push(
      backendRow(backend, [
        `${backend.hostname}:${backend.port}`,
        String(backend.weight ?? ''),
        colorEnvoyStatus(backend.status),
      ])
    );
  }
  return formatTable(rows);
}

function meshStatusHuman(
  title: string,
  nameLabel: string,
  proxy: string,
  status: MeshStatus,
  buildTable: (backends: MeshBackend[]) => string[]
): string[] {
  if (status.locations.length === 0) {
    return [`${title}: ${chalk.red(`ERROR - ${status.registration} is NOT in ${proxy} at all!`)}`];
  }

  const output = [`${title}:`, `  ${nameLabel}: ${status.registration}`, '  Backends:'];
  for (const location of status.locations) {
    output.push(`    ${location.name} - ${backendReport(proxy, status.expectedBackendsPerLocation, location.runningBackendsCount)}`);
    if (location.backends && location.backends.length > 0) {
      output.push(...buildTable(location.backends).map((line) => `      ${line}`));
    }
  }
  return output;
}

export function getSmartstackStatusHuman(status: MeshStatus): string[] {
  return meshStatusHuman('Smartstack', 'Haproxy Service Name', 'haproxy', status, buildSmartstackBackendsTable);
}

export function getEnvoyStatusHuman(status: MeshStatus): string[] {
  return meshStatusHuman('Envoy', 'Service Name', 'envoy', status, buildEnvoyBackendsTable);
}
