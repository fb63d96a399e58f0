import logger from '../lib/logger';
import { StatusError } from '../lib/errors';
import type { MeshAdminClient } from './types';

/**
 * Fill `{name}` placeholders of an admin URL format
 */
export function formatAdminUrl(format: string, values: Record<string, string | number>): string {
  return format.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    name in values ? String(values[name]) : placeholder
  );
}

/**
 * Reads mesh admin endpoints over HTTP. Each request is bounded by a
 * transport timeout; there are no retries.
 */
export class HttpMeshAdminClient implements MeshAdminClient {
  constructor(
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async fetchText(url: string): Promise<string> {
    logger.debug({ url }, 'Querying mesh admin endpoint');
    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new StatusError(`Mesh admin endpoint ${url} answered ${response.status}`, 502);
    }
    return response.text();
  }
}
