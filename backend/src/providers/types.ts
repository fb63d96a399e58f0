import type { MeshFlavor } from '@fleetstat/shared';
import type { SystemConfig } from '../services/config';
import type { MeshBackendRecord } from '../services/types';

/**
 * Admin endpoint settings both mesh flavors draw from
 */
export type MeshAdminSettings = Pick<
  SystemConfig,
  'synapsePort' | 'synapseHaproxyUrlFormat' | 'envoyAdminPort' | 'envoyAdminEndpointFormat'
>;

/**
 * Mesh provider interface - one implementation per mesh flavor.
 *
 * Providers only differ in how they reach and read their admin endpoint and
 * in how they order backends. Matching backends to pods and counting is done
 * once, by the mesh status builder.
 */
export interface MeshProvider {
  /** Unique identifier, also the key of the flavor in instance status */
  id: MeshFlavor;

  /** Display name (e.g., 'Smartstack', 'Envoy') */
  name: string;

  /**
   * URL of the admin endpoint on `host` that lists backends
   */
  adminUrl(host: string, settings: MeshAdminSettings): string;

  /**
   * Parse an admin endpoint response into the backends of `registration`
   * @throws Error if the payload is malformed
   */
  parseBackends(payload: string, registration: string): MeshBackendRecord[];

  /**
   * Order in which backends are reported
   */
  compareBackends(a: MeshBackendRecord, b: MeshBackendRecord): number;
}

