/**
 * Shared API Client for the fleetstat status API
 *
 * Used by the mesh status CLI to query the status API of each cluster.
 */

// Re-export client utilities
export { ApiError, createRequestFn } from './client';
export type { ApiClientConfig, RequestFn } from './client';

// Import API creators
import { createRequestFn, type ApiClientConfig } from './client';
import { createHealthApi, type HealthApi } from './health';
import { createInstancesApi, type InstancesApi } from './instances';

// Re-export API types
export type { HealthApi } from './health';
export type { InstancesApi, InstanceStatusOptions, MeshStatusOptions } from './instances';

/**
 * Complete API client with all endpoints
 */
export interface ApiClient {
  health: HealthApi;
  instances: InstancesApi;
}

/**
 * Create a fully configured API client
 *
 * @example
 * ```typescript
 * const client = createApiClient({ baseUrl: 'http://fleetstat.norcal-prod.example:5054' });
 * const mesh = await client.instances.mesh('web', 'main', { includeEnvoy: true });
 * ```
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  const request = createRequestFn(config);

  return {
    health: createHealthApi(request),
    instances: createInstancesApi(request),
  };
}
