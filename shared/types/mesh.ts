/**
 * Service mesh status types
 */

export type MeshFlavor = 'smartstack' | 'envoy';

/** Normalized backend health, shared by both mesh flavors */
export type MeshHealth = 'UP' | 'DOWN' | 'MAINT' | 'OTHER';

export interface MeshBackend {
  hostname: string;
  address: string;
  port: number;
  health: MeshHealth;
  status: string;                // Flavor-native label, e.g. 'UP 1/2' or 'HEALTHY'
  checkStatus?: string;          // smartstack only
  checkCode?: string;            // smartstack only
  checkDurationMs?: number;      // smartstack only
  lastChangeSeconds?: number;    // smartstack only
  weight?: number;               // envoy only
  hasAssociatedTask: boolean;    // Matched to a pod of this instance
}

export interface MeshLocation {
  name: string;
  expectedBackendsCount: number;
  runningBackendsCount: number;
  backends?: MeshBackend[];
}

export interface MeshStatus {
  registration: string;
  expectedBackendsPerLocation: number;
  locations: MeshLocation[];
}

/**
 * A mesh flavor whose status could not be built. Only the failing flavor
 * carries this; the rest of the instance status is unaffected.
 */
export interface MeshStatusError {
  error: string;
}

export type MeshStatusResult = MeshStatus | MeshStatusError;

export interface InstanceMeshStatus {
  smartstack?: MeshStatus;
  envoy?: MeshStatus;
}

export function isMeshStatusError(result: MeshStatusResult): result is MeshStatusError {
  return 'error' in result;
}
