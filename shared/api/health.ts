/**
 * Health API
 */

import type { RequestFn } from './client';
import type { HealthCheckResponse } from '../types';

export interface HealthApi {
  /** Check API health */
  check: () => Promise<HealthCheckResponse>;
}

export function createHealthApi(request: RequestFn): HealthApi {
  return {
    check: () => request<HealthCheckResponse>('/health'),
  };
}
