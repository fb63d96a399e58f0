import { Hono } from 'hono';
import type { HealthCheckResponse } from '@fleetstat/shared';
import type { StatusSettings } from '../services/settings';

export function createHealthRoutes(settings: Pick<StatusSettings, 'cluster'>) {
  return new Hono().get('/', (c) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      cluster: settings.cluster,
    };
    return c.json(body);
  });
}
