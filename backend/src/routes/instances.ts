import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import logger from '../lib/logger';
import {
  instanceParamsSchema,
  instanceStatusQuerySchema,
  meshStatusQuerySchema,
  rejectInvalid,
  setDesiredStateBodySchema,
} from '../lib/validation';
import {
  instanceStatus,
  kubernetesMeshStatus,
  setCustomResourceDesiredState,
} from '../services/instanceStatus';
import type { StatusSettings } from '../services/settings';

/**
 * Routes under /api/services/:service/instances/:instance
 */
export function createInstancesRoutes(settings: StatusSettings) {
  // Without an explicit type, the instance's config files decide
  const resolveType = async (service: string, instance: string, type: string | undefined) =>
    type ?? settings.configLoader.resolveInstanceType(service, instance);

  return new Hono()
    .get(
      '/:service/instances/:instance/status',
      zValidator('param', instanceParamsSchema, rejectInvalid),
      zValidator('query', instanceStatusQuerySchema, rejectInvalid),
      async (c) => {
        const { service, instance } = c.req.valid('param');
        const query = c.req.valid('query');

        const status = await instanceStatus(
          {
            service,
            instance,
            instanceType: await resolveType(service, instance, query.type),
            verbose: query.verbose,
            includeSmartstack: query.includeSmartstack,
            includeEnvoy: query.includeEnvoy,
            useNew: query.new,
          },
          settings
        );
        return c.json(status);
      }
    )
    .get(
      '/:service/instances/:instance/mesh',
      zValidator('param', instanceParamsSchema, rejectInvalid),
      zValidator('query', meshStatusQuerySchema, rejectInvalid),
      async (c) => {
        const { service, instance } = c.req.valid('param');
        const query = c.req.valid('query');

        const mesh = await kubernetesMeshStatus(
          {
            service,
            instance,
            instanceType: await resolveType(service, instance, query.type),
            verbose: query.verbose,
            includeSmartstack: query.includeSmartstack,
            includeEnvoy: query.includeEnvoy,
          },
          settings
        );
        return c.json(mesh);
      }
    )
    .post(
      '/:service/instances/:instance/state',
      zValidator('param', instanceParamsSchema, rejectInvalid),
      zValidator('json', setDesiredStateBodySchema, rejectInvalid),
      async (c) => {
        const { service, instance } = c.req.valid('param');
        const { desiredState } = c.req.valid('json');

        logger.info({ service, instance, desiredState }, `Setting desired state of ${service}.${instance}`);
        const result = await setCustomResourceDesiredState(
          {
            service,
            instance,
            instanceType: await resolveType(service, instance, undefined),
            desiredState,
          },
          settings
        );
        return c.json(result);
      }
    );
}
