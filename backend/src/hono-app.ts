import { Hono } from 'hono';
import { compress } from 'hono/compress';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';

import logger from './lib/logger';
import { StatusError } from './lib/errors';
import { createHealthRoutes } from './routes/health';
import { createInstancesRoutes } from './routes/instances';
import type { StatusSettings } from './services/settings';

const ERROR_STATUSES = [400, 403, 404, 405, 409, 500, 502, 503, 504] as const;
type ErrorStatus = (typeof ERROR_STATUSES)[number];

function toErrorStatus(code: number): ErrorStatus {
  return ERROR_STATUSES.find((status) => status === code) ?? 500;
}

/**
 * Build the status API for one cluster
 */
export function createApp(settings: StatusSettings) {
  const CORS_ORIGIN = process.env.CORS_ORIGIN || '*';

  const app = new Hono();

  // Global middleware
  app.use('*', compress());
  app.use(
    '*',
    cors({
      origin: CORS_ORIGIN,
    })
  );

  // Request logging
  app.use('*', async (c, next) => {
    logger.info({ method: c.req.method, url: c.req.url }, `${c.req.method} ${c.req.path}`);
    await next();
  });

  // API Routes
  app.route('/api/health', createHealthRoutes(settings));
  app.route('/api/services', createInstancesRoutes(settings));

  app.notFound((c) => {
    logger.warn(
      { method: c.req.method, url: c.req.url, statusCode: 404 },
      `No route matched: ${c.req.method} ${c.req.url}`
    );
    return c.json(
      { error: { message: `Route not found: ${c.req.method} ${c.req.path}`, statusCode: 404 } },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      logger.warn({ statusCode: err.status }, `Error: ${err.message}`);
      return c.json(
        {
          error: {
            message: err.message,
            statusCode: err.status,
          },
        },
        err.status
      );
    }

    if (err instanceof StatusError) {
      const status = toErrorStatus(err.statusCode);
      logger.warn({ statusCode: status, name: err.name }, `Error: ${err.message}`);
      return c.json({ error: { message: err.message, statusCode: status } }, status);
    }

    logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);
    return c.json(
      {
        error: {
          message: err.message || 'Internal Server Error',
          statusCode: 500,
        },
      },
      500
    );
  });

  return app;
}
