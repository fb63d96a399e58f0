import { serve } from '@hono/node-server';
import { createApp } from './hono-app';
import logger from './lib/logger';
import { configService } from './services/config';
import { createStatusSettings } from './services/settings';

const config = configService.getConfig();
const app = createApp(createStatusSettings(config));

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, cluster: config.cluster },
    `fleetstat status API for ${config.cluster} running on http://localhost:${info.port}`
  );
});
