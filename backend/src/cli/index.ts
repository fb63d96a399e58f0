import logger from '../lib/logger';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error({ error }, error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
