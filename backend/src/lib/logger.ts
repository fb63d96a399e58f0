import pino from 'pino';

// JSON lines on stderr; stdout is reserved for CLI reports
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  pino.destination(2)
);

export default logger;
