import pino from 'pino';
import { env } from '@/config/env';

/**
 * Root pino instance
 * In development: Pretty-printed for human readability
 * In production: JSON format for log aggregation systems
 *
 * pino-http needs a real pino instance, everything else goes through LoggerFactory.
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development' && env.LOG_PRETTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'equity-portfolio-api',
    env: env.NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
