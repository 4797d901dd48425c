/**
 * Logger Factory
 *
 * Hands out ILogger instances bound to a context name.
 * Output format (pretty vs JSON) and level come from env via utils/logger.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { logger as rootLogger } from '@/utils/logger';
import { PinoLogger } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new PinoLogger(rootLogger, context);
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
