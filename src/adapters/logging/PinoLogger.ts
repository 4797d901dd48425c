/**
 * Pino Logger Adapter
 *
 * ILogger backed by a child of the root pino instance, so every entry
 * carries the context it was created for.
 */

import type { Logger } from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

export class PinoLogger implements ILogger {
  private logger: Logger;

  constructor(root: Logger, context?: string) {
    this.logger = context ? root.child({ context }) : root;
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.debug(messageOrMetadata);
    } else {
      this.logger.debug(messageOrMetadata, message);
    }
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.info(messageOrMetadata);
    } else {
      this.logger.info(messageOrMetadata, message);
    }
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.warn(messageOrMetadata);
    } else {
      this.logger.warn(messageOrMetadata, message);
    }
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.error(messageOrMetadata);
    } else {
      this.logger.error(messageOrMetadata, message);
    }
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.fatal(messageOrMetadata);
    } else {
      this.logger.fatal(messageOrMetadata, message);
    }
  }
}
