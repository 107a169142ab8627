// src/logger/base-logger.service.ts

import { Inject, Injectable } from '@nestjs/common';
import pino, { Logger as PinoLogger } from 'pino';
import { DEFAULT_LOGGER_NAME, LOGGER_CONSTANTS } from '../config/constants';
import { CloudLoggingHandler } from '../handlers/cloud-logging.handler';
import { LoggerConfig } from '../interfaces';
import { formatters } from '../utils/formatters';
import { serializers } from '../utils/serializers';

type LogData = Record<string, unknown>;

@Injectable()
export class BaseLoggerService {
  private logger: PinoLogger;

  constructor(
    @Inject(LOGGER_CONSTANTS.MODULE_OPTIONS_TOKEN)
    private readonly config: LoggerConfig,
    private readonly handler: CloudLoggingHandler
  ) {
    this.logger = this.createLogger();
  }

  private createLogger(): PinoLogger {
    return pino(
      {
        level: this.config.LOG_LEVEL || 'debug',
        name: this.config.LOGGER_NAME || DEFAULT_LOGGER_NAME,
        messageKey: 'message',
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters,
        serializers
      },
      this.handler
    );
  }

  trace(message: string, data?: LogData): void {
    this.logger.trace(data ?? {}, message);
  }

  debug(message: string, data?: LogData): void {
    this.logger.debug(data ?? {}, message);
  }

  info(message: string, data?: LogData): void {
    this.logger.info(data ?? {}, message);
  }

  warn(message: string, data?: LogData): void {
    this.logger.warn(data ?? {}, message);
  }

  error(message: string, data?: LogData): void {
    this.logger.error(data ?? {}, message);
  }

  fatal(message: string, data?: LogData): void {
    this.logger.fatal(data ?? {}, message);
  }

  /** Flush the active request's aggregated entry. */
  flush(): void {
    this.handler.flush();
  }

  child(bindings: LogData): BaseLoggerService {
    const childLogger = new BaseLoggerService(this.config, this.handler);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }
}
