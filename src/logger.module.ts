// src/logger.module.ts

import { DynamicModule, Global, MiddlewareConsumer, Module, NestModule, Provider } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { LOGGER_CONSTANTS } from './config/constants';
import { RequestContextStore } from './context/request-context-store';
import { HttpExceptionFilter } from './filters/http-exception.filter';
import { CloudLoggingHandler } from './handlers/cloud-logging.handler';
import { LoggerConfig } from './interfaces/logger-config.interface';
import { BaseLoggerService } from './logger/base-logger.service';
import { RequestLogsMiddleware } from './middleware/request-logs.middleware';
import { ConsoleOverrideService } from './services/console-override.service';

@Global()
@Module({})
export class LoggerModule implements NestModule {
  static forRoot(config: LoggerConfig = {}): DynamicModule {
    const providers: Provider[] = [
      {
        provide: LOGGER_CONSTANTS.MODULE_OPTIONS_TOKEN,
        useValue: config
      },
      {
        provide: LOGGER_CONSTANTS.CONTEXT_STORE_TOKEN,
        useValue: new RequestContextStore()
      },
      {
        provide: CloudLoggingHandler,
        useFactory: (options: LoggerConfig, store: RequestContextStore) =>
          new CloudLoggingHandler(options, store),
        inject: [LOGGER_CONSTANTS.MODULE_OPTIONS_TOKEN, LOGGER_CONSTANTS.CONTEXT_STORE_TOKEN]
      },
      BaseLoggerService,
      {
        provide: LOGGER_CONSTANTS.LOGGER_TOKEN,
        useExisting: BaseLoggerService
      },
      RequestLogsMiddleware,
      {
        provide: APP_FILTER,
        useClass: HttpExceptionFilter
      },
      ...(config.OVERRIDE_CONSOLE ? [ConsoleOverrideService] : [])
    ];

    return {
      module: LoggerModule,
      providers,
      exports: [
        BaseLoggerService,
        CloudLoggingHandler,
        LOGGER_CONSTANTS.LOGGER_TOKEN,
        LOGGER_CONSTANTS.CONTEXT_STORE_TOKEN
      ]
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLogsMiddleware).forRoutes('*');
  }
}
