// src/index.ts

import 'reflect-metadata';

export * from './logger.module';
export * from './logger/base-logger.service';
export * from './handlers/cloud-logging.handler';
export * from './middleware/request-logs.middleware';
export * from './filters/http-exception.filter';
export * from './services/console-override.service';
export * from './config/constants';
export * from './context';
export * from './interfaces';
export { defaultJsonEncoder } from './utils/serializers';
export { severityForLevel } from './utils/formatters';
export { enableConsoleOverride, disableConsoleOverride } from './utils/console-override';
