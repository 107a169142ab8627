// src/services/console-override.service.ts

import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { LOGGER_CONSTANTS } from '../config/constants';
import { LoggerConfig } from '../interfaces';
import { BaseLoggerService } from '../logger/base-logger.service';
import { disableConsoleOverride, enableConsoleOverride } from '../utils/console-override';

@Injectable()
export class ConsoleOverrideService implements OnModuleInit, OnModuleDestroy {
  constructor(
    private readonly logger: BaseLoggerService,
    @Inject(LOGGER_CONSTANTS.MODULE_OPTIONS_TOKEN)
    private readonly config: LoggerConfig
  ) {}

  onModuleInit() {
    enableConsoleOverride(this.logger, { preserveOriginal: this.config.PRESERVE_CONSOLE ?? false });
  }

  onModuleDestroy() {
    disableConsoleOverride();
  }
}
