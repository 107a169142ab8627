// src/interfaces/logger-config.interface.ts

import type { DestinationStream, Level as LogLevel } from 'pino';

/**
 * Anything exposing `dumps`. Swap in a faster encoder here; it must produce
 * the same logical JSON as the default one.
 */
export interface JsonEncoder {
    dumps(value: unknown): string;
}

export interface LoggerConfig {
    LOG_LEVEL?: LogLevel;
    /** GCP project used for `projects/<project>/traces/<id>`. Falls back to `GCP_PROJECT`. */
    PROJECT_ID?: string;
    LOGGER_NAME?: string;
    TRACE_HEADER_NAME?: string;
    JSON_IMPL?: JsonEncoder;
    /** Write context-free lines as single JSON entries instead of plain text. */
    STRUCTURED_PASSTHROUGH?: boolean;
    EXCLUDED_PATHS?: string[];
    OVERRIDE_CONSOLE?: boolean;
    /** With OVERRIDE_CONSOLE, also keep writing to the original console methods. */
    PRESERVE_CONSOLE?: boolean;
    DESTINATION?: DestinationStream;
    ON_ERROR?: (error: Error) => void;
}
