// src/utils/console-override.ts

import { BaseLoggerService } from '../logger/base-logger.service';
import { defaultJsonEncoder } from './serializers';

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';
type LoggerMethod = 'info' | 'warn' | 'error' | 'debug';

export interface ConsoleOverrideConfig {
    preserveOriginal?: boolean;
}

const CONSOLE_METHODS: ConsoleMethod[] = ['log', 'info', 'warn', 'error', 'debug'];

const CONSOLE_TO_LOGGER: Record<ConsoleMethod, LoggerMethod> = {
    log: 'info',
    info: 'info',
    warn: 'warn',
    error: 'error',
    debug: 'debug'
};

type ConsoleMethods = Record<ConsoleMethod, (...args: unknown[]) => void>;

// Methods in place before the first enable; restored by disable.
let originalConsole: ConsoleMethods | null = null;

const captureConsole = (): ConsoleMethods => ({
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug
});

const formatArg = (arg: unknown): string => {
    if (typeof arg === 'string') {
        return arg;
    }
    if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (arg === null || typeof arg !== 'object') {
        return String(arg);
    }
    try {
        return defaultJsonEncoder.dumps(arg);
    } catch {
        return '[Unserializable Object]';
    }
};

export const formatConsoleArgs = (args: unknown[]): string => args.map(formatArg).join(' ');

/**
 * Route `console.*` through the logger so plain console output joins the
 * active request's entry like any other log call.
 */
export const enableConsoleOverride = (
    logger: BaseLoggerService,
    config: ConsoleOverrideConfig = {}
): void => {
    const original = originalConsole ?? captureConsole();
    originalConsole = original;

    for (const method of CONSOLE_METHODS) {
        const level = CONSOLE_TO_LOGGER[method];
        const handler = (...args: unknown[]): void => {
            logger[level](formatConsoleArgs(args));
        };

        console[method] = config.preserveOriginal
            ? (...args: unknown[]) => {
                handler(...args);
                original[method](...args);
            }
            : handler;
    }
};

export const disableConsoleOverride = (): void => {
    if (!originalConsole) {
        return;
    }
    for (const method of CONSOLE_METHODS) {
        console[method] = originalConsole[method];
    }
    originalConsole = null;
};
