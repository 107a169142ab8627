// src/interfaces/log-record.interface.ts

import type { IncomingHttpHeaders } from 'http';
import type { Severity } from '../config/constants';

/**
 * One record as the handler receives it. pino writes these as JSON lines;
 * other callers can build them directly.
 */
export interface LogRecord {
    level: number;
    message: string;
    name?: string;
    pid?: number;
    time?: string | number;
    [key: string]: unknown;
}

export interface RequestLike {
    headers: IncomingHttpHeaders;
    url?: string;
    originalUrl?: string;
    protocol?: string;
    path?: string;
}

export interface ResponseLike {
    once(event: 'close', listener: () => void): unknown;
}

export interface CloudLogEntry {
    severity: Severity;
    name: string;
    process: number;
    message: string;
    url?: string;
    timestamp?: string;
    'logging.googleapis.com/trace'?: string;
    'logging.googleapis.com/spanId'?: string;
    serializationError?: string;
}
