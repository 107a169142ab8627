// src/utils/formatters.ts

import type { LoggerOptions } from 'pino';
import {
    DEFAULT_LOGGER_NAME,
    LEVEL_SEVERITY,
    SPAN_FIELD,
    Severity,
    TRACE_FIELD
} from '../config/constants';
import type { RequestLogsSnapshot } from '../context/request-logs';
import type { CloudLogEntry, JsonEncoder, LogRecord } from '../interfaces';
import { isRecord } from './serializers';

const RESERVED_KEYS = new Set(['level', 'message', 'msg', 'name', 'pid', 'hostname', 'time', 'err']);

const PINO_INFO = 30;

/**
 * Map a numeric level to Cloud Logging severity. Levels between the standard
 * ones take the nearest lower one; anything under the lowest is DEBUG.
 */
export const severityForLevel = (level: number): Severity => {
    for (const [threshold, severity] of LEVEL_SEVERITY) {
        if (level >= threshold) {
            return severity;
        }
    }
    return 'DEBUG';
};

export const formatTimestamp = (time?: string | number): string => {
    if (typeof time === 'string' && time) {
        return time;
    }
    const date = typeof time === 'number' ? new Date(time) : new Date();
    return Number.isNaN(date.getTime()) ? new Date().toISOString() : date.toISOString();
};

/** Build a LogRecord from a parsed pino line. */
export const toLogRecord = (fields: Record<string, unknown>): LogRecord => {
    const { level, message, msg, name, pid, time } = fields;

    return {
        ...fields,
        level: typeof level === 'number' ? level : PINO_INFO,
        message: typeof message === 'string' ? message : typeof msg === 'string' ? msg : '',
        name: typeof name === 'string' ? name : undefined,
        pid: typeof pid === 'number' ? pid : undefined,
        time: typeof time === 'string' || typeof time === 'number' ? time : undefined
    };
};

/**
 * Message text of a record: the message, then any structured fields encoded
 * as JSON, then the error stack on its own lines.
 */
export const formatMessage = (record: LogRecord, encoder: JsonEncoder): string => {
    const extras = Object.entries(record).filter(([key, value]) =>
        !RESERVED_KEYS.has(key) && value !== undefined
    );

    let text = record.message;
    if (extras.length > 0) {
        let encoded: string;
        try {
            encoded = encoder.dumps(Object.fromEntries(extras));
        } catch {
            encoded = '[unserializable fields]';
        }
        text = text ? `${text} ${encoded}` : encoded;
    }

    const err = record.err;
    if (isRecord(err) && typeof err.stack === 'string') {
        text = text ? `${text}\n${err.stack}` : err.stack;
    }

    return text;
};

export const formatRequestLine = (timestamp: string, severity: Severity, text: string): string =>
    `\n${timestamp}\t${severity}\t${text}`;

export const buildRequestEntry = (snapshot: RequestLogsSnapshot, pid: number): CloudLogEntry => ({
    severity: snapshot.severity,
    name: snapshot.name,
    process: pid,
    ...(snapshot.url ? { url: snapshot.url } : {}),
    ...(snapshot.trace ? { [TRACE_FIELD]: snapshot.trace } : {}),
    ...(snapshot.spanId ? { [SPAN_FIELD]: snapshot.spanId } : {}),
    message: snapshot.message
});

export const buildPassthroughEntry = (
    record: LogRecord,
    severity: Severity,
    text: string,
    pid: number
): CloudLogEntry => ({
    severity,
    name: record.name ?? DEFAULT_LOGGER_NAME,
    process: record.pid ?? pid,
    message: text,
    timestamp: formatTimestamp(record.time)
});

export const formatters: NonNullable<LoggerOptions['formatters']> = {
    bindings: (bindings: Record<string, unknown>) => {
        const { hostname, ...rest } = bindings;
        return rest;
    }
};
