// src/handlers/cloud-logging.handler.ts

import pino, { DestinationStream } from 'pino';
import { DEFAULT_TRACE_HEADER, LOGGER_CONSTANTS } from '../config/constants';
import { ContextToken, RequestContextStore } from '../context/request-context-store';
import { RequestLogs } from '../context/request-logs';
import type { CloudLogEntry, JsonEncoder, LoggerConfig, LogRecord, RequestLike } from '../interfaces';
import {
    buildPassthroughEntry,
    buildRequestEntry,
    formatMessage,
    formatRequestLine,
    formatTimestamp,
    severityForLevel,
    toLogRecord
} from '../utils/formatters';
import { defaultJsonEncoder, parseJsonObject } from '../utils/serializers';

const toError = (error: unknown): Error =>
    error instanceof Error ? error : new Error(String(error));

const reportToStderr = (error: Error): void => {
    process.stderr.write(`--- Logging error ---\n${error.stack ?? error.message}\n`);
};

/**
 * Log sink for Cloud Run / GKE. Inside a request context every record is
 * buffered on the active RequestLogs and written as one entry by `flush()`;
 * outside one, records are written straight to the destination.
 *
 * It is a pino destination, so it can sit directly behind a pino logger:
 *
 * ```ts
 * const handler = new CloudLoggingHandler({ PROJECT_ID: 'my-project' });
 * const logger = pino({ messageKey: 'message' }, handler);
 * ```
 */
export class CloudLoggingHandler implements DestinationStream {
    readonly traceHeaderName: string;
    readonly project: string | undefined;
    private readonly encoder: JsonEncoder;
    private readonly destination: DestinationStream;
    private readonly structuredPassthrough: boolean;
    private readonly onError: (error: Error) => void;

    constructor(
        config: LoggerConfig = {},
        readonly store: RequestContextStore = new RequestContextStore()
    ) {
        this.traceHeaderName = config.TRACE_HEADER_NAME || DEFAULT_TRACE_HEADER;
        this.project = config.PROJECT_ID || process.env.GCP_PROJECT || undefined;
        this.encoder = config.JSON_IMPL ?? defaultJsonEncoder;
        this.structuredPassthrough = config.STRUCTURED_PASSTHROUGH ?? false;
        this.onError = config.ON_ERROR ?? reportToStderr;
        this.destination = config.DESTINATION ?? this.createStdout();
    }

    createRequestLogs<TExtra>(req: RequestLike, extra?: TExtra): RequestLogs<TExtra> {
        return RequestLogs.create(req, extra, {
            traceHeaderName: this.traceHeaderName,
            project: this.project
        });
    }

    setRequest(requestLogs: RequestLogs): ContextToken {
        return this.store.setRequest(requestLogs);
    }

    getRequest(): RequestLogs | null {
        return this.store.getCurrent();
    }

    resetRequest(token: ContextToken): void {
        this.store.reset(token);
    }

    /** pino entry point: one serialized record per call. */
    write(line: string): void {
        const fields = parseJsonObject(line);
        this.emit(fields ? toLogRecord(fields) : { level: 30, message: line.replace(/\n$/, '') });
    }

    emit(record: LogRecord): void {
        try {
            const severity = severityForLevel(record.level);
            const text = formatMessage(record, this.encoder);
            const requestLogs = this.store.getCurrent();

            if (requestLogs && !requestLogs.isFlushed) {
                requestLogs.append(
                    formatRequestLine(formatTimestamp(record.time), severity, text),
                    severity,
                    record.name
                );
                return;
            }

            this.writeLine(this.structuredPassthrough
                ? this.encode(buildPassthroughEntry(record, severity, text, process.pid))
                : text);
        } catch (error) {
            this.onError(toError(error));
        }
    }

    /**
     * Write the active request's aggregated entry and clear the context.
     * Without an active request, or when the request was already flushed from
     * another task, nothing is written. `cb` follows pino's `logger.flush(cb)`
     * contract and is called in every case.
     */
    flush(cb?: (err?: Error) => void): void {
        const requestLogs = this.store.getCurrent();
        if (requestLogs) {
            this.store.clear();
            this.writeRequest(requestLogs);
        }
        cb?.();
    }

    private writeRequest(requestLogs: RequestLogs): void {
        if (requestLogs.isFlushed) {
            return;
        }
        requestLogs.markFlushed();
        if (requestLogs.isEmpty) {
            return;
        }

        try {
            this.writeLine(this.encode(buildRequestEntry(requestLogs.snapshot(), process.pid)));
        } catch (error) {
            this.onError(toError(error));
        }
    }

    private encode(entry: CloudLogEntry): string {
        try {
            return this.encoder.dumps(entry);
        } catch (error) {
            return defaultJsonEncoder.dumps(this.degrade(entry, toError(error)));
        }
    }

    private degrade(entry: CloudLogEntry, error: Error): CloudLogEntry {
        return {
            ...entry,
            serializationError: `${LOGGER_CONSTANTS.SERIALIZATION_ERROR}: ${error.message}`
        };
    }

    private writeLine(line: string): void {
        this.destination.write(`${line}\n`);
    }

    private createStdout(): DestinationStream {
        const stdout = pino.destination({ dest: 1, sync: true });
        stdout.on('error', (error: Error) => this.onError(error));
        return stdout;
    }
}
