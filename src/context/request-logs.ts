// src/context/request-logs.ts

import { DEFAULT_LOGGER_NAME, DEFAULT_TRACE_HEADER, SEVERITY_ORDER, Severity } from '../config/constants';
import type { RequestLike } from '../interfaces';
import { getHeader, getRequestUrl } from '../utils/request';
import { TraceContext } from './trace-context';

export interface RequestLogsOptions {
    traceHeaderName?: string;
    project?: string;
}

export interface RequestLogsSnapshot {
    readonly name: string;
    readonly message: string;
    readonly severity: Severity;
    readonly url?: string;
    readonly trace?: string;
    readonly spanId?: string;
}

/**
 * Log state of one in-flight request. Owned by the async task handling that
 * request; nothing else mutates it.
 */
export class RequestLogs<TExtra = unknown> {
    private readonly lines: string[] = [];
    private _severity: Severity = 'DEBUG';
    private _loggerName: string | null = null;
    private _flushed = false;

    constructor(
        readonly url: string | undefined,
        private readonly traceContext: TraceContext | null,
        readonly extra?: TExtra
    ) {}

    static create<TExtra = unknown>(
        req: RequestLike,
        extra?: TExtra,
        options: RequestLogsOptions = {}
    ): RequestLogs<TExtra> {
        const headerName = options.traceHeaderName || DEFAULT_TRACE_HEADER;
        const traceContext = TraceContext.parseCloudTrace(getHeader(req, headerName), options.project);
        return new RequestLogs(getRequestUrl(req), traceContext, extra);
    }

    get severity(): Severity {
        return this._severity;
    }

    get trace(): string | undefined {
        return this.traceContext?.resourceName;
    }

    get spanId(): string | undefined {
        return this.traceContext?.currentSpanId;
    }

    get isEmpty(): boolean {
        return this.lines.length === 0;
    }

    get isFlushed(): boolean {
        return this._flushed;
    }

    /** Once set, every later flush of this request is a no-op. */
    markFlushed(): void {
        this._flushed = true;
    }

    /** `loggerName` is kept from the first record only. */
    append(line: string, severity: Severity, loggerName?: string): void {
        if (this._loggerName === null && loggerName) {
            this._loggerName = loggerName;
        }
        this.lines.push(line);
        if (SEVERITY_ORDER[severity] > SEVERITY_ORDER[this._severity]) {
            this._severity = severity;
        }
    }

    snapshot(): RequestLogsSnapshot {
        return Object.freeze({
            name: this._loggerName ?? DEFAULT_LOGGER_NAME,
            message: this.lines.join(''),
            severity: this._severity,
            url: this.url,
            trace: this.trace,
            spanId: this.spanId
        });
    }
}
