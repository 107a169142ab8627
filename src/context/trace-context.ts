// src/context/trace-context.ts

// TRACE_ID/SPAN_ID;o=TRACE_TRUE, span and options optional
const CLOUD_TRACE_PATTERN = /^([0-9a-f]+)(?:\/(\d+))?(?:;o=[01])?$/i;

export class TraceContext {
    private constructor(
        private readonly traceId: string,
        private readonly spanId: string | undefined,
        private readonly project: string | undefined
    ) {}

    /**
     * Parse an `X-Cloud-Trace-Context` value.
     * Returns null for a missing or malformed header; never throws.
     */
    static parseCloudTrace(header?: string | null, project?: string): TraceContext | null {
        if (!header) {
            return null;
        }

        const match = CLOUD_TRACE_PATTERN.exec(header.trim());
        if (!match) {
            return null;
        }

        const [, traceId, spanId] = match;
        return new TraceContext(traceId, spanId || undefined, project || undefined);
    }

    get currentTraceId(): string {
        return this.traceId;
    }

    get currentSpanId(): string | undefined {
        return this.spanId;
    }

    /**
     * `projects/<project>/traces/<trace-id>`, or undefined when no project is
     * configured since Cloud Logging only links fully qualified names.
     */
    get resourceName(): string | undefined {
        if (!this.project) {
            return undefined;
        }
        return `projects/${this.project}/traces/${this.traceId}`;
    }
}
