// src/middleware/request-logs.middleware.ts

import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { AsyncResource } from 'async_hooks';
import { LOGGER_CONSTANTS, shouldExcludePath } from '../config/constants';
import { CloudLoggingHandler } from '../handlers/cloud-logging.handler';
import { LoggerConfig, RequestLike, ResponseLike } from '../interfaces';

type RequestLogsMiddlewareFn = (req: RequestLike, res: ResponseLike, next: () => void) => void;

const requestPath = (req: RequestLike): string =>
    (req.path ?? req.originalUrl ?? req.url ?? '/').split('?')[0];

/**
 * Express-style middleware that opens a request context on `handler`.
 *
 * Every log call made while the request is handled lands in one RequestLogs,
 * which is flushed when the response closes. `close` fires for finished and
 * for aborted responses alike, so the buffer is never left behind.
 */
export function requestLogsMiddleware(
    handler: CloudLoggingHandler,
    excludedPaths: string[] = []
): RequestLogsMiddlewareFn {
    return (req, res, next) => {
        if (shouldExcludePath(requestPath(req), excludedPaths)) {
            next();
            return;
        }

        handler.store.run(() => {
            handler.setRequest(handler.createRequestLogs(req));
            res.once('close', AsyncResource.bind(() => handler.flush()));
            next();
        });
    };
}

@Injectable()
export class RequestLogsMiddleware implements NestMiddleware<RequestLike, ResponseLike> {
    private readonly middleware: RequestLogsMiddlewareFn;

    constructor(
        handler: CloudLoggingHandler,
        @Inject(LOGGER_CONSTANTS.MODULE_OPTIONS_TOKEN)
        config: LoggerConfig
    ) {
        this.middleware = requestLogsMiddleware(handler, config.EXCLUDED_PATHS);
    }

    use(req: RequestLike, res: ResponseLike, next: () => void): void {
        this.middleware(req, res, next);
    }
}
