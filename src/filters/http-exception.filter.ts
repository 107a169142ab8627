// src/filters/http-exception.filter.ts
import {
    ArgumentsHost,
    Catch,
    ExceptionFilter,
    HttpException,
    HttpStatus
} from '@nestjs/common';
import type { Response } from 'express';
import { getLogLevel } from '../config/constants';
import { BaseLoggerService } from '../logger/base-logger.service';

interface ErrorResponse {
    error: string;
    detail: unknown;
}

/**
 * Logs every uncaught exception into the request's entry at a severity that
 * follows the response status, answers with `{ error, detail }`, and flushes
 * so the entry is written even when the request ends on an error.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
    constructor(private readonly logger: BaseLoggerService) {}

    catch(exception: unknown, host: ArgumentsHost): void {
        const error = exception instanceof Error ? exception : new Error(String(exception));
        const status = this.getHttpStatus(error);
        const body: ErrorResponse = {
            error: error.constructor.name,
            detail: error instanceof HttpException ? error.getResponse() : error.message
        };

        switch (getLogLevel(status)) {
            case 'error':
                this.logger.error(error.message, { err: error });
                break;
            case 'warn':
                this.logger.warn(error.message, { response: body });
                break;
            default:
                this.logger.info(error.message, { response: body });
        }

        if (host.getType() === 'http') {
            host.switchToHttp().getResponse<Response>().status(status).json(body);
        }

        this.logger.flush();
    }

    private getHttpStatus(error: Error): number {
        if (error instanceof HttpException) {
            return error.getStatus();
        }

        if (error.name === 'ValidationError') {
            return HttpStatus.BAD_REQUEST;
        }

        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
}
