// src/utils/serializers.ts

import type { JsonEncoder } from '../interfaces';

export interface SerializedError {
    type: string;
    message: string;
    code?: string | number;
    stack?: string;
    statusCode?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const pickNumber = (source: Record<string, unknown>, key: string): number | undefined => {
    const value = source[key];
    return typeof value === 'number' ? value : undefined;
};

export const serializers = {
    err: (err: Error): SerializedError => {
        const fields: Record<string, unknown> = { ...err };
        const code = typeof fields.code === 'string' || typeof fields.code === 'number'
            ? fields.code
            : undefined;

        return {
            type: err.name,
            message: err.message,
            code,
            stack: err.stack,
            statusCode: pickNumber(fields, 'statusCode') ?? pickNumber(fields, 'status')
        };
    }
};

const replacer = (_key: string, value: unknown): unknown => {
    if (typeof value === 'bigint') {
        return value.toString();
    }
    if (value instanceof Error) {
        return {
            name: value.name,
            message: value.message,
            stack: value.stack
        };
    }
    return value;
};

export const defaultJsonEncoder: JsonEncoder = {
    dumps: (value: unknown): string => JSON.stringify(value, replacer)
};

/** Parse one pino output line; anything but a JSON object yields null. */
export const parseJsonObject = (line: string): Record<string, unknown> | null => {
    try {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
};

export { isRecord };
