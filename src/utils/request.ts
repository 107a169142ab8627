// src/utils/request.ts

import type { RequestLike } from '../interfaces';

/**
 * Case-insensitive header lookup. Node lowercases incoming header names, but
 * hand-built requests may not.
 */
export const getHeader = (req: RequestLike, name: string): string | undefined => {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(req.headers)) {
        if (key.toLowerCase() !== wanted || value === undefined) {
            continue;
        }
        return Array.isArray(value) ? value[0] : value;
    }
    return undefined;
};

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

export const getRequestUrl = (req: RequestLike): string | undefined => {
    if (req.url && ABSOLUTE_URL.test(req.url)) {
        return req.url;
    }

    const path = req.originalUrl || req.url || req.path;
    const host = getHeader(req, 'host');
    if (req.protocol && host) {
        return `${req.protocol}://${host}${path ?? ''}`;
    }

    return path || undefined;
};
