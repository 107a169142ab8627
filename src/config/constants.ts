// src/config/constants.ts

export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  CRITICAL: 4
};

/**
 * pino numeric levels and the Cloud Logging severity each one maps to.
 * Sorted descending so lookups can take the first level at or below a value.
 */
export const LEVEL_SEVERITY: ReadonlyArray<readonly [number, Severity]> = [
  [60, 'CRITICAL'],
  [50, 'ERROR'],
  [40, 'WARNING'],
  [30, 'INFO'],
  [20, 'DEBUG'],
  [10, 'DEBUG']
];

export const DEFAULT_TRACE_HEADER = 'X-Cloud-Trace-Context';

export const DEFAULT_LOGGER_NAME = 'root';

export const TRACE_FIELD = 'logging.googleapis.com/trace';
export const SPAN_FIELD = 'logging.googleapis.com/spanId';

export const EXCLUDED_PATHS = [
  '/health',
  '/healthz',
  '/metrics',
  '/*/health',
  '/*/metrics'
];

export const shouldExcludePath = (path: string, customExclusions: string[] = []): boolean => {
  const pathsToCheck = [...EXCLUDED_PATHS, ...customExclusions];
  return pathsToCheck.some(pattern => {
    if (pattern.includes('*')) {
      const regexPattern = pattern
        .split('*')
        .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('[^/]+');
      return new RegExp(`^${regexPattern}$`).test(path);
    }
    return path === pattern;
  });
};

export function getLogLevel(status: number): 'error' | 'warn' | 'info' {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export const LOGGER_CONSTANTS = {
  MODULE_OPTIONS_TOKEN: 'LOGGER_MODULE_OPTIONS',
  CONTEXT_STORE_TOKEN: 'CONTEXT_STORE_TOKEN',
  LOGGER_TOKEN: 'LOGGER_TOKEN',
  SERIALIZATION_ERROR: 'Failed to serialize log entry'
} as const;
