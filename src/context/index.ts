export * from './trace-context';
export * from './request-logs';
export * from './request-context-store';
