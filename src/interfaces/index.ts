export * from './logger-config.interface';
export * from './log-record.interface';
