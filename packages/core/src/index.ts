export { logger, log, setLogLevel, parseLogLevel } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
export { getRuntimeConfig, parseRuntimeConfig, resetRuntimeConfig } from './config/runtime';
export type { RuntimeConfig, ThresholdOverrides } from './config/runtime';
