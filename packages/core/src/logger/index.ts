export { createLogger, isLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
