export { createLogger, isLogLevel, logger } from './logger';
export type { Logger, LogLevel } from './logger';
