export { createLogger } from './logger.js';
export type { Logger, LoggerConfig, LogLevel } from './logger.js';
