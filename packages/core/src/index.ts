export * from './errors/index.js';
export * from './validators/index.js';
export { logger, createLogger } from './logger.js';
export type { Logger, LogContext } from './logger.js';
