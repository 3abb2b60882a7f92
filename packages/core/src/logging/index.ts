/**
 * Logging infrastructure exports
 */

export { rootLogger, setLogLevel, getScopedLogger } from './pino-setup.js';

export { PinoLogger, NoOpLogger, createScopedLogger } from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
