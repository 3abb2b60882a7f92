import type { Logger } from 'pino';
import { getScopedLogger } from './logging/pino-setup.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logging seam used across packsync packages.
 *
 * Components accept an ILogger so tests can pass {@link NoOpLogger} and hosts
 * can route output wherever they like.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * ILogger backed by a pino logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void {
    const errorContext = error === undefined ? {} : { err: error };
    this.logger.error({ ...context, ...errorContext }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger whose entries carry `scope` (e.g. `registry`, `watcher`).
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new PinoLogger(getScopedLogger(scope));
}
