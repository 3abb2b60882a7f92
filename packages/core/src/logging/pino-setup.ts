/**
 * Pino logger setup with redaction of credentials that can appear in
 * registry URLs, request headers or generator options.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from '../logger.js';

const LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

/**
 * Reads the initial level from PACKSYNC_LOG_LEVEL, defaulting to 'info'.
 * @internal
 */
function initialLevel(): LogLevel {
  const env = (process.env.PACKSYNC_LOG_LEVEL ?? '').toLowerCase();
  return LEVELS.find((level) => level === env) ?? 'info';
}

/**
 * Root logger instance. Scoped loggers are children of this one.
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.info({ token: 'secret' }, 'connecting'); // token: '[REDACTED]'
 * ```
 * @public
 */
const rootLogger = pino({
  level: initialLevel(),
  base: { pid: process.pid },
  redact: {
    paths: [
      'token',
      '*.token',
      'password',
      '*.password',
      'api_key',
      '*.api_key',
      'authorization',
      '*.authorization',
      'headers.authorization',
      '*.headers.authorization',
    ],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

const scopedLoggers = new Map<string, Logger>();

/**
 * Child of the root logger whose entries carry `scope`. One child exists per
 * scope.
 * @public
 */
export function getScopedLogger(scope: string): Logger {
  let child = scopedLoggers.get(scope);
  if (!child) {
    child = rootLogger.child({ scope });
    scopedLoggers.set(scope, child);
  }
  return child;
}

/**
 * Changes the level of the root logger and every scoped logger. pino
 * children copy their level when created, so each one is updated here.
 * @public
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const child of scopedLoggers.values()) {
    child.level = level;
  }
}

export { rootLogger };
