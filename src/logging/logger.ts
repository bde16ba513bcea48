import pino, { type Logger } from 'pino';
import { getConfig } from '../config/index.js';

export type { Logger };

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create a JSON logger. Level falls back to LOG_LEVEL.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? getConfig().logging.level;

  return pino({
    name: options.name ?? 'grant-courier',
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['accessToken', 'refreshToken', 'secret', '*.accessToken', '*.refreshToken', '*.secret'],
      censor: '[redacted]',
    },
  });
};

let defaultLogger: Logger | null = null;

/**
 * Shared logger used when a component is not handed one
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
