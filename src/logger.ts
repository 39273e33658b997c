/**
 * Levelled console logger.
 * Each module gets its own tagged instance via `createLogger('scheduler')`.
 * The minimum level comes from LOG_LEVEL (production defaults to WARN, tests to NONE).
 */

import { config } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.NONE]: 'NONE',
};

const LEVEL_BY_NAME: Record<typeof config.logLevel, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

interface LoggerConfig {
  minLevel: LogLevel;
  timestamps: boolean;
}

const loggerConfig: LoggerConfig = {
  minLevel: LEVEL_BY_NAME[config.logLevel],
  timestamps: true,
};

function formatMessage(level: LogLevel, module: string, message: string): string {
  const parts: string[] = [];
  if (loggerConfig.timestamps) parts.push(`[${new Date().toISOString()}]`);
  parts.push(`[${LOG_LEVEL_NAMES[level]}]`, `[${module}]`, message);
  return parts.join(' ');
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(module: string): Logger {
  const write = (level: LogLevel, message: string, meta: unknown[]) => {
    if (level < loggerConfig.minLevel) return;
    const line = formatMessage(level, module, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line, ...meta);
        break;
      case LogLevel.INFO:
        console.info(line, ...meta);
        break;
      case LogLevel.WARN:
        console.warn(line, ...meta);
        break;
      default:
        console.error(line, ...meta);
    }
  };

  return {
    debug: (message, ...meta) => write(LogLevel.DEBUG, message, meta),
    info: (message, ...meta) => write(LogLevel.INFO, message, meta),
    warn: (message, ...meta) => write(LogLevel.WARN, message, meta),
    error: (message, ...meta) => write(LogLevel.ERROR, message, meta),
  };
}
