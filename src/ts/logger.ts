/**
 * Logger
 * Lazily created winston console logger, levelled by TYPED_DATA_LOG_LEVEL
 */

import winston from 'winston';
import { getConfig, type LogLevel } from './config';

type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: getConfig().TYPED_DATA_LOG_LEVEL,
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss',
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${timestamp}] [typed-data] [${level.toUpperCase()}]`;
        const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        if (stack) {
          return `${prefix} ${message}${details}\n${stack}`;
        }
        return `${prefix} ${message}${details}`;
      })
    ),
    transports: [new winston.transports.Console()],
  });
}

export function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  getLogger().log(level, message, meta ?? {});
}

export const log = {
  error: (message: string, meta?: LogMeta) => write('error', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  verbose: (message: string, meta?: LogMeta) => write('verbose', message, meta),
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  silly: (message: string, meta?: LogMeta) => write('silly', message, meta),
};

export function resetLogger(): void {
  logger = null;
}
