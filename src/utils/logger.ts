import { createLogger, format, transports } from 'winston';

import type { Logger } from 'winston';

const { NODE_ENV } = process.env;

export const { LOG_LEVEL = NODE_ENV === 'development' ? 'debug' : 'warn' } = process.env;

export const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  trace: 6
};

export type LogLevel = keyof typeof levels;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

export const logger: Logger = createLogger({
  level: LOG_LEVEL,
  levels,
  transports: [
    new transports.Console({
      level: LOG_LEVEL,
      format: format.cli({ levels })
    })
  ]
});

export type LoggerOptions = {
  level?: LogLevel;
  console?: boolean;
  file?: string;
  json?: boolean;
  maxSize?: number;
  maxFiles?: number;
};

const fileFormat = format.printf(
  ({ timestamp, level, message, ...meta }) =>
    `${timestamp} - ${level.toUpperCase()} - chainweave - ${message}` +
    (Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '')
);

/**
 * Replaces the logger's transports. The file transport rotates at `maxSize` bytes
 * and keeps `maxFiles` files.
 */
export function configureLogger({
  level = 'info',
  console = true,
  file,
  json = false,
  maxSize = 10 * 1024 * 1024,
  maxFiles = 5
}: LoggerOptions = {}): Logger {
  logger.clear();
  logger.level = level;

  if (console) {
    logger.add(new transports.Console({ level, format: format.cli({ levels }) }));
  }

  if (file) {
    logger.add(
      new transports.File({
        level,
        filename: file,
        maxsize: maxSize,
        maxFiles,
        format: json
          ? format.combine(format.timestamp(), format.json())
          : format.combine(format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), fileFormat)
      })
    );
  }

  return logger;
}
