import path from 'path';
import fs from 'fs';
import winston from 'winston';
import { formatStamp } from './dates';

const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, ...metadata }) => {
    let metaStr = '';
    if (Object.keys(metadata).length > 0 && !metadata.stack) {
      metaStr = ` ${JSON.stringify(metadata)}`;
    }

    let stackStr = '';
    if (metadata.stack) {
      stackStr = `\n${metadata.stack}`;
    }

    return `${timestamp} [${level}]: ${message}${metaStr}${stackStr}`;
  })
);

const defaultLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

export const logger = winston.createLogger({
  level: defaultLevel,
  format: logFormat,
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({ format: consoleFormat })
  ]
});

export interface LoggerOptions {
  level?: string;
  console?: boolean;
  /** may contain a {timestamp} placeholder */
  file?: string;
  /** a relative file resolves against this directory */
  baseDir?: string;
}

/**
 * Reconfigure the shared logger from a workflow profile's logging section
 * @returns path of the log file, when one was added
 */
export function configureLogger(options: LoggerOptions): string | undefined {
  if (options.level) {
    logger.level = options.level.toLowerCase();
  }

  if (options.console === false) {
    logger.clear();
  }

  if (!options.file) {
    return undefined;
  }

  const filename = path.resolve(options.baseDir ?? '.', options.file.replace('{timestamp}', formatStamp(new Date())));
  fs.mkdirSync(path.dirname(filename), { recursive: true });
  logger.add(new winston.transports.File({ filename, format: logFormat }));
  return filename;
}
