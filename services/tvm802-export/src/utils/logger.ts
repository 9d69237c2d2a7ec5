/**
 * TVM802 Export - Logger
 *
 * Winston-based structured logging. Everything goes to stderr so that
 * summaries printed on stdout can be piped.
 */

import winston from 'winston';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

interface LogMetadata {
  service?: string;
  operation?: string;
  filePath?: string;
  duration?: number;
  [key: string]: unknown;
}

// "<time> [level] (service) message {meta}"
export const lineFormat = printf(({ level, message, timestamp, stack, service, ...metadata }) => {
  const scope = typeof service === 'string' ? ` (${service})` : '';
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} [${level}]${scope} ${String(message)}${meta}${stackTrace}`;
});

const winstonLogger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(errors({ stack: true }), timestamp({ format: 'HH:mm:ss.SSS' })),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(colorize({ all: config.nodeEnv === 'development' }), lineFormat),
    }),
  ],
});

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

function scopedLogger(scope: LogMetadata): Logger {
  return {
    debug: (message, metadata) => winstonLogger.debug(message, { ...scope, ...metadata }),
    info: (message, metadata) => winstonLogger.info(message, { ...scope, ...metadata }),
    warn: (message, metadata) => winstonLogger.warn(message, { ...scope, ...metadata }),
    error: (message, error, metadata) =>
      winstonLogger.error(message, { ...scope, ...metadata, error: error?.message, stack: error?.stack }),
    child: (metadata) => scopedLogger({ ...scope, ...metadata }),
  };
}

export const log = scopedLogger({});

export default log;
