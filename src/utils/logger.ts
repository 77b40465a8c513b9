import winston from 'winston';
import { config } from '../config/index.js';

const { combine, timestamp, errors, json, printf, colorize } = winston.format;

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: string;
  pretty: boolean;
  silent?: boolean;
}

// Custom format for development
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export function createLogger(options: LoggerOptions): Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })),
    defaultMeta: { service: 'bundle-operator' },
    transports: [
      new winston.transports.Console({
        format: options.pretty ? combine(colorize(), devFormat) : combine(json()),
      }),
    ],
  });
}

const logger = createLogger({
  level: config.operator.logLevel,
  pretty: config.isDevelopment,
  silent: config.nodeEnv === 'test',
});

export default logger;

// Structured metadata for an error
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
    };
  }
  return { error: { message: String(error) } };
}

export function logError(
  log: Logger,
  message: string,
  error: unknown,
  metadata?: Record<string, unknown>,
): void {
  log.error(message, { ...errorMeta(error), ...metadata });
}
