import path from 'node:path';

import winston from 'winston';

import { config } from '../config/index.js';

import { AppError } from '../errors/app-error.js';

export type LogMeta = Record<string, unknown>;

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.server.name },
  transports: [
    new winston.transports.Console({
      format:
        process.env.NODE_ENV === 'production'
          ? winston.format.json()
          : winston.format.combine(
              winston.format.colorize(),
              winston.format.simple()
            ),
    }),
  ],
});

if (config.logging.dir) {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'error.log'),
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

export function logInfo(message: string, meta?: LogMeta): void {
  if (config.logging.enabled) logger.info(message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  if (config.logging.enabled) logger.warn(message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  if (config.logging.enabled) logger.debug(message, meta);
}

function describeError(error: Error): LogMeta {
  return {
    error: error.message,
    ...(error instanceof AppError && { code: error.code }),
    ...(error.cause instanceof Error && { cause: error.cause.message }),
    stack: error.stack,
  };
}

export function logError(message: string, error?: Error | LogMeta): void {
  if (!config.logging.enabled) return;
  logger.error(message, error instanceof Error ? describeError(error) : error);
}
