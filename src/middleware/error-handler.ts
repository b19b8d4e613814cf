import type { NextFunction, Request, Response } from 'express';

import { AppError, ValidationError } from '../errors/app-error.js';

import { logError, logWarn } from '../services/logger.js';

export interface ErrorResponse {
  ok: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Readonly<Record<string, unknown>>;
    stack?: string;
  };
}

interface BodyParserError extends Error {
  type?: string;
  status?: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof Reflect.get(err, 'type') === 'string';
}

/** express.json() failures become 400s instead of opaque 500s. */
export function normalizeError(err: Error): Error {
  if (!isBodyParserError(err)) return err;
  if (err.type === 'entity.parse.failed') {
    return new ValidationError('Malformed JSON body');
  }
  if (err.type === 'entity.too.large') {
    return new ValidationError('Request body too large');
  }
  return err;
}

function isExposed(err: Error): err is AppError {
  return err instanceof AppError && err.isOperational;
}

function getStatusCode(err: Error): number {
  return isExposed(err) ? err.statusCode : 500;
}

function getErrorCode(err: Error): string {
  return isExposed(err) ? err.code : 'INTERNAL_ERROR';
}

function getErrorMessage(err: Error): string {
  return isExposed(err) ? err.message : 'Internal Server Error';
}

function getErrorDetails(
  err: Error
): Readonly<Record<string, unknown>> | undefined {
  if (!isExposed(err)) return undefined;
  if (!('details' in err)) return undefined;
  const details: unknown = err.details;
  if (details === null || typeof details !== 'object') return undefined;
  const entries = Object.entries(details);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function buildErrorResponse(err: Error): ErrorResponse {
  const details = getErrorDetails(err);
  const response: ErrorResponse = {
    ok: false,
    error: {
      message: getErrorMessage(err),
      code: getErrorCode(err),
      statusCode: getStatusCode(err),
      ...(details && { details }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    response.error.stack = err.stack;
  }

  return response;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const normalized = normalizeError(err);
  const statusCode = getStatusCode(normalized);
  const summary = `HTTP ${statusCode}: ${normalized.message} - ${req.method} ${req.path}`;

  if (statusCode >= 500) {
    logError(summary, normalized);
  } else {
    logWarn(summary, { code: getErrorCode(normalized) });
  }

  if (res.headersSent) return;
  res.status(statusCode).json(buildErrorResponse(normalized));
}
