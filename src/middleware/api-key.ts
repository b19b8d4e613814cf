import { createHash, timingSafeEqual } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import { UnauthorizedError } from '../errors/app-error.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function timingSafeEqualUtf8(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function extractApiKey(req: Request): string | undefined {
  const authorization = req.headers.authorization;
  if (authorization) {
    const [scheme, token] = authorization.split(' ', 2);
    if (scheme?.toLowerCase() === 'bearer' && token) return token.trim();
  }

  const headerKey = req.headers['x-api-key'];
  if (typeof headerKey === 'string' && headerKey.trim()) {
    return headerKey.trim();
  }

  return undefined;
}

/**
 * Requires the configured key on every request when one is set. With no key
 * configured the middleware lets everything through.
 */
export function createApiKeyMiddleware(
  apiKey: string | undefined
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const provided = extractApiKey(req);
    if (!provided || !timingSafeEqualUtf8(provided, apiKey)) {
      next(new UnauthorizedError('Invalid or missing API key'));
      return;
    }

    next();
  };
}
