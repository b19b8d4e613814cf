import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import { config } from '../config/index.js';

import { NotFoundError } from '../errors/app-error.js';

import { createApiKeyMiddleware } from '../middleware/api-key.js';
import { errorHandler } from '../middleware/error-handler.js';

import type { MediaRelay } from '../services/relay.js';

import { healthHandler, healthHeadHandler } from './health.js';
import { createUploadHandler } from './upload-routes.js';

export interface AppOptions {
  relay: Pick<MediaRelay, 'relay'>;
  apiKey?: string;
  bodyLimit?: string;
}

function notFoundHandler(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

export function createApp(options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.head('/', healthHeadHandler);
  app.get('/', healthHandler);

  app.post(
    '/upload',
    createApiKeyMiddleware(options.apiKey),
    express.json({ limit: options.bodyLimit ?? config.server.bodyLimit }),
    createUploadHandler(options.relay)
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
