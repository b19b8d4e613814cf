import type { NextFunction, Request, Response } from 'express';

import { normalizeUploadRequest } from '../schemas/inputs.js';

import { logDebug } from '../services/logger.js';
import type { MediaRelay } from '../services/relay.js';

export interface UploadResponse {
  ok: true;
  message_id: number;
}

/**
 * Aborts when the caller goes away before we answer, so an abandoned
 * request stops downloading.
 */
function createClientAbortSignal(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      logDebug('Client disconnected before response', { path: req.path });
      controller.abort();
    }
  });
  return controller.signal;
}

export function createUploadHandler(
  relay: Pick<MediaRelay, 'relay'>
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const request = normalizeUploadRequest(req.body);
      const signal = createClientAbortSignal(req, res);
      const result = await relay.relay(request, signal);
      const payload: UploadResponse = {
        ok: true,
        message_id: result.messageId,
      };
      res.status(200).json(payload);
    } catch (error) {
      next(error);
    }
  };
}
