import type { Request, Response } from 'express';

export interface HealthPayload {
  ok: true;
  message: string;
}

export const HEALTH_PAYLOAD: HealthPayload = {
  ok: true,
  message: 'media relay is up',
};

export function healthHandler(_req: Request, res: Response): void {
  res.status(200).json(HEALTH_PAYLOAD);
}

// Uptime monitors probe with HEAD; answer without a body.
export function healthHeadHandler(_req: Request, res: Response): void {
  res.status(200).end();
}
