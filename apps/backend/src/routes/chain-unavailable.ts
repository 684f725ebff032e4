import type { Request, Response } from 'express';

export function chainUnavailable(_req: Request, res: Response): void {
  res.status(503).json({
    success: false,
    error: 'Blockchain access is not configured (PRIVATE_KEY is missing)',
    errorCode: 'CHAIN_UNAVAILABLE',
  });
}
