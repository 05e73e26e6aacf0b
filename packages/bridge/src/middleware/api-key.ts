import type { NextFunction, Request, Response } from 'express';
import { timingSafeEqual } from 'crypto';
import { logger } from '@askbridge/shared';

export const API_KEY_HEADER = 'X-API-Key';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Reject requests whose X-API-Key header does not carry the shared key.
 */
export const requireApiKey = (expectedKey: string) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const provided = req.get(API_KEY_HEADER);

    if (!provided || !keysMatch(provided, expectedKey)) {
      logger.warn(`🔒 Rejected ${req.method} ${req.path}: ${provided ? 'invalid' : 'missing'} API key`, {
        ip: req.ip,
      });
      res.status(401).json({
        success: false,
        error: 'Missing or invalid API key',
      });
      return;
    }

    next();
  };
};
