/**
 * Shared-secret guard for payment-engine hooks
 */

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';

export const HOOK_SECRET_HEADER = 'x-payment-hook-secret';

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function hookAuthMiddleware(secret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) {
      return res.status(503).json({ error: 'HOOK_DISABLED', message: 'Payment hook secret is not configured' });
    }

    const given = req.get(HOOK_SECRET_HEADER);
    if (!given || !sameSecret(given, secret)) {
      return res.status(401).json({ error: 'UNAUTHORIZED', message: 'Invalid payment hook secret' });
    }

    next();
  };
}
