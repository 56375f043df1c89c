import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'node:crypto';
import { UnauthorizedError } from '../core/errors.js';

const digest = (value: string) => createHash('sha256').update(value).digest();

export function bearerToken(req: Request): string | null {
  const hdr = String(req.headers.authorization || '');
  const match = /^Bearer\s+(.+)$/i.exec(hdr);
  return match ? match[1].trim() : null;
}

/**
 * Static API key check. Without a configured key every request passes.
 */
export function requireApiKey(apiKey?: string): RequestHandler {
  const expected = apiKey ? digest(apiKey) : null;
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!expected) return next();
    const token = bearerToken(req);
    if (!token || !timingSafeEqual(digest(token), expected)) {
      return next(new UnauthorizedError());
    }
    return next();
  };
}
