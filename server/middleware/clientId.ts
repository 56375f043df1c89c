import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash } from 'node:crypto';
import { bearerToken } from './auth.js';

const CLIENT_ID = /^[\w.:@-]{1,128}$/;

/**
 * Rate limiting identity: bearer key, else X-Client-ID, else connection IP.
 * Keys are hashed so they never show up in logs.
 */
export function resolveClientId(req: Request): string {
  const token = bearerToken(req);
  if (token) return `key:${createHash('sha256').update(token).digest('hex').slice(0, 16)}`;
  const header = req.headers['x-client-id'];
  const claimed = typeof header === 'string' ? header.trim() : '';
  if (claimed && CLIENT_ID.test(claimed)) return `client:${claimed}`;
  return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

export function clientIdentity(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.clientId = resolveClientId(req);
    next();
  };
}
