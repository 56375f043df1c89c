import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../core/logger.js';

const SENSITIVE = /^(authorization|cookie|x-api-key|x-auth-token)$/i;
const SENSITIVE_QUERY = new Set(['cookies', 'token']);
const REQUEST_ID = /^[\w.:-]{1,128}$/;

/** Counters surfaced on the health endpoint. */
export type RequestStats = {
  requests: number;
  errors: number;
};

function redactHeaders(h: Request['headers']) {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(h)) {
    out[key] = SENSITIVE.test(key) ? '***' : value;
  }
  return out;
}

function redactUrl(url: string) {
  if (!url) return url;
  try {
    const parsed = new URL(url, 'http://localhost');
    for (const key of SENSITIVE_QUERY) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, '***');
    }
    const query = parsed.searchParams.toString();
    return `${parsed.pathname}${query ? `?${query}` : ''}`;
  } catch {
    return url.replace(/([?&])(cookies|token)=[^&#]*/gi, '$1$2=***');
  }
}

const QUIET_PATHS = new Set(['/health', '/metrics']);

function isQuietRequest(req: Request, statusCode: number) {
  if (req.method === 'OPTIONS') return true;
  if ((req.method === 'GET' || req.method === 'HEAD') && QUIET_PATHS.has(req.path) && statusCode < 400) return true;
  return false;
}

export function createRequestLogger(log: Logger, stats: RequestStats): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.headers['x-request-id'];
    const id = typeof incoming === 'string' && REQUEST_ID.test(incoming) ? incoming : randomUUID();
    req.id = id;
    res.setHeader('x-request-id', id);
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      stats.requests += 1;
      if (res.statusCode >= 500) stats.errors += 1;
      if (isQuietRequest(req, res.statusCode)) return;
      const durMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      const entry = {
        id,
        ip: req.ip,
        client: req.clientId,
        m: req.method,
        u: redactUrl(req.originalUrl || req.url),
        s: res.statusCode,
        durMs,
        h: redactHeaders(req.headers),
      };
      if (res.statusCode >= 500) log.warn('http_request', entry);
      else log.info('http_request', entry);
    });

    next();
  };
}
