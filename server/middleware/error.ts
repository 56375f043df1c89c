import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError, InternalError, isAppError, RateLimitedError, ValidationError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

/**
 * Body-parser and other http-errors style failures carry a 4xx status; keep it.
 */
function normalizeError(err: unknown): AppError {
  if (isAppError(err)) return err;
  const status = statusOf(err);
  if (status === 413) return new ValidationError('Request body too large');
  if (status !== undefined && status >= 400 && status < 500) {
    return new ValidationError(err instanceof Error ? err.message : 'Invalid request');
  }
  return new InternalError();
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  // Express recognises error middleware by its four parameters.
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    void _next;
    const normalized = normalizeError(err);
    if (normalized.status >= 500) {
      log.error('request_failed', { id: req.id, path: req.path, error: err instanceof Error ? err.stack || err.message : String(err) });
    } else {
      log.debug('request_rejected', { id: req.id, path: req.path, code: normalized.code });
    }

    if (normalized instanceof RateLimitedError) {
      res.setHeader('Retry-After', String(Math.max(1, Math.ceil(normalized.retryAfterMs / 1000))));
    }

    const details =
      process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack || String(err) : normalized.details;
    res.status(normalized.status).json({
      ok: false,
      requestId: req.id,
      error: {
        code: normalized.code,
        message: normalized.message,
        details,
      },
    });
  };
}
