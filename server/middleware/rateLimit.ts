/**
 * Coarse per-IP flood guard in front of every route. Per-client quotas are
 * enforced by the orchestrator's own limiter.
 */

import rateLimit from 'express-rate-limit';
import { RateLimitedError } from '../core/errors.js';

export function createFloodGuard(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60_000, // 1 minute
    limit: limitPerMinute,
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false,
    skip: (req) => req.path === '/health',
    handler: (_req, _res, next, options) => {
      next(new RateLimitedError(options.windowMs));
    },
  });
}
