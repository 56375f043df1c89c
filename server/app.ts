import express, { type Express } from 'express';
import { NotFoundError } from './core/errors.js';
import { getLogger, type Logger } from './core/logger.js';
import { createMetrics } from './core/metrics.js';
import type { Orchestrator } from './core/Orchestrator.js';
import { requireApiKey } from './middleware/auth.js';
import { clientIdentity } from './middleware/clientId.js';
import { errorHandler } from './middleware/error.js';
import { metricsMiddleware } from './middleware/httpMetrics.js';
import { createFloodGuard } from './middleware/rateLimit.js';
import { createRequestLogger, type RequestStats } from './middleware/requestLog.js';
import { applySecurity } from './middleware/security.js';
import { setupJobRoutes } from './routes/jobs.js';
import { setupMediaRoutes } from './routes/media.js';
import { setupSystemRoutes } from './routes/system.js';

export type AppOptions = {
  log?: Logger;
};

export function createApp(orchestrator: Orchestrator, options: AppOptions = {}): Express {
  const cfg = orchestrator.config;
  const log = options.log ?? getLogger('http');
  const metrics = createMetrics(orchestrator);
  const stats: RequestStats = { requests: 0, errors: 0 };

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', cfg.trustProxy);

  applySecurity(app, cfg.corsOrigin);
  app.use(createRequestLogger(log, stats));
  app.use(metricsMiddleware(metrics));
  app.use(createFloodGuard(cfg.globalRateLimitPerMin));
  // cookie jars ride in the body
  app.use(express.json({ limit: '512kb' }));

  // public
  setupSystemRoutes(app, { orchestrator, metrics, stats });

  const api = express.Router();
  api.use(requireApiKey(cfg.apiKey));
  api.use(clientIdentity());
  setupMediaRoutes(api, orchestrator);
  setupJobRoutes(api, orchestrator);
  app.use(api);

  app.use((req, _res, next) => next(new NotFoundError(`Route not found: ${req.method} ${req.path}`)));
  app.use(errorHandler(log));
  return app;
}
