import type { Express, Request, Response } from 'express';
import type { AppMetrics } from '../core/metrics.js';
import type { Orchestrator } from '../core/Orchestrator.js';
import { wrap } from '../core/wrap.js';
import type { RequestStats } from '../middleware/requestLog.js';

export const APP_NAME = 'mediagate';
export const APP_VERSION = '1.0.0';

const ENDPOINTS = [
  'GET /health',
  'GET /metrics',
  'POST /info',
  'POST /info/raw',
  'GET /formats?url=',
  'POST /formats',
  'POST /stream',
  'POST /playlist',
  'POST /library/:kind',
  'POST /cache/clear',
  'POST /download',
  'GET /download/:id',
  'POST /download/:id/cancel',
];

export type SystemDeps = {
  orchestrator: Orchestrator;
  metrics: AppMetrics;
  stats: RequestStats;
};

export function setupSystemRoutes(app: Express, deps: SystemDeps) {
  const { orchestrator, metrics, stats } = deps;

  app.get('/', (_req: Request, res: Response) => {
    res.json({ name: APP_NAME, version: APP_VERSION, endpoints: ENDPOINTS });
  });

  app.get('/health', (_req: Request, res: Response) => {
    const health = orchestrator.health();
    res.setHeader('Cache-Control', 'no-store');
    res.status(health.status === 'ok' ? 200 : 503).json({
      ...health,
      requests: stats.requests,
      errors: stats.errors,
    });
  });

  app.get(
    '/metrics',
    wrap(async (_req: Request, res: Response) => {
      const body = await metrics.registry.metrics();
      res.setHeader('Content-Type', metrics.registry.contentType);
      res.end(body);
    }),
  );
}
