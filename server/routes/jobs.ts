import type { Request, Response, Router } from 'express';
import type { JobRecord } from '../core/JobRegistry.js';
import type { Orchestrator } from '../core/Orchestrator.js';
import { wrap } from '../core/wrap.js';

const client = (req: Request) => req.clientId ?? `ip:${req.ip ?? 'unknown'}`;

/** Job as returned to clients; cookie jars never leave the server. */
export function toJobView(job: JobRecord) {
  const { cookies, ...request } = job.request;
  return { ...job, request: { ...request, hasCookies: Boolean(cookies) } };
}

export function setupJobRoutes(router: Router, orchestrator: Orchestrator) {
  router.post(
    '/download',
    wrap(async (req: Request, res: Response) => {
      const job = await orchestrator.startDownload(client(req), req.body);
      res.status(202).location(`/download/${job.id}`).json(toJobView(job));
    }),
  );

  router.get(
    '/download/:id',
    wrap(async (req: Request, res: Response) => {
      const job = await orchestrator.getJob(client(req), req.params.id);
      res.setHeader('Cache-Control', 'no-store');
      res.json(toJobView(job));
    }),
  );

  router.post(
    '/download/:id/cancel',
    wrap(async (req: Request, res: Response) => {
      const job = await orchestrator.cancelJob(client(req), req.params.id);
      res.json(toJobView(job));
    }),
  );
}
