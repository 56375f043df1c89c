import type { Request, Response, Router } from 'express';
import type { Orchestrator } from '../core/Orchestrator.js';
import { wrap } from '../core/wrap.js';

const client = (req: Request) => req.clientId ?? `ip:${req.ip ?? 'unknown'}`;

/**
 * Lookup endpoints: metadata, formats, stream URLs, playlists and libraries
 */
export function setupMediaRoutes(router: Router, orchestrator: Orchestrator) {
  router.post(
    '/info',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.lookupMetadata(client(req), req.body));
    }),
  );

  router.post(
    '/info/raw',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.lookupRawInfo(client(req), req.body));
    }),
  );

  router.get(
    '/formats',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.lookupFormats(client(req), req.query));
    }),
  );

  router.post(
    '/formats',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.lookupFormats(client(req), req.body));
    }),
  );

  router.post(
    '/stream',
    wrap(async (req: Request, res: Response) => {
      res.setHeader('Cache-Control', 'no-store');
      res.json(await orchestrator.getStreamUrl(client(req), req.body));
    }),
  );

  router.post(
    '/playlist',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.listPlaylist(client(req), req.body));
    }),
  );

  router.post(
    '/library/:kind',
    wrap(async (req: Request, res: Response) => {
      res.json(await orchestrator.listLibrary(client(req), req.params.kind, req.body));
    }),
  );

  router.post(
    '/cache/clear',
    wrap(async (req: Request, res: Response) => {
      res.json({ ok: true, ...(await orchestrator.clearCache(client(req))) });
    }),
  );
}
