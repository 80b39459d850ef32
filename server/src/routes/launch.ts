import { Router, type Request, type Response } from 'express';

import { DisplayOptionsPatchSchema, formatIssues } from '../config/launchConfig';
import { EMPTY_TILE } from '../display/tileRenderer';
import type { LaunchBoard } from '../display/launchBoard';
import type { LaunchTracker } from '../engine/launchTracker';
import { errorMessage, logError, logInfo } from '../observability/logger';

function setPublishedHeaders(res: Response, board: LaunchBoard): void {
  const { publishedAt } = board.snapshot();
  if (publishedAt !== null) {
    res.setHeader('X-Launch-Published-At', new Date(publishedAt).toISOString());
  }
}

export function createLaunchRouter(tracker: LaunchTracker, board: LaunchBoard): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const { attributes } = board.snapshot();
    if (!attributes) {
      res.status(503).json({ error: 'Launch data not loaded yet' });
      return;
    }
    setPublishedHeaders(res, board);
    res.json(attributes);
  });

  router.get('/tile', (_req: Request, res: Response) => {
    setPublishedHeaders(res, board);
    res.type('html').send(board.snapshot().attributes?.tile ?? EMPTY_TILE);
  });

  router.get('/state', (_req: Request, res: Response) => {
    const snapshot = tracker.snapshot();
    res.json({
      ...snapshot,
      wakeups: snapshot.wakeups.map((wakeup) => ({
        ...wakeup,
        atIso: new Date(wakeup.at).toISOString()
      }))
    });
  });

  router.post('/refresh', async (req: Request, res: Response) => {
    const requestId = req.requestId;
    try {
      await tracker.refresh(`manual:${requestId ?? 'unknown'}`);
      const { lastError } = tracker.snapshot();
      logInfo('launch_manual_refresh', { requestId, lastError });
      res.status(lastError ? 502 : 200).json({
        refreshed: lastError === null,
        error: lastError,
        attributes: board.snapshot().attributes
      });
    } catch (err) {
      logError('launch_manual_refresh_failed', { requestId, error: errorMessage(err) });
      res.status(500).json({ error: 'Refresh failed', requestId });
    }
  });

  router.post('/configure', async (req: Request, res: Response) => {
    const requestId = req.requestId;
    const parsed = DisplayOptionsPatchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error), requestId });
      return;
    }

    try {
      await tracker.configure(parsed.data);
      res.json({ display: tracker.snapshot().display, attributes: board.snapshot().attributes });
    } catch (err) {
      logError('launch_configure_failed', { requestId, error: errorMessage(err) });
      res.status(500).json({ error: 'Configure failed', requestId });
    }
  });

  return router;
}
