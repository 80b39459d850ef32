import cors from 'cors';
import express, { type Express } from 'express';

import { DEFAULT_PATCH_SVG } from './display/icons';
import type { LaunchBoard } from './display/launchBoard';
import type { LaunchTracker } from './engine/launchTracker';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { applyRequestTracing } from './observability/requestTracing';
import { errorMessage } from './observability/logger';
import { createLaunchRouter } from './routes/launch';

export function createApp(tracker: LaunchTracker, board: LaunchBoard): Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());
  app.use(express.json());

  app.use('/api/launch', createLaunchRouter(tracker, board));

  app.get('/assets/default-patch.svg', (_req, res) => {
    res.type('image/svg+xml').send(DEFAULT_PATCH_SVG);
  });

  app.get('/', (_req, res) => {
    res.send('Launch tile server');
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}
