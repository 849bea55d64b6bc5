import { Router } from 'express';

import type { PollingCoordinator } from '../services/pollingCoordinator.service';
import { logger } from '../utils/logger';

export const createSnapshotRouter = (coordinator: PollingCoordinator): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      data: {
        snapshot: coordinator.getSnapshot(),
        status: coordinator.getStatus(),
      },
    });
  });

  router.post('/refresh', async (_req, res, next) => {
    try {
      const outcome = await coordinator.refresh('manual');

      logger.info(
        {
          success: outcome.success,
          degraded: outcome.degraded,
          sequence: outcome.snapshot.sequence,
          consecutiveFailures: outcome.consecutiveFailures,
        },
        'manual refresh completed',
      );

      res.json({ data: outcome });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
