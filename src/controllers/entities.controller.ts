import { Router } from 'express';

import { renderEntities, type EntityAdapter } from '../entities';
import type { PollingCoordinator } from '../services/pollingCoordinator.service';
import { notFoundError } from '../utils/errors';

export const createEntitiesRouter = (
  coordinator: PollingCoordinator,
  adapters: readonly EntityAdapter[],
): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      data: renderEntities(adapters, coordinator.getSnapshot(), coordinator.isAvailable()),
    });
  });

  router.get('/:key', (req, res, next) => {
    const adapter = adapters.find((candidate) => candidate.key === req.params.key);
    if (!adapter) {
      next(notFoundError(`Unknown entity "${req.params.key}"`));
      return;
    }

    res.json({ data: adapter.render(coordinator.getSnapshot(), coordinator.isAvailable()) });
  });

  return router;
};
