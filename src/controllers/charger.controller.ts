import { Router } from 'express';
import { z } from 'zod';

import { parseBody } from '../middleware/validation.middleware';
import type { PollingCoordinator } from '../services/pollingCoordinator.service';

const chargerHintSchema = z.object({
  charging: z.boolean(),
});

export const createChargerRouter = (coordinator: PollingCoordinator): Router => {
  const router = Router();

  router.post('/', (req, res, next) => {
    try {
      const { charging } = parseBody(chargerHintSchema, req.body);
      coordinator.setChargingHint(charging);

      const status = coordinator.getStatus();
      res.status(202).json({
        data: {
          chargingHint: status.chargingHint,
          intervalMs: status.intervalMs,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
