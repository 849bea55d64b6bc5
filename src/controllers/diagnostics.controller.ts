import { Router } from 'express';

import type { DiagnosticsReport } from '../services/diagnostics.service';

export const createDiagnosticsRouter = (diagnostics: () => DiagnosticsReport): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ data: diagnostics() });
  });

  return router;
};
