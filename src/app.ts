import { randomUUID } from 'crypto';
import express, { Application, Router } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';

import type { Bridge } from './bridge';
import { createApiKeyMiddleware } from './middleware/apiKey.middleware';
import { errorHandler } from './middleware/errorHandler.middleware';
import { createSnapshotRouter } from './controllers/snapshot.controller';
import { createEntitiesRouter } from './controllers/entities.controller';
import { createDiagnosticsRouter } from './controllers/diagnostics.controller';
import { createChargerRouter } from './controllers/charger.controller';
import { getAppConfig, type AppConfig } from './config/appConfig';
import { logger } from './utils/logger';
import { requestIdOf } from './utils/requestId';

export type AppDependencies = Pick<Bridge, 'coordinator' | 'adapters' | 'diagnostics'>;

export const createApp = (
  bridge: AppDependencies,
  appConfig: AppConfig = getAppConfig(),
): Application => {
  const { coordinator } = bridge;
  const app = express();

  const redactPaths = appConfig.logging.redactHeaders.map((header) => {
    const sanitized = header.toLowerCase();
    return /^[a-z0-9_]+$/.test(sanitized)
      ? `req.headers.${sanitized}`
      : `req.headers["${sanitized}"]`;
  });

  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const incomingHeader = req.headers[appConfig.requestIdHeader];
        const candidate = Array.isArray(incomingHeader)
          ? incomingHeader[0]
          : incomingHeader;
        const requestId = candidate && candidate.length > 0 ? candidate : randomUUID();
        res.setHeader(appConfig.requestIdHeader, requestId);
        return requestId;
      },
      redact: {
        paths: redactPaths,
        remove: true,
      },
      serializers: {
        req(req) {
          const { id, method, url } = req;
          return { id, method, url };
        },
        res(res) {
          const { statusCode } = res;
          return { statusCode };
        },
      },
    }),
  );

  app.use(
    helmet({
      contentSecurityPolicy: appConfig.helmet.contentSecurityPolicy,
      crossOriginEmbedderPolicy: false,
    }),
  );
  app.use(express.json());
  app.use(
    rateLimit({
      windowMs: appConfig.rateLimit.windowMs,
      limit: appConfig.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        const retryAfterSeconds = Math.ceil(appConfig.rateLimit.windowMs / 1000);
        res.setHeader('Retry-After', retryAfterSeconds.toString());
        const requestId = requestIdOf(req);
        res.status(429).json({
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests. Slow down before retrying.',
            details: {
              windowMs: appConfig.rateLimit.windowMs,
              maxRequests: appConfig.rateLimit.max,
              retryAfterSeconds,
            },
            requestId,
          },
        });
      },
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/ready', (req, res) => {
    const requestId = requestIdOf(req);
    const status = coordinator.getStatus();
    const published = coordinator.getSnapshot().sequence > 0;

    if (!published || !status.available) {
      res.status(503).json({
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: published
            ? 'Vehicle data is unavailable after repeated failed polls.'
            : 'No vehicle data has been fetched yet.',
          details: {
            consecutiveFailures: status.consecutiveFailures,
            failureThreshold: status.failureThreshold,
            reauthRequired: status.reauthRequired,
            lastError: status.lastError,
          },
          requestId,
        },
      });
      return;
    }

    res.json({
      status: 'ready',
      details: {
        lastUpdatedAt: status.lastUpdatedAt,
        sequence: coordinator.getSnapshot().sequence,
      },
      requestId,
    });
  });

  const apiRouter = Router();
  apiRouter.use(createApiKeyMiddleware(appConfig.apiKey));
  apiRouter.use('/snapshot', createSnapshotRouter(coordinator));
  apiRouter.use('/entities', createEntitiesRouter(coordinator, bridge.adapters));
  apiRouter.use('/diagnostics', createDiagnosticsRouter(bridge.diagnostics));
  apiRouter.use('/charger', createChargerRouter(coordinator));

  app.use('/api/v1', apiRouter);

  app.use((req, res) => {
    const requestId = requestIdOf(req);
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
        requestId,
      },
    });
  });

  app.use(errorHandler);

  return app;
};
