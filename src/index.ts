import dotenvFlow from 'dotenv-flow';
import type { Server } from 'http';

import { createApp } from './app';
import { createBridge, type Bridge } from './bridge';
import { getAppConfig } from './config/appConfig';
import { getVinfastConfig } from './config/vinfastConfig';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

dotenvFlow.config();

const appConfig = getAppConfig();
let bridge: Bridge | undefined;
let server: Server | undefined;

const start = async (): Promise<void> => {
  const vinfastConfig = getVinfastConfig();
  bridge = createBridge(vinfastConfig);

  bridge.coordinator.subscribe((outcome) => {
    if (outcome.reauthRequired) {
      logger.error(
        { consecutiveFailures: outcome.consecutiveFailures },
        'vinfast credentials need attention; update VINFAST_EMAIL / VINFAST_PASSWORD',
      );
    }
  });

  const first = await bridge.coordinator.refresh('manual');
  if (!first.success) {
    logger.warn({ err: first.error }, 'initial poll failed; serving until the next cycle succeeds');
  }
  bridge.coordinator.start();

  const app = createApp(bridge, appConfig);
  server = app.listen(appConfig.port, () => {
    logger.info(
      { port: appConfig.port, unitSystem: vinfastConfig.unitSystem },
      'server listening',
    );
  });
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, 'shutdown signal received');

  await new Promise<void>((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }

    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  await bridge?.coordinator.stop();

  logger.info('shutdown complete');
  process.exit(0);
};

start().catch((error: unknown) => {
  logger.error({ err: describeError(error) }, 'failed to start server');
  process.exit(1);
});

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];
signals.forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: describeError(error) }, 'error during shutdown');
      process.exit(1);
    });
  });
});
