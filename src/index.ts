/**
 * Fleet Safety Alerts server
 *
 * Wires configuration, PostgreSQL, the unit and driver directories, Telegram and the
 * ingestion pipeline into the Express app, then listens. On SIGTERM/SIGINT
 * the server stops accepting connections, in-flight alert dispatches are
 * drained, and the chat client and pool are closed.
 */

import { loadConfig } from './config/env';
import { closePool, createPool } from './config/database';
import { createTelegramClient } from './config/telegram';
import { createApp } from './app';
import { PgEventRepository } from './repositories/event.repository';
import { FleetApiUnitDirectory } from './services/unit-directory.service';
import { UnitResolver } from './services/unit-resolver.service';
import { FleetApiDriverDirectory } from './services/driver-directory.service';
import { DriverResolver } from './services/driver-resolver.service';
import { IngestionPipeline } from './services/ingestion.service';
import { AlertDispatcher } from './services/alert-dispatcher.service';
import { BackgroundTaskRunner } from './utils/background-tasks';
import { errorMessage } from './models/errors/api-error';
import { logger } from './utils/logger';

function bootstrap(): void {
  const config = loadConfig();

  const pool = createPool(config.database);
  const store = new PgEventRepository(pool);

  const fleetApi = config.fleetApi.apiKey
    ? { baseUrl: config.fleetApi.baseUrl, apiKey: config.fleetApi.apiKey, timeoutMs: config.fleetApi.timeoutMs }
    : undefined;
  if (!fleetApi) {
    logger.warn('FLEET_API_KEY not set; vehicle units and driver names will not be looked up');
  }
  const directory = fleetApi ? new FleetApiUnitDirectory(fleetApi) : undefined;
  const driverDirectory = fleetApi ? new FleetApiDriverDirectory(fleetApi) : undefined;

  const pipeline = new IngestionPipeline({
    store,
    unitResolver: new UnitResolver(directory),
    secret: config.webhook.secret,
  });

  const chatClient = createTelegramClient(config.telegram.botToken);
  const dispatcher = new AlertDispatcher(chatClient, {
    chatId: config.telegram.chatId,
    sendTimeoutMs: config.telegram.sendTimeoutMs,
    speedingThresholdMph: config.alerts.speedingThresholdMph,
    driverResolver: new DriverResolver(driverDirectory),
  });
  const backgroundTasks = new BackgroundTaskRunner();

  const app = createApp({
    pipeline,
    dispatcher,
    store,
    backgroundTasks,
    signatureHeader: config.webhook.signatureHeader,
    dashboard: config.dashboard,
  });

  const server = app.listen(config.port, () => {
    logger.info('Fleet Safety Alerts API started', {
      port: config.port,
      environment: config.env,
      healthCheck: `http://localhost:${config.port}/health`,
      apiDocs: `http://localhost:${config.port}/api-docs`,
    });
  });

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logger.warn('HTTP server close reported an error', { error: error.message });
        }
        resolve();
      });
    });

    await backgroundTasks.drain();
    await chatClient.close();
    await closePool(pool);
  };

  const onSignal = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

try {
  bootstrap();
} catch (error) {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
}
