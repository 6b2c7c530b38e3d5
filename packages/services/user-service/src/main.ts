import 'dotenv/config';
import {
  SchedulerRegistry,
  createLogger,
  registerPhasedShutdownHook,
  serializeError,
  setupGracefulShutdown,
  circuitBreakers,
} from '@lastcup/platform-core';
import { loadServiceConfig } from './config/service-config';
import { SERVICE_NAME } from './config/logging';
import { createServiceContainer } from './infrastructure/composition/ServiceFactory';
import { createApp } from './presentation/app';

const logger = createLogger(SERVICE_NAME);

async function startServer(): Promise<void> {
  const config = loadServiceConfig();
  logger.info('Starting user-service...', {
    nodeEnv: config.env,
    databaseUrlAvailable: config.database.url !== undefined,
    timeZone: config.notifications.timeZone,
  });

  const container = createServiceContainer(config);

  // Open the pool before accepting traffic so a bad URL fails the boot
  const warmup = await container.databaseFactory.healthCheck();
  logger.info('Database connection warmed up', { latencyMs: warmup.latencyMs, status: warmup.status });

  const app = createApp({
    notificationSettingService: container.notificationSettingService,
    userDeviceService: container.userDeviceService,
    getSchedulerHealth: () => SchedulerRegistry.getHealthReport(),
    checkDatabase: () => container.databaseFactory.healthCheck(),
  });

  SchedulerRegistry.register(container.notificationScheduler);

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info('User Service started', { port: config.port });

    SchedulerRegistry.startAll();
  });

  server.keepAliveTimeout = 65000;
  server.headersTimeout = 70000;

  setupGracefulShutdown(server);
  registerPhasedShutdownHook('connections', () => container.databaseFactory.close(), 'database');
  registerPhasedShutdownHook('connections', async () => circuitBreakers.shutdownAll(), 'circuit-breakers');
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start user-service', { error: serializeError(error) });
  process.exit(1);
});
