/**
 * Service Factory - Composition Root
 * Wires repositories, transport, use cases and schedulers from configuration
 */

import type { ServiceConfig } from '../../config/service-config';
import { DatabaseConnectionFactory } from '../database/DatabaseConnectionFactory';
import {
  DeviceTokenRepository,
  DispatchLogRepository,
  NotificationSettingRepository,
} from '../repositories/notifications';
import { ExpoPushTransport } from '../notification/ExpoPushTransport';
import { UserNotificationScheduler } from '../schedulers/UserNotificationScheduler';
import { DispatchScheduledNotificationsUseCase } from '../../application/use-cases/notifications/DispatchScheduledNotificationsUseCase';
import { NotificationSettingService } from '../../application/services/NotificationSettingService';
import { UserDeviceService } from '../../application/services/UserDeviceService';
import { systemClock } from '../../domains/notifications/clock';

export interface ServiceContainer {
  databaseFactory: DatabaseConnectionFactory;
  notificationSettingService: NotificationSettingService;
  userDeviceService: UserDeviceService;
  dispatchUseCase: DispatchScheduledNotificationsUseCase;
  notificationScheduler: UserNotificationScheduler;
}

export function createServiceContainer(config: ServiceConfig): ServiceContainer {
  const databaseFactory = DatabaseConnectionFactory.configure({
    url: config.database.url,
    poolMax: config.database.poolMax,
  });

  const settingRepository = databaseFactory.createDrizzleRepository(NotificationSettingRepository);
  const deviceTokenRepository = databaseFactory.createDrizzleRepository(DeviceTokenRepository);
  const dispatchLogRepository = databaseFactory.createDrizzleRepository(DispatchLogRepository);

  const pushTransport = new ExpoPushTransport({ endpoint: config.expo.endpoint, accessToken: config.expo.accessToken });

  const dispatchUseCase = new DispatchScheduledNotificationsUseCase({
    settingRepository,
    deviceTokenRepository,
    dispatchLogRepository,
    pushTransport,
    clock: systemClock,
    timeZone: config.notifications.timeZone,
    concurrency: config.notifications.concurrency,
  });

  return {
    databaseFactory,
    notificationSettingService: new NotificationSettingService(settingRepository),
    userDeviceService: new UserDeviceService(deviceTokenRepository, systemClock),
    dispatchUseCase,
    notificationScheduler: new UserNotificationScheduler(dispatchUseCase, {
      cronExpression: config.notifications.cronExpression,
      timezone: config.notifications.timeZone,
      enabled: config.notifications.schedulerEnabled,
    }),
  };
}
