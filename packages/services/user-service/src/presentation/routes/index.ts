/**
 * API routes for user-service
 *
 * - notification.routes.ts: notification settings, device registration
 * - health.routes.ts: liveness and scheduler health
 */

import { Router } from 'express';
import type { NotificationSettingService } from '../../application/services/NotificationSettingService';
import type { UserDeviceService } from '../../application/services/UserDeviceService';
import { NotificationSettingController } from '../controllers/NotificationSettingController';
import { UserDeviceController } from '../controllers/UserDeviceController';
import { registerNotificationRoutes } from './notification.routes';
import { registerHealthRoutes, type HealthRouteDeps } from './health.routes';

export interface RouteDeps extends HealthRouteDeps {
  notificationSettingService: NotificationSettingService;
  userDeviceService: UserDeviceService;
}

export function createRoutes(deps: RouteDeps): Router {
  const router = Router();

  registerNotificationRoutes(router, {
    notificationSettingController: new NotificationSettingController(deps.notificationSettingService),
    userDeviceController: new UserDeviceController(deps.userDeviceService),
  });
  registerHealthRoutes(router, deps);

  return router;
}
