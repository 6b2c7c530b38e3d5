import type { Router } from 'express';
import type { NotificationSettingController } from '../controllers/NotificationSettingController';
import type { UserDeviceController } from '../controllers/UserDeviceController';

interface NotificationRouteDeps {
  notificationSettingController: NotificationSettingController;
  userDeviceController: UserDeviceController;
}

export function registerNotificationRoutes(router: Router, deps: NotificationRouteDeps): void {
  const { notificationSettingController, userDeviceController } = deps;

  router.get('/notification-settings', (req, res) => notificationSettingController.getSetting(req, res));
  router.patch('/notification-settings', (req, res) => notificationSettingController.updateSetting(req, res));

  // Push token registration; called by the app after each sign-in
  router.post('/devices', (req, res) => userDeviceController.registerDevice(req, res));
}
