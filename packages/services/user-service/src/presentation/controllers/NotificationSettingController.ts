import type { Request, Response } from 'express';
import { z } from 'zod';
import { createControllerHelpers } from '@lastcup/platform-core';
import type { NotificationSettingService } from '../../application/services/NotificationSettingService';
import { ServiceErrors } from '../utils/response-helpers';
import { requireUserId } from '../utils/user-context';

const { handleRequest } = createControllerHelpers(ServiceErrors);

const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

export const updateNotificationSettingSchema = z
  .object({
    isEnabled: z.boolean().optional(),
    recordRemindAt: timeOfDay.optional(),
    dailyCloseAt: timeOfDay.optional(),
  })
  .strict();

export class NotificationSettingController {
  constructor(private readonly settingService: NotificationSettingService) {}

  async getSetting(req: Request, res: Response): Promise<void> {
    const userId = requireUserId(req, res);
    if (!userId) return;

    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to load notification settings',
      handler: () => this.settingService.findOrCreate(userId),
    });
  }

  async updateSetting(req: Request, res: Response): Promise<void> {
    const userId = requireUserId(req, res);
    if (!userId) return;

    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to update notification settings',
      handler: () => this.settingService.update(userId, updateNotificationSettingSchema.parse(req.body)),
    });
  }
}
