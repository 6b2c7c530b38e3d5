import type { Request, Response } from 'express';
import { z } from 'zod';
import { createControllerHelpers } from '@lastcup/platform-core';
import type { UserDeviceService } from '../../application/services/UserDeviceService';
import { DEVICE_PLATFORMS } from '../../domains/notifications/types';
import { ServiceErrors } from '../utils/response-helpers';
import { requireUserId } from '../utils/user-context';

const { handleRequest } = createControllerHelpers(ServiceErrors);

export const registerDeviceSchema = z.object({
  token: z.string().nullish(),
  platform: z.enum(DEVICE_PLATFORMS),
});

export class UserDeviceController {
  constructor(private readonly deviceService: UserDeviceService) {}

  async registerDevice(req: Request, res: Response): Promise<void> {
    const userId = requireUserId(req, res);
    if (!userId) return;

    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to register device',
      successStatus: 201,
      handler: async () => {
        const { token, platform } = registerDeviceSchema.parse(req.body);
        return this.deviceService.createOrUpdateDevice(userId, token, platform);
      },
    });
  }
}
