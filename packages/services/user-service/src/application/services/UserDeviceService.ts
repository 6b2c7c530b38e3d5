import { ValidationError, maskToken } from '@lastcup/platform-core';
import { getLogger } from '../../config/logging';
import type { Clock } from '../../domains/notifications/clock';
import type { IDeviceTokenRepository } from '../../domains/notifications/repositories/IDeviceTokenRepository';
import type { DevicePlatform, UserId } from '../../domains/notifications/types';

const logger = getLogger('user-device-service');

export class UserDeviceService {
  constructor(
    private readonly repository: IDeviceTokenRepository,
    private readonly clock: Clock
  ) {}

  /**
   * Register a push token for the user. A token already on file is moved to
   * this user, re-enabled and touched.
   */
  async createOrUpdateDevice(
    userId: UserId,
    token: string | null | undefined,
    platform: DevicePlatform
  ): Promise<{ success: true }> {
    if (token === null || token === undefined || token.trim().length === 0) {
      throw new ValidationError('Push token is blank', { field: 'token' });
    }

    const existing = await this.repository.findByToken(token);
    await this.repository.save({ userId, token, platform, lastSeenAt: this.clock.now() });

    if (existing) {
      logger.info('Device token refreshed', {
        userId,
        previousUserId: existing.userId === userId ? undefined : existing.userId,
        device: maskToken(token),
        platform,
      });
    } else {
      logger.info('Device token registered', { userId, device: maskToken(token), platform });
    }

    return { success: true };
  }
}
