/**
 * Notification Setting Service
 * Per-user notification preferences; a missing row reads as the defaults
 * (enabled, 14:00, 21:00) and is created on first access.
 */

import { getLogger } from '../../config/logging';
import type { INotificationSettingRepository } from '../../domains/notifications/repositories/INotificationSettingRepository';
import { NotificationSettingValidationError } from '../../domains/notifications/errors';
import { isTimeOfDay, normalizeTimeOfDay } from '../../domains/notifications/clock';
import {
  DEFAULT_NOTIFICATION_SETTING,
  type NotificationSetting,
  type TimeOfDay,
  type UserId,
} from '../../domains/notifications/types';

const logger = getLogger('notification-setting-service');

export interface NotificationSettingPatch {
  isEnabled?: boolean;
  recordRemindAt?: TimeOfDay;
  dailyCloseAt?: TimeOfDay;
}

export interface NotificationSettingUpdateResult {
  updated: true;
  setting: NotificationSetting;
}

export class NotificationSettingService {
  constructor(private readonly repository: INotificationSettingRepository) {}

  async findOrCreate(userId: UserId): Promise<NotificationSetting> {
    const existing = await this.repository.findByUserId(userId);
    if (existing) return existing;

    const created = await this.repository.save({ userId, ...DEFAULT_NOTIFICATION_SETTING });
    logger.info('Default notification settings created', { userId });
    return created;
  }

  async update(userId: UserId, patch: NotificationSettingPatch): Promise<NotificationSettingUpdateResult> {
    const current = await this.findOrCreate(userId);

    const next: NotificationSetting = {
      ...current,
      ...(patch.isEnabled !== undefined && { isEnabled: patch.isEnabled }),
      ...(patch.recordRemindAt !== undefined && { recordRemindAt: this.parseTime('recordRemindAt', patch.recordRemindAt) }),
      ...(patch.dailyCloseAt !== undefined && { dailyCloseAt: this.parseTime('dailyCloseAt', patch.dailyCloseAt) }),
    };

    const setting = await this.repository.save(next);
    logger.info('Notification settings updated', { userId, fields: Object.keys(patch) });
    return { updated: true, setting };
  }

  /** Idempotent; writes only when the user has no row */
  async ensureDefaultExists(userId: UserId): Promise<void> {
    if (await this.repository.existsByUserId(userId)) return;
    await this.repository.save({ userId, ...DEFAULT_NOTIFICATION_SETTING });
    logger.debug('Default notification settings ensured', { userId });
  }

  private parseTime(field: string, value: string): TimeOfDay {
    if (!isTimeOfDay(value)) {
      throw new NotificationSettingValidationError(`${field} must be a time of day in HH:MM`, { field, value });
    }
    return normalizeTimeOfDay(value);
  }
}
