import type { NotificationKind, NotificationSetting, TimeOfDay, UserId } from '../types';

export interface INotificationSettingRepository {
  /** Enabled settings whose trigger for `kind` equals `time` */
  findEnabledByKindTime(kind: NotificationKind, time: TimeOfDay): Promise<NotificationSetting[]>;
  findByUserId(userId: UserId): Promise<NotificationSetting | null>;
  existsByUserId(userId: UserId): Promise<boolean>;
  save(setting: NotificationSetting): Promise<NotificationSetting>;
}
