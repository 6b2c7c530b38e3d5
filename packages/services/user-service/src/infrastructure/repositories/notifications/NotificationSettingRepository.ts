import { and, eq } from 'drizzle-orm';
import type { DatabaseConnection } from '../../database/DatabaseConnectionFactory';
import {
  usrNotificationSettings,
  type NotificationSettingRow,
} from '../../database/schemas/notification-schema';
import type { INotificationSettingRepository } from '../../../domains/notifications/repositories/INotificationSettingRepository';
import {
  NOTIFICATION_TEMPLATES,
  type NotificationKind,
  type NotificationSetting,
  type TimeOfDay,
  type UserId,
} from '../../../domains/notifications/types';
import { normalizeTimeOfDay } from '../../../domains/notifications/clock';

const TRIGGER_COLUMNS = {
  recordRemindAt: usrNotificationSettings.recordRemindAt,
  dailyCloseAt: usrNotificationSettings.dailyCloseAt,
} as const;

function toSqlTime(time: TimeOfDay): string {
  return `${normalizeTimeOfDay(time)}:00`;
}

const SQL_TIME_PREFIX = /^\d{2}:\d{2}/;

// Postgres renders `time` as HH:MM:SS[.ffffff]; only the minute is kept
function fromSqlTime(value: string): TimeOfDay {
  return SQL_TIME_PREFIX.test(value) ? value.substring(0, 5) : value;
}

function toDomain(row: NotificationSettingRow): NotificationSetting {
  return {
    userId: row.userId,
    isEnabled: row.isEnabled,
    recordRemindAt: fromSqlTime(row.recordRemindAt),
    dailyCloseAt: fromSqlTime(row.dailyCloseAt),
  };
}

export class NotificationSettingRepository implements INotificationSettingRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findEnabledByKindTime(kind: NotificationKind, time: TimeOfDay): Promise<NotificationSetting[]> {
    const triggerColumn = TRIGGER_COLUMNS[NOTIFICATION_TEMPLATES[kind].triggerField];

    const rows = await this.db
      .select()
      .from(usrNotificationSettings)
      .where(and(eq(usrNotificationSettings.isEnabled, true), eq(triggerColumn, toSqlTime(time))));

    return rows.map(toDomain);
  }

  async findByUserId(userId: UserId): Promise<NotificationSetting | null> {
    const [row] = await this.db
      .select()
      .from(usrNotificationSettings)
      .where(eq(usrNotificationSettings.userId, userId))
      .limit(1);

    return row ? toDomain(row) : null;
  }

  async existsByUserId(userId: UserId): Promise<boolean> {
    const rows = await this.db
      .select({ userId: usrNotificationSettings.userId })
      .from(usrNotificationSettings)
      .where(eq(usrNotificationSettings.userId, userId))
      .limit(1);

    return rows.length > 0;
  }

  async save(setting: NotificationSetting): Promise<NotificationSetting> {
    const values = {
      isEnabled: setting.isEnabled,
      recordRemindAt: toSqlTime(setting.recordRemindAt),
      dailyCloseAt: toSqlTime(setting.dailyCloseAt),
    };

    const [row] = await this.db
      .insert(usrNotificationSettings)
      .values({ userId: setting.userId, ...values })
      .onConflictDoUpdate({
        target: usrNotificationSettings.userId,
        set: { ...values, updatedAt: new Date() },
      })
      .returning();

    return toDomain(row);
  }
}
