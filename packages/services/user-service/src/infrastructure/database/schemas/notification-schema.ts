import { pgTable, varchar, timestamp, uuid, boolean, time, date, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { DevicePlatform, NotificationKind } from '../../../domains/notifications/types';

export const usrNotificationSettings = pgTable(
  'usr_notification_settings',
  {
    userId: uuid('user_id').primaryKey(),
    isEnabled: boolean('is_enabled').default(true).notNull(),
    recordRemindAt: time('record_remind_at').default('14:00:00').notNull(),
    dailyCloseAt: time('daily_close_at').default('21:00:00').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => ({
    recordRemindIdx: index('usr_notification_settings_record_remind_idx').on(table.isEnabled, table.recordRemindAt),
    dailyCloseIdx: index('usr_notification_settings_daily_close_idx').on(table.isEnabled, table.dailyCloseAt),
  })
);

export type NotificationSettingRow = typeof usrNotificationSettings.$inferSelect;

export const usrDeviceTokens = pgTable(
  'usr_device_tokens',
  {
    id: uuid('id')
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    userId: uuid('user_id').notNull(),
    token: varchar('token', { length: 255 }).notNull(),
    platform: varchar('platform', { length: 20 }).$type<DevicePlatform>().notNull(),
    isEnabled: boolean('is_enabled').default(true).notNull(),
    lastSeenAt: timestamp('last_seen_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => ({
    userIdIdx: index('usr_device_tokens_user_id_idx').on(table.userId),
    tokenIdx: uniqueIndex('usr_device_tokens_token_idx').on(table.token),
  })
);

export type DeviceTokenRecord = typeof usrDeviceTokens.$inferSelect;

export const usrNotificationDispatchLogs = pgTable(
  'usr_notification_dispatch_logs',
  {
    id: uuid('id')
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    notificationType: varchar('notification_type', { length: 30 }).$type<NotificationKind>().notNull(),
    userId: uuid('user_id').notNull(),
    sentDate: date('sent_date', { mode: 'string' }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    dispatchKeyIdx: uniqueIndex('usr_notification_dispatch_logs_type_user_date_idx').on(
      table.notificationType,
      table.userId,
      table.sentDate
    ),
  })
);
