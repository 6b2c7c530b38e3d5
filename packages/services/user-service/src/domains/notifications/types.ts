/**
 * Notification domain types
 */

export type UserId = string;

/** Wall-clock time of day at minute precision, `HH:MM` */
export type TimeOfDay = string;

/** Calendar day in the notification time zone, `YYYY-MM-DD` */
export type LocalDate = string;

export const NOTIFICATION_KINDS = {
  RECORD_REMIND: 'RECORD_REMIND',
  DAILY_CLOSE: 'DAILY_CLOSE',
} as const;

export type NotificationKind = (typeof NOTIFICATION_KINDS)[keyof typeof NOTIFICATION_KINDS];

export const NOTIFICATION_KIND_LIST: readonly NotificationKind[] = [
  NOTIFICATION_KINDS.RECORD_REMIND,
  NOTIFICATION_KINDS.DAILY_CLOSE,
];

export type NotificationTriggerField = 'recordRemindAt' | 'dailyCloseAt';

export interface NotificationTemplate {
  title: string;
  body: string;
  triggerField: NotificationTriggerField;
}

export const NOTIFICATION_TEMPLATES: Record<NotificationKind, NotificationTemplate> = {
  RECORD_REMIND: {
    title: '기록 알림',
    body: '오늘의 기록을 남겨보세요.',
    triggerField: 'recordRemindAt',
  },
  DAILY_CLOSE: {
    title: '마감 알림',
    body: '오늘의 섭취를 마감해 주세요.',
    triggerField: 'dailyCloseAt',
  },
};

export const DEVICE_PLATFORMS = ['ANDROID', 'IOS', 'WEB'] as const;

export type DevicePlatform = (typeof DEVICE_PLATFORMS)[number];

export interface NotificationSetting {
  userId: UserId;
  isEnabled: boolean;
  recordRemindAt: TimeOfDay;
  dailyCloseAt: TimeOfDay;
}

export const DEFAULT_NOTIFICATION_SETTING: Omit<NotificationSetting, 'userId'> = {
  isEnabled: true,
  recordRemindAt: '14:00',
  dailyCloseAt: '21:00',
};

export interface UserDevice {
  userId: UserId;
  token: string;
  platform: DevicePlatform;
  isEnabled: boolean;
  lastSeenAt: Date | null;
}

/** One enabled token row as read for dispatch; the token column may hold junk */
export interface DeviceTokenRow {
  userId: UserId;
  token: string | null;
}

export type DispatchLogWriteResult =
  | { status: 'inserted' }
  | { status: 'already_exists' }
  | { status: 'failed'; error: unknown };

export type UserDispatchStatus = 'sent' | 'duplicate' | 'transport_failed' | 'log_failed';

export interface UserDispatchOutcome {
  userId: UserId;
  status: UserDispatchStatus;
  tokenCount: number;
}

export type KindDispatchStatus = 'completed' | 'no_candidates' | 'nothing_eligible' | 'failed';

export interface KindDispatchReport {
  kind: NotificationKind;
  status: KindDispatchStatus;
  candidates: number;
  alreadySent: number;
  eligible: number;
  skippedNoTokens: number;
  sent: number;
  duplicates: number;
  transportFailures: number;
  logFailures: number;
  errorMessage?: string;
}

export interface DispatchRunReport {
  date: LocalDate;
  time: TimeOfDay;
  kinds: KindDispatchReport[];
}
