import { and, eq, inArray } from 'drizzle-orm';
import type { DatabaseConnection } from '../../database/DatabaseConnectionFactory';
import { usrNotificationDispatchLogs } from '../../database/schemas/notification-schema';
import type { IDispatchLogRepository } from '../../../domains/notifications/repositories/IDispatchLogRepository';
import type {
  DispatchLogWriteResult,
  LocalDate,
  NotificationKind,
  UserId,
} from '../../../domains/notifications/types';

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (Reflect.get(error, 'code') === UNIQUE_VIOLATION) return true;
  return error.cause !== undefined && isUniqueViolation(error.cause);
}

export class DispatchLogRepository implements IDispatchLogRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findSentUserIds(kind: NotificationKind, date: LocalDate, userIds: readonly UserId[]): Promise<Set<UserId>> {
    if (userIds.length === 0) return new Set();

    const rows = await this.db
      .select({ userId: usrNotificationDispatchLogs.userId })
      .from(usrNotificationDispatchLogs)
      .where(
        and(
          eq(usrNotificationDispatchLogs.notificationType, kind),
          eq(usrNotificationDispatchLogs.sentDate, date),
          inArray(usrNotificationDispatchLogs.userId, [...userIds])
        )
      );

    return new Set(rows.map(row => row.userId));
  }

  async save(kind: NotificationKind, userId: UserId, date: LocalDate): Promise<DispatchLogWriteResult> {
    try {
      const inserted = await this.db
        .insert(usrNotificationDispatchLogs)
        .values({ notificationType: kind, userId, sentDate: date })
        .onConflictDoNothing({
          target: [
            usrNotificationDispatchLogs.notificationType,
            usrNotificationDispatchLogs.userId,
            usrNotificationDispatchLogs.sentDate,
          ],
        })
        .returning({ id: usrNotificationDispatchLogs.id });

      return inserted.length > 0 ? { status: 'inserted' } : { status: 'already_exists' };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'already_exists' };
      }
      return { status: 'failed', error };
    }
  }
}
