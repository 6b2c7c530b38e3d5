import type { DispatchLogWriteResult, LocalDate, NotificationKind, UserId } from '../types';

export interface IDispatchLogRepository {
  /** Subset of `userIds` already logged for (`kind`, `date`) */
  findSentUserIds(kind: NotificationKind, date: LocalDate, userIds: readonly UserId[]): Promise<Set<UserId>>;
  /** Never rejects; a row already present for the triple is reported as `already_exists` */
  save(kind: NotificationKind, userId: UserId, date: LocalDate): Promise<DispatchLogWriteResult>;
}
