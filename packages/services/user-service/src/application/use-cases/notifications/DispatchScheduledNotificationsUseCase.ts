/**
 * DispatchScheduledNotificationsUseCase
 *
 * Once per minute, for every notification kind, sends the kind's push to each
 * user whose trigger time equals the current minute in the notification zone
 * and who has no dispatch-log entry for today, then records the entry.
 *
 * A user's unit of work is isolated: a transport failure or a log-write
 * failure for one user is logged and the run moves on. A failure that escapes
 * one kind is logged and the other kind still runs.
 *
 * Known window: the "already sent" set is read before sending, and the log
 * row is written after. Two instances running the same minute can both send
 * to a user; the unique constraint on the log keeps one row, not one push.
 */

import pLimit from 'p-limit';
import { serializeError } from '@lastcup/platform-core';
import { getLogger } from '../../../config/logging';
import { toZonedMinute, type Clock } from '../../../domains/notifications/clock';
import { groupTokensByUser } from '../../../domains/notifications/token-grouping';
import type { INotificationSettingRepository } from '../../../domains/notifications/repositories/INotificationSettingRepository';
import type { IDeviceTokenRepository } from '../../../domains/notifications/repositories/IDeviceTokenRepository';
import type { IDispatchLogRepository } from '../../../domains/notifications/repositories/IDispatchLogRepository';
import type { IPushTransport } from '../../../domains/notifications/ports/IPushTransport';
import {
  NOTIFICATION_KIND_LIST,
  NOTIFICATION_TEMPLATES,
  type DispatchLogWriteResult,
  type DispatchRunReport,
  type KindDispatchReport,
  type LocalDate,
  type NotificationKind,
  type TimeOfDay,
  type UserDispatchOutcome,
  type UserId,
} from '../../../domains/notifications/types';

const logger = getLogger('dispatch-scheduled-notifications');

export interface DispatchScheduledNotificationsDeps {
  settingRepository: INotificationSettingRepository;
  deviceTokenRepository: IDeviceTokenRepository;
  dispatchLogRepository: IDispatchLogRepository;
  pushTransport: IPushTransport;
  clock: Clock;
  timeZone: string;
  /** Users processed in parallel within one kind */
  concurrency?: number;
}

function emptyReport(kind: NotificationKind): KindDispatchReport {
  return {
    kind,
    status: 'completed',
    candidates: 0,
    alreadySent: 0,
    eligible: 0,
    skippedNoTokens: 0,
    sent: 0,
    duplicates: 0,
    transportFailures: 0,
    logFailures: 0,
  };
}

export class DispatchScheduledNotificationsUseCase {
  private readonly concurrency: number;

  constructor(private readonly deps: DispatchScheduledNotificationsDeps) {
    this.concurrency = Math.max(1, deps.concurrency ?? 10);
  }

  /** Scheduler entry point; never rejects */
  async runScheduledDispatch(): Promise<void> {
    try {
      await this.dispatchAll();
    } catch (error) {
      logger.error('Scheduled dispatch failed', { error: serializeError(error) });
    }
  }

  async dispatchAll(): Promise<DispatchRunReport> {
    const { date, time } = toZonedMinute(this.deps.clock.now(), this.deps.timeZone);
    const kinds: KindDispatchReport[] = [];

    for (const kind of NOTIFICATION_KIND_LIST) {
      kinds.push(await this.dispatchKindGuarded(kind, date, time));
    }

    return { date, time, kinds };
  }

  private async dispatchKindGuarded(kind: NotificationKind, date: LocalDate, time: TimeOfDay): Promise<KindDispatchReport> {
    try {
      return await this.dispatchKind(kind, date, time);
    } catch (error) {
      logger.error('Notification dispatch failed for kind', { kind, date, time, error: serializeError(error) });
      return {
        ...emptyReport(kind),
        status: 'failed',
        errorMessage: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async dispatchKind(kind: NotificationKind, date: LocalDate, time: TimeOfDay): Promise<KindDispatchReport> {
    const report = emptyReport(kind);

    const settings = await this.deps.settingRepository.findEnabledByKindTime(kind, time);
    if (settings.length === 0) {
      return { ...report, status: 'no_candidates' };
    }

    const candidates = [...new Set(settings.map(s => s.userId))];
    const alreadySent = await this.deps.dispatchLogRepository.findSentUserIds(kind, date, candidates);
    const eligible = candidates.filter(userId => !alreadySent.has(userId));

    report.candidates = candidates.length;
    report.alreadySent = candidates.length - eligible.length;
    report.eligible = eligible.length;

    if (eligible.length === 0) {
      logger.debug('All candidates already notified today', { kind, date, candidates: candidates.length });
      return { ...report, status: 'nothing_eligible' };
    }

    const tokensByUser = groupTokensByUser(await this.deps.deviceTokenRepository.findEnabledTokensByUserIds(eligible));
    report.skippedNoTokens = eligible.length - tokensByUser.size;

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(
      Array.from(tokensByUser, ([userId, tokens]) => limit(() => this.deliverToUser(kind, userId, tokens, date)))
    );

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'sent':
          report.sent++;
          break;
        case 'duplicate':
          report.duplicates++;
          break;
        case 'transport_failed':
          report.transportFailures++;
          break;
        case 'log_failed':
          report.logFailures++;
          break;
      }
    }

    logger.info('Notification dispatch completed', { date, time, ...report });
    return report;
  }

  private async deliverToUser(
    kind: NotificationKind,
    userId: UserId,
    tokens: string[],
    date: LocalDate
  ): Promise<UserDispatchOutcome> {
    const { title, body } = NOTIFICATION_TEMPLATES[kind];
    const tokenCount = tokens.length;

    try {
      await this.deps.pushTransport.sendToTokens(tokens, title, body);
    } catch (error) {
      logger.error('Push send failed', { kind, userId, date, tokenCount, error: serializeError(error) });
      return { userId, status: 'transport_failed', tokenCount };
    }

    let result: DispatchLogWriteResult;
    try {
      result = await this.deps.dispatchLogRepository.save(kind, userId, date);
    } catch (error) {
      result = { status: 'failed', error };
    }

    switch (result.status) {
      case 'inserted':
        return { userId, status: 'sent', tokenCount };
      case 'already_exists':
        logger.info('Dispatch log already recorded', { kind, userId, date });
        return { userId, status: 'duplicate', tokenCount };
      case 'failed':
        logger.error('Dispatch log write failed after send', {
          kind,
          userId,
          date,
          error: serializeError(result.error),
        });
        return { userId, status: 'log_failed', tokenCount };
    }
  }
}
