import { BaseScheduler, type SchedulerExecutionResult } from '@lastcup/platform-core';
import type { DispatchScheduledNotificationsUseCase } from '../../application/use-cases/notifications/DispatchScheduledNotificationsUseCase';

export interface UserNotificationSchedulerOptions {
  cronExpression?: string;
  timezone: string;
  enabled?: boolean;
}

export class UserNotificationScheduler extends BaseScheduler {
  get name(): string {
    return 'user-notification';
  }

  get serviceName(): string {
    return 'user-service';
  }

  constructor(
    private readonly dispatcher: DispatchScheduledNotificationsUseCase,
    options: UserNotificationSchedulerOptions
  ) {
    super({
      cronExpression: options.cronExpression ?? '* * * * *',
      timezone: options.timezone,
      enabled: options.enabled ?? true,
      maxRetries: 0,
      timeoutMs: 55000,
      preventOverlap: true,
    });
    this.initLogger();
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const report = await this.dispatcher.dispatchAll();

    const totals = report.kinds.reduce(
      (acc, kind) => ({
        candidates: acc.candidates + kind.candidates,
        sent: acc.sent + kind.sent,
        duplicates: acc.duplicates + kind.duplicates,
        transportFailures: acc.transportFailures + kind.transportFailures,
        logFailures: acc.logFailures + kind.logFailures,
      }),
      { candidates: 0, sent: 0, duplicates: 0, transportFailures: 0, logFailures: 0 }
    );
    const failedKinds = report.kinds.filter(k => k.status === 'failed').map(k => k.kind);

    return {
      success: true,
      message:
        failedKinds.length > 0
          ? `Dispatch finished with failed kinds: ${failedKinds.join(', ')}`
          : `Dispatched ${totals.sent} notification(s) for ${report.date} ${report.time}`,
      data: { date: report.date, time: report.time, ...totals, failedKinds },
      durationMs: 0,
      noOp: report.kinds.every(k => k.status === 'no_candidates'),
    };
  }
}
