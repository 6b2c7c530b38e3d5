import { getLogger } from '../logging';
import type { BaseScheduler } from './BaseScheduler';
import type { SchedulerHealthReport } from './types';
import { registerPhasedShutdownHook } from '../lifecycle/gracefulShutdown';

const logger = getLogger('scheduler-registry');

/**
 * Holds the cron jobs of one process. The first registration adds a
 * `schedulers` shutdown hook that stops them all.
 */
export class SchedulerRegistryClass {
  private readonly schedulers = new Map<string, BaseScheduler>();
  private stopOnShutdown = false;

  register(scheduler: BaseScheduler): void {
    const key = `${scheduler.serviceName}:${scheduler.name}`;
    if (this.schedulers.has(key)) {
      logger.warn(`Scheduler already registered: ${key}, skipping duplicate`);
      return;
    }

    if (!this.stopOnShutdown) {
      registerPhasedShutdownHook('schedulers', async () => this.stopAll(), 'SchedulerRegistry');
      this.stopOnShutdown = true;
    }

    this.schedulers.set(key, scheduler);
    logger.debug(`Scheduler registered: ${key}`, { cronExpression: scheduler.cronExpression });
  }

  startAll(): void {
    for (const scheduler of this.schedulers.values()) {
      scheduler.start();
    }
    logger.debug('Schedulers started', { schedulers: [...this.schedulers.keys()] });
  }

  stopAll(): void {
    logger.info('Stopping schedulers', { count: this.schedulers.size });
    for (const scheduler of this.schedulers.values()) {
      scheduler.stop();
    }
  }

  getHealthReport(): SchedulerHealthReport {
    const all = [...this.schedulers.values()];
    const schedulers = all.map(scheduler => scheduler.getInfo());
    const totalRuns = schedulers.reduce((sum, info) => sum + info.runCount, 0);
    const totalErrors = schedulers.reduce((sum, info) => sum + info.errorCount, 0);

    return {
      healthy: all.every(scheduler => scheduler.isHealthy()),
      schedulers,
      totalSchedulers: schedulers.length,
      runningCount: schedulers.filter(info => info.status === 'running').length,
      errorRate: totalRuns > 0 ? totalErrors / totalRuns : 0,
    };
  }
}

export const SchedulerRegistry = new SchedulerRegistryClass();
