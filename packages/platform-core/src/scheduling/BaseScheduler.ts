/**
 * BaseScheduler - Abstract base class for cron-driven jobs
 * Provides shared start/stop/status/health logic
 */

import * as cron from 'node-cron';
import { getLogger, type Logger } from '../logging';
import { generateCorrelationId, runWithContext } from '../logging/correlation';
import { serializeError } from '../logging/error-serializer';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types';

type ResolvedSchedulerConfig = SchedulerConfig &
  Required<Pick<SchedulerConfig, 'enabled' | 'runOnStart' | 'maxRetries' | 'retryDelayMs' | 'timeoutMs' | 'initialDelayMs' | 'preventOverlap'>>;

export abstract class BaseScheduler {
  protected task: cron.ScheduledTask | null = null;
  protected logger: Logger;
  protected status: SchedulerStatus = 'stopped';

  protected lastRunAt: Date | null = null;
  protected lastRunDurationMs: number | null = null;
  protected lastRunSuccess: boolean | null = null;
  protected runCount = 0;
  protected errorCount = 0;
  protected skippedOverlapCount = 0;

  protected config: ResolvedSchedulerConfig;
  private startedAt = 0;
  private executing = false;
  // An execute() that lost the timeout race keeps running until it settles
  private abandonedRun: Promise<SchedulerExecutionResult> | null = null;

  constructor(config: SchedulerConfig) {
    this.config = {
      enabled: true,
      runOnStart: false,
      maxRetries: 0,
      retryDelayMs: 1000,
      timeoutMs: 300000,
      initialDelayMs: 0,
      preventOverlap: true,
      ...config,
    };
    this.logger = getLogger('scheduler');
  }

  protected initLogger(): void {
    this.logger = getLogger(`scheduler-${this.name}`);
  }

  abstract get name(): string;

  abstract get serviceName(): string;

  protected abstract execute(): Promise<SchedulerExecutionResult>;

  get cronExpression(): string {
    return this.config.cronExpression;
  }

  start(): void {
    if (this.task || this.status === 'running') {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!this.config.enabled) {
      this.logger.info(`[${this.name}] Disabled, not starting`);
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.config.cronExpression}`);
      return;
    }

    this.startedAt = Date.now();

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        const elapsedMs = Date.now() - this.startedAt;
        if (this.config.initialDelayMs && elapsedMs < this.config.initialDelayMs) {
          this.logger.debug(`[${this.name}] Skipping execution during initial delay period`, {
            elapsedMs,
            initialDelayMs: this.config.initialDelayMs,
          });
          return;
        }
        void this.runWithErrorHandling();
      },
      this.config.timezone ? { timezone: this.config.timezone } : undefined
    );

    void this.task.start();
    this.status = 'running';

    this.logger.debug(`[${this.name}] Scheduler started`, {
      cronExpression: this.config.cronExpression,
      timezone: this.config.timezone,
    });

    if (this.config.runOnStart) {
      this.triggerNow().catch((err: unknown) => {
        this.logger.error(`[${this.name}] Initial run failed`, { error: serializeError(err) });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    void this.task.stop();
    this.task = null;
    this.status = 'stopped';
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  async triggerNow(): Promise<SchedulerExecutionResult> {
    this.logger.info(`[${this.name}] Manual trigger requested`);
    return this.runWithErrorHandling();
  }

  private static readonly SLOW_THRESHOLD_MS = 5000;
  private static readonly SUMMARY_INTERVAL_RUNS = 60;
  private totalDurationMs = 0;
  private maxDurationMs = 0;

  private handleSuccessfulExecution(result: SchedulerExecutionResult, startTime: number): SchedulerExecutionResult {
    const durationMs = Date.now() - startTime;
    this.lastRunDurationMs = durationMs;
    this.lastRunSuccess = true;
    this.totalDurationMs += durationMs;
    this.maxDurationMs = Math.max(this.maxDurationMs, durationMs);

    if (durationMs > BaseScheduler.SLOW_THRESHOLD_MS) {
      this.logger.warn(`[${this.name}] Slow execution`, {
        durationMs,
        runCount: this.runCount,
        threshold: BaseScheduler.SLOW_THRESHOLD_MS,
      });
    } else if (this.runCount % BaseScheduler.SUMMARY_INTERVAL_RUNS === 0) {
      this.logger.info(`[${this.name}] ok`, {
        runs: this.runCount,
        errors: this.errorCount,
        avgMs: Math.round(this.totalDurationMs / this.runCount),
        maxMs: this.maxDurationMs,
      });
    } else {
      this.logger.debug(`[${this.name}] Execution completed`, {
        durationMs,
        runCount: this.runCount,
        noOp: result.noOp ?? false,
      });
    }
    return { ...result, durationMs };
  }

  private handleExecutionError(error: unknown, attempt: number, maxAttempts: number, startTime: number): void {
    this.lastRunDurationMs = Date.now() - startTime;
    this.lastRunSuccess = false;
    this.errorCount++;

    this.logger.error(`[${this.name}] Execution error`, {
      error: serializeError(error),
      attempt,
      maxAttempts,
      durationMs: this.lastRunDurationMs,
    });
  }

  private async runWithErrorHandling(): Promise<SchedulerExecutionResult> {
    if (this.config.preventOverlap && this.isExecuting()) {
      this.skippedOverlapCount++;
      this.logger.warn(`[${this.name}] Previous run still executing, skipping tick`, {
        skippedOverlapCount: this.skippedOverlapCount,
      });
      return { success: true, message: 'Skipped: previous run still executing', durationMs: 0, noOp: true };
    }

    this.executing = true;
    try {
      return await runWithContext({ correlationId: generateCorrelationId(this.name), module: this.name }, () =>
        this.runAttempts()
      );
    } finally {
      this.executing = false;
    }
  }

  private async runAttempts(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    const maxAttempts = this.config.maxRetries + 1;
    let lastMessage = 'Max retries exceeded';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await this.executeWithTimeout();
        if (result.success) {
          return this.handleSuccessfulExecution(result, startTime);
        }
        this.lastRunDurationMs = Date.now() - startTime;
        this.lastRunSuccess = false;
        lastMessage = result.message ?? lastMessage;
        this.logger.warn(`[${this.name}] Execution failed`, { message: result.message, attempt, maxAttempts });
      } catch (error) {
        this.handleExecutionError(error, attempt, maxAttempts, startTime);
        lastMessage = error instanceof Error ? error.message : String(error);
      }

      if (attempt < maxAttempts) {
        if (this.abandonedRun) {
          this.logger.warn(`[${this.name}] Timed-out run still executing, not retrying`, { attempt, maxAttempts });
          break;
        }
        await this.sleep(this.config.retryDelayMs);
      }
    }

    return {
      success: false,
      message: lastMessage,
      durationMs: Date.now() - startTime,
    };
  }

  private async executeWithTimeout(): Promise<SchedulerExecutionResult> {
    const timeoutMs = this.config.timeoutMs;
    const run = this.execute();
    let timer: NodeJS.Timeout | undefined;

    try {
      return await Promise.race([
        run,
        new Promise<SchedulerExecutionResult>((_, reject) => {
          timer = setTimeout(() => {
            this.trackAbandonedRun(run);
            reject(new Error(`Execution timed out after ${timeoutMs}ms`));
          }, timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private trackAbandonedRun(run: Promise<SchedulerExecutionResult>): void {
    this.abandonedRun = run;
    const settle = (): void => {
      if (this.abandonedRun === run) {
        this.abandonedRun = null;
        this.logger.info(`[${this.name}] Timed-out run finished`);
      }
    };
    void run.then(settle, (error: unknown) => {
      this.logger.error(`[${this.name}] Timed-out run failed`, { error: serializeError(error) });
      settle();
    });
  }

  private isExecuting(): boolean {
    return this.executing || this.abandonedRun !== null;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getInfo(): SchedulerInfo {
    return {
      name: this.name,
      cronExpression: this.config.cronExpression,
      timezone: this.config.timezone,
      status: this.status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      skippedOverlapCount: this.skippedOverlapCount,
      serviceName: this.serviceName,
    };
  }

  isHealthy(): boolean {
    if (this.status !== 'running') return true;
    if (this.runCount === 0) return true;
    return this.errorCount / this.runCount < 0.5;
  }
}
