/**
 * Scheduler Types
 */

export type SchedulerStatus = 'stopped' | 'running';

export interface SchedulerInfo {
  name: string;
  cronExpression: string;
  timezone?: string;
  status: SchedulerStatus;
  lastRunAt: Date | null;
  lastRunDurationMs: number | null;
  lastRunSuccess: boolean | null;
  runCount: number;
  errorCount: number;
  skippedOverlapCount: number;
  serviceName: string;
}

export interface SchedulerExecutionResult {
  success: boolean;
  message?: string;
  data?: Record<string, unknown>;
  durationMs: number;
  noOp?: boolean;
}

export interface SchedulerHealthReport {
  healthy: boolean;
  schedulers: SchedulerInfo[];
  totalSchedulers: number;
  runningCount: number;
  errorRate: number;
}

export interface SchedulerConfig {
  cronExpression: string;
  /** IANA zone the cron expression is evaluated in */
  timezone?: string;
  enabled?: boolean;
  runOnStart?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  initialDelayMs?: number;
  /** Skip a tick while the previous run in this process is still executing */
  preventOverlap?: boolean;
}
