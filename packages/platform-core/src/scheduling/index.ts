/**
 * Scheduling Module
 */

export { BaseScheduler } from './BaseScheduler';
export { SchedulerRegistry, SchedulerRegistryClass } from './SchedulerRegistry';
export type {
  SchedulerStatus,
  SchedulerInfo,
  SchedulerExecutionResult,
  SchedulerHealthReport,
  SchedulerConfig,
} from './types';
