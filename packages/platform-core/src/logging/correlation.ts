/**
 * Correlation Context
 *
 * Async correlation ID propagation for requests and scheduled runs
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Run function with correlation context
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(prefix?: string): string {
  const id = randomUUID().replace(/-/g, '').substring(0, 16);
  return prefix ? `${prefix}-${id}` : id;
}
