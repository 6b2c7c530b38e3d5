import CircuitBreaker from 'opossum';
import { getLogger } from '../logging/logger';
import { parsePositiveInt } from '../config/env-utils';
import type {
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
  ResilienceEvent,
  ResilienceEventHandler,
} from './types';

const logger = getLogger('resilience');

export const DEFAULT_CIRCUIT_CONFIG: Required<CircuitBreakerConfig> = {
  timeout: parsePositiveInt('CIRCUIT_BREAKER_TIMEOUT_MS', 30000, 100),
  errorThresholdPercentage: parsePositiveInt('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50, 1),
  resetTimeout: parsePositiveInt('CIRCUIT_BREAKER_RESET_TIMEOUT_MS', 30000, 100),
  volumeThreshold: parsePositiveInt('CIRCUIT_BREAKER_VOLUME_THRESHOLD', 5, 1),
  rollingCountTimeout: parsePositiveInt('CIRCUIT_BREAKER_ROLLING_COUNT_TIMEOUT_MS', 10000, 100),
  rollingCountBuckets: parsePositiveInt('CIRCUIT_BREAKER_ROLLING_COUNT_BUCKETS', 10, 1),
};

type GuardedCall = () => Promise<unknown>;

/**
 * Named opossum circuit breakers. Calls are fired once; retrying is left to
 * the caller.
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker<[GuardedCall], unknown>>();
  private configs = new Map<string, CircuitBreakerConfig>();
  private eventHandlers: ResilienceEventHandler[] = [];

  constructor() {
    this.onEvent(event => {
      switch (event.type) {
        case 'open':
          logger.warn('Circuit breaker OPENED', { circuitBreaker: event.name, error: event.error?.message });
          break;
        case 'reject':
          logger.warn('Circuit breaker rejected request', { circuitBreaker: event.name });
          break;
        case 'timeout':
          logger.warn('Circuit breaker timeout', { circuitBreaker: event.name });
          break;
        case 'halfOpen':
          logger.info('Circuit breaker HALF-OPEN, testing recovery', { circuitBreaker: event.name });
          break;
        case 'close':
          logger.info('Circuit breaker CLOSED, recovered', { circuitBreaker: event.name });
          break;
        case 'failure':
          logger.debug('Circuit breaker call failed', { circuitBreaker: event.name, error: event.error?.message });
          break;
        case 'success':
          break;
      }
    });
  }

  configure(name: string, config: CircuitBreakerConfig): void {
    this.configs.set(name, config);
    const existing = this.breakers.get(name);
    if (existing) {
      existing.shutdown();
      this.breakers.delete(name);
    }
  }

  onEvent(handler: ResilienceEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const idx = this.eventHandlers.indexOf(handler);
      if (idx >= 0) this.eventHandlers.splice(idx, 1);
    };
  }

  private emit(event: ResilienceEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (handlerError) {
        logger.warn('Resilience event handler threw', {
          eventType: event.type,
          name: event.name,
          error: handlerError instanceof Error ? handlerError.message : String(handlerError),
        });
      }
    }
  }

  private getOrCreateBreaker(name: string): CircuitBreaker<[GuardedCall], unknown> {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const opts = { ...DEFAULT_CIRCUIT_CONFIG, ...this.configs.get(name) };
    const breaker = new CircuitBreaker(async (fn: GuardedCall) => fn(), { ...opts, name });

    breaker.on('open', () => this.emit({ type: 'open', name, timestamp: Date.now() }));
    breaker.on('close', () => this.emit({ type: 'close', name, timestamp: Date.now() }));
    breaker.on('halfOpen', () => this.emit({ type: 'halfOpen', name, timestamp: Date.now() }));
    breaker.on('timeout', () => this.emit({ type: 'timeout', name, timestamp: Date.now() }));
    breaker.on('reject', () => this.emit({ type: 'reject', name, timestamp: Date.now() }));
    breaker.on('success', () => this.emit({ type: 'success', name, timestamp: Date.now() }));
    breaker.on('failure', (error: unknown) =>
      this.emit({ type: 'failure', name, timestamp: Date.now(), error: error instanceof Error ? error : undefined })
    );

    this.breakers.set(name, breaker);
    return breaker;
  }

  async execute<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const breaker = this.getOrCreateBreaker(name);
    return breaker.fire(fn) as Promise<T>;
  }

  isConfigured(name: string): boolean {
    return this.configs.has(name);
  }

  getStats(name: string): CircuitBreakerStats | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;

    const stats = breaker.stats;
    const state: CircuitState = breaker.opened ? 'open' : breaker.halfOpen ? 'half-open' : 'closed';

    return {
      name,
      state,
      failures: stats.failures,
      successes: stats.successes,
      rejects: stats.rejects,
      fires: stats.fires,
      timeouts: stats.timeouts,
      latencyMean: stats.latencyMean,
    };
  }

  isOpen(name: string): boolean {
    return this.breakers.get(name)?.opened ?? false;
  }

  shutdownAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
    this.breakers.clear();
  }
}

export const circuitBreakers = new CircuitBreakerRegistry();
