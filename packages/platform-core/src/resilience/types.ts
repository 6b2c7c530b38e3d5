export type CircuitState = 'open' | 'closed' | 'half-open';

export interface CircuitBreakerConfig {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  volumeThreshold?: number;
  rollingCountTimeout?: number;
  rollingCountBuckets?: number;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  rejects: number;
  fires: number;
  timeouts: number;
  latencyMean: number;
}

export interface ResilienceEvent {
  type: 'open' | 'close' | 'halfOpen' | 'timeout' | 'failure' | 'success' | 'reject';
  name: string;
  timestamp: number;
  error?: Error;
}

export type ResilienceEventHandler = (event: ResilienceEvent) => void;
