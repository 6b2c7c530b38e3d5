/**
 * Platform Core - shared backend plumbing
 *
 * - Structured logging with correlation tracking
 * - Domain error types and HTTP error envelopes
 * - Cron scheduling with a central registry
 * - Circuit breakers for outbound calls
 * - Environment parsing and graceful shutdown
 */

export * from './config';
export * from './error-handling';
export * from './http';
export * from './lifecycle';
export * from './logging';
export * from './resilience';
export * from './scheduling';
