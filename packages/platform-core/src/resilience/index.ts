export * from './types';
export * from './resilience-manager';
