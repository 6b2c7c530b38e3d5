/**
 * Logging Module - Index
 */

export * from './types';
export * from './logger';
export * from './formatting';
export * from './correlation';
export * from './error-serializer';
