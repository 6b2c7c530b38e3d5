/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types';

// Key-based matching; push tokens fall under /token/
const SECRET_PATTERNS = [
  /authorization/i,
  /set-cookie/i,
  /api[-_]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /bearer/i,
];

// Counters such as `tokenCount` describe tokens without containing one
const SAFE_KEY_SUFFIXES = ['count', 'counts'];

function isSecretKey(key: string): boolean {
  const lower = key.toLowerCase();
  if (SAFE_KEY_SUFFIXES.some(suffix => lower.endsWith(suffix))) return false;
  return SECRET_PATTERNS.some(pattern => pattern.test(key));
}

/**
 * Shorten a push token to an identifiable prefix
 * ExponentPushToken[abcdefghijklmnop] -> ExponentPushToken[abcd...
 */
export function maskToken(token: string, visible = 22): string {
  if (token.length <= visible) return token.substring(0, Math.ceil(token.length / 2)) + '...';
  return token.substring(0, visible) + '...';
}

/**
 * Redacts values whose key looks like a credential or token
 */
export function maskSecrets(obj: unknown, maxDepth = 4): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSecretKey(key)) {
      masked[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 12)}]` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const { env: _env, version: _version, instanceId: _instanceId, ...rest } = meta;
      const metaStr = Object.keys(rest).length > 0 ? ` ${safeStringify(rest, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.userId = info.userId || context.userId;
      }
      return safeStringify(info, 50000);
    })
  );
}
