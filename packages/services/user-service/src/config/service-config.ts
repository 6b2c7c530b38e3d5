/**
 * User service configuration, parsed once from the environment
 */

import { z } from 'zod';
import { parseEnvironment } from '@lastcup/platform-core';
import { isValidTimeZone } from '../domains/notifications/clock';
import { SERVICE_NAME } from './logging';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform(value => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3003),
  USER_DATABASE_URL: z.string().url().optional(),
  DATABASE_URL: z.string().url().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),
  NOTIFICATION_TIMEZONE: z.string().default('Asia/Seoul').refine(isValidTimeZone, 'must be an IANA time zone'),
  NOTIFICATION_SCHEDULER_ENABLED: booleanFlag,
  NOTIFICATION_SCHEDULER_CRON: z.string().min(1).default('* * * * *'),
  NOTIFICATION_DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(100).default(10),
  EXPO_PUSH_URL: z.string().url().default('https://exp.host/--/api/v2/push/send'),
  EXPO_ACCESS_TOKEN: z.string().min(1).optional(),
});

export interface ServiceConfig {
  env: 'development' | 'test' | 'staging' | 'production';
  port: number;
  database: {
    url?: string;
    poolMax: number;
  };
  notifications: {
    timeZone: string;
    schedulerEnabled: boolean;
    cronExpression: string;
    concurrency: number;
  };
  expo: {
    endpoint: string;
    accessToken?: string;
  };
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = parseEnvironment(envSchema, env, SERVICE_NAME);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    database: {
      url: parsed.USER_DATABASE_URL ?? parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },
    notifications: {
      timeZone: parsed.NOTIFICATION_TIMEZONE,
      schedulerEnabled: parsed.NOTIFICATION_SCHEDULER_ENABLED,
      cronExpression: parsed.NOTIFICATION_SCHEDULER_CRON,
      concurrency: parsed.NOTIFICATION_DISPATCH_CONCURRENCY,
    },
    expo: {
      endpoint: parsed.EXPO_PUSH_URL,
      accessToken: parsed.EXPO_ACCESS_TOKEN,
    },
  };
}
