import { getLogger as getPlatformLogger, type Logger } from '@lastcup/platform-core';

export const SERVICE_NAME = 'user-service';

export function getLogger(module: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${module}`);
}
