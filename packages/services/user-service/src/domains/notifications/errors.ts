import { ExternalServiceError, ValidationError } from '@lastcup/platform-core';

export class PushTransportError extends ExternalServiceError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super('push-transport', message, details, cause);
    this.name = 'PushTransportError';
  }
}

export class NotificationSettingValidationError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { domain: 'notification-setting', ...details });
    this.name = 'NotificationSettingValidationError';
  }
}
