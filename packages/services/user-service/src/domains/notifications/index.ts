export * from './types';
export * from './clock';
export * from './errors';
export * from './token-grouping';
export type { INotificationSettingRepository } from './repositories/INotificationSettingRepository';
export type { IDeviceTokenRepository, UpsertDeviceInput } from './repositories/IDeviceTokenRepository';
export type { IDispatchLogRepository } from './repositories/IDispatchLogRepository';
export type { IPushTransport } from './ports/IPushTransport';
