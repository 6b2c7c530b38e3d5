export { NotificationSettingRepository } from './NotificationSettingRepository';
export { DeviceTokenRepository } from './DeviceTokenRepository';
export { DispatchLogRepository } from './DispatchLogRepository';
