import type { DevicePlatform, DeviceTokenRow, UserDevice, UserId } from '../types';

export interface UpsertDeviceInput {
  userId: UserId;
  token: string;
  platform: DevicePlatform;
  lastSeenAt: Date;
}

export interface IDeviceTokenRepository {
  findEnabledTokensByUserIds(userIds: readonly UserId[]): Promise<DeviceTokenRow[]>;
  findByToken(token: string): Promise<UserDevice | null>;
  /** Upsert on token: an existing row is re-pointed at the user and re-enabled */
  save(input: UpsertDeviceInput): Promise<UserDevice>;
}
