import { and, eq, inArray } from 'drizzle-orm';
import type { DatabaseConnection } from '../../database/DatabaseConnectionFactory';
import { usrDeviceTokens, type DeviceTokenRecord } from '../../database/schemas/notification-schema';
import type {
  IDeviceTokenRepository,
  UpsertDeviceInput,
} from '../../../domains/notifications/repositories/IDeviceTokenRepository';
import type { DeviceTokenRow, UserDevice, UserId } from '../../../domains/notifications/types';
import { getLogger } from '../../../config/logging';
import { maskToken } from '@lastcup/platform-core';

const logger = getLogger('device-token-repository');

function toDomain(record: DeviceTokenRecord): UserDevice {
  return {
    userId: record.userId,
    token: record.token,
    platform: record.platform,
    isEnabled: record.isEnabled,
    lastSeenAt: record.lastSeenAt,
  };
}

export class DeviceTokenRepository implements IDeviceTokenRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findEnabledTokensByUserIds(userIds: readonly UserId[]): Promise<DeviceTokenRow[]> {
    if (userIds.length === 0) return [];

    return this.db
      .select({ userId: usrDeviceTokens.userId, token: usrDeviceTokens.token })
      .from(usrDeviceTokens)
      .where(and(inArray(usrDeviceTokens.userId, [...userIds]), eq(usrDeviceTokens.isEnabled, true)));
  }

  async findByToken(token: string): Promise<UserDevice | null> {
    const [record] = await this.db.select().from(usrDeviceTokens).where(eq(usrDeviceTokens.token, token)).limit(1);

    return record ? toDomain(record) : null;
  }

  async save(input: UpsertDeviceInput): Promise<UserDevice> {
    // Single statement so concurrent registrations of one token cannot race
    const [record] = await this.db
      .insert(usrDeviceTokens)
      .values({
        userId: input.userId,
        token: input.token,
        platform: input.platform,
        isEnabled: true,
        lastSeenAt: input.lastSeenAt,
      })
      .onConflictDoUpdate({
        target: usrDeviceTokens.token,
        set: {
          userId: input.userId,
          platform: input.platform,
          isEnabled: true,
          lastSeenAt: input.lastSeenAt,
          updatedAt: new Date(),
        },
      })
      .returning();

    logger.debug('Device token upserted', { userId: input.userId, device: maskToken(input.token) });
    return toDomain(record);
  }
}
