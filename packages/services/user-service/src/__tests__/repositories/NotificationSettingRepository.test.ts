import { describe, it, expect, beforeEach } from 'vitest';
import { createMockDb, createQueryChain, type MockDb } from '@lastcup/test-utils';
import { NotificationSettingRepository } from '../../infrastructure/repositories/notifications/NotificationSettingRepository';
import { usrNotificationSettings } from '../../infrastructure/database/schemas/notification-schema';
import type { DatabaseConnection } from '../../infrastructure/database/DatabaseConnectionFactory';

const storedRow = {
  userId: 'user-1',
  isEnabled: true,
  recordRemindAt: '09:00:00',
  dailyCloseAt: '21:00:00',
  createdAt: new Date('2026-01-01T00:00:00Z'),
  updatedAt: new Date('2026-01-01T00:00:00Z'),
};

describe('NotificationSettingRepository', () => {
  let db: MockDb;
  let repository: NotificationSettingRepository;

  beforeEach(() => {
    db = createMockDb();
    repository = new NotificationSettingRepository(db as unknown as DatabaseConnection);
  });

  describe('findEnabledByKindTime', () => {
    it('should map stored times to HH:MM', async () => {
      const chain = createQueryChain([storedRow]);
      db.select.mockReturnValueOnce(chain);

      const result = await repository.findEnabledByKindTime('RECORD_REMIND', '09:00');

      expect(result).toEqual([{ userId: 'user-1', isEnabled: true, recordRemindAt: '09:00', dailyCloseAt: '21:00' }]);
      expect(chain.from).toHaveBeenCalledWith(usrNotificationSettings);
      expect(chain.where).toHaveBeenCalledTimes(1);
    });

    it('should keep the minute of stored times with fractional seconds', async () => {
      db.select.mockReturnValueOnce(
        createQueryChain([{ ...storedRow, recordRemindAt: '09:00:00', dailyCloseAt: '21:00:00.5' }])
      );

      const result = await repository.findEnabledByKindTime('RECORD_REMIND', '09:00');

      expect(result).toEqual([{ userId: 'user-1', isEnabled: true, recordRemindAt: '09:00', dailyCloseAt: '21:00' }]);
    });

    it('should return an empty list when nothing matches', async () => {
      db.select.mockReturnValueOnce(createQueryChain([]));

      await expect(repository.findEnabledByKindTime('DAILY_CLOSE', '21:00')).resolves.toEqual([]);
    });
  });

  describe('findByUserId', () => {
    it('should return null for an unknown user', async () => {
      db.select.mockReturnValueOnce(createQueryChain([]));

      await expect(repository.findByUserId('user-404')).resolves.toBeNull();
    });

    it('should return the mapped setting', async () => {
      db.select.mockReturnValueOnce(createQueryChain([storedRow]));

      await expect(repository.findByUserId('user-1')).resolves.toEqual({
        userId: 'user-1',
        isEnabled: true,
        recordRemindAt: '09:00',
        dailyCloseAt: '21:00',
      });
    });
  });

  describe('existsByUserId', () => {
    it('should report presence from the row count', async () => {
      db.select.mockReturnValueOnce(createQueryChain([{ userId: 'user-1' }]));
      db.select.mockReturnValueOnce(createQueryChain([]));

      await expect(repository.existsByUserId('user-1')).resolves.toBe(true);
      await expect(repository.existsByUserId('user-2')).resolves.toBe(false);
    });
  });

  describe('save', () => {
    it('should upsert on user id with SQL time values', async () => {
      const chain = createQueryChain([{ ...storedRow, recordRemindAt: '14:00:00' }]);
      db.insert.mockReturnValueOnce(chain);

      const saved = await repository.save({
        userId: 'user-1',
        isEnabled: true,
        recordRemindAt: '14:00',
        dailyCloseAt: '21:00',
      });

      expect(db.insert).toHaveBeenCalledWith(usrNotificationSettings);
      expect(chain.values).toHaveBeenCalledWith({
        userId: 'user-1',
        isEnabled: true,
        recordRemindAt: '14:00:00',
        dailyCloseAt: '21:00:00',
      });
      expect(chain.onConflictDoUpdate).toHaveBeenCalledWith({
        target: usrNotificationSettings.userId,
        set: expect.objectContaining({ isEnabled: true, recordRemindAt: '14:00:00', dailyCloseAt: '21:00:00' }),
      });
      expect(saved.recordRemindAt).toBe('14:00');
    });
  });
});
