import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotificationSettingService } from '../../application/services/NotificationSettingService';
import { NotificationSettingValidationError } from '../../domains/notifications/errors';
import type { INotificationSettingRepository } from '../../domains/notifications/repositories/INotificationSettingRepository';
import type { NotificationSetting } from '../../domains/notifications/types';

function createRepository() {
  return {
    findEnabledByKindTime: vi.fn<INotificationSettingRepository['findEnabledByKindTime']>(),
    findByUserId: vi.fn<INotificationSettingRepository['findByUserId']>().mockResolvedValue(null),
    existsByUserId: vi.fn<INotificationSettingRepository['existsByUserId']>().mockResolvedValue(false),
    save: vi.fn<INotificationSettingRepository['save']>().mockImplementation(async setting => setting),
  };
}

const existing: NotificationSetting = {
  userId: 'user-1',
  isEnabled: true,
  recordRemindAt: '08:30',
  dailyCloseAt: '22:00',
};

describe('NotificationSettingService', () => {
  let repository: ReturnType<typeof createRepository>;
  let service: NotificationSettingService;

  beforeEach(() => {
    repository = createRepository();
    service = new NotificationSettingService(repository);
  });

  describe('findOrCreate', () => {
    it('should return the stored setting without writing', async () => {
      repository.findByUserId.mockResolvedValue(existing);

      await expect(service.findOrCreate('user-1')).resolves.toEqual(existing);
      expect(repository.save).not.toHaveBeenCalled();
    });

    it('should create the defaults when no row exists', async () => {
      const created = await service.findOrCreate('user-2');

      expect(created).toEqual({ userId: 'user-2', isEnabled: true, recordRemindAt: '14:00', dailyCloseAt: '21:00' });
      expect(repository.save).toHaveBeenCalledWith({
        userId: 'user-2',
        isEnabled: true,
        recordRemindAt: '14:00',
        dailyCloseAt: '21:00',
      });
    });
  });

  describe('update', () => {
    it('should only change the fields present in the patch', async () => {
      repository.findByUserId.mockResolvedValue(existing);

      const result = await service.update('user-1', { dailyCloseAt: '23:15' });

      expect(result).toEqual({
        updated: true,
        setting: { userId: 'user-1', isEnabled: true, recordRemindAt: '08:30', dailyCloseAt: '23:15' },
      });
      expect(repository.save).toHaveBeenCalledTimes(1);
    });

    it('should start from the defaults for a user without settings', async () => {
      const result = await service.update('user-3', { isEnabled: false });

      expect(result.setting).toEqual({ userId: 'user-3', isEnabled: false, recordRemindAt: '14:00', dailyCloseAt: '21:00' });
      expect(repository.save).toHaveBeenCalledTimes(2);
    });

    it('should reject a malformed time', async () => {
      repository.findByUserId.mockResolvedValue(existing);

      await expect(service.update('user-1', { recordRemindAt: '25:00' })).rejects.toBeInstanceOf(
        NotificationSettingValidationError
      );
      expect(repository.save).not.toHaveBeenCalled();
    });
  });

  describe('ensureDefaultExists', () => {
    it('should not write when a row exists', async () => {
      repository.existsByUserId.mockResolvedValue(true);

      await service.ensureDefaultExists('user-1');

      expect(repository.save).not.toHaveBeenCalled();
    });

    it('should write the defaults once when missing', async () => {
      await service.ensureDefaultExists('user-4');

      expect(repository.save).toHaveBeenCalledTimes(1);
      expect(repository.save).toHaveBeenCalledWith({
        userId: 'user-4',
        isEnabled: true,
        recordRemindAt: '14:00',
        dailyCloseAt: '21:00',
      });
    });
  });
});
