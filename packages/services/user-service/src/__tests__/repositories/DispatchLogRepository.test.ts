import { describe, it, expect, beforeEach } from 'vitest';
import { createFailingQueryChain, createMockDb, createQueryChain, type MockDb } from '@lastcup/test-utils';
import {
  DispatchLogRepository,
  isUniqueViolation,
} from '../../infrastructure/repositories/notifications/DispatchLogRepository';
import { usrNotificationDispatchLogs } from '../../infrastructure/database/schemas/notification-schema';
import type { DatabaseConnection } from '../../infrastructure/database/DatabaseConnectionFactory';

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('DispatchLogRepository', () => {
  let db: MockDb;
  let repository: DispatchLogRepository;

  beforeEach(() => {
    db = createMockDb();
    repository = new DispatchLogRepository(db as unknown as DatabaseConnection);
  });

  describe('findSentUserIds', () => {
    it('should not query for an empty id list', async () => {
      const sent = await repository.findSentUserIds('RECORD_REMIND', '2026-03-10', []);

      expect(sent.size).toBe(0);
      expect(db.select).not.toHaveBeenCalled();
    });

    it('should return the logged user ids as a set', async () => {
      db.select.mockReturnValueOnce(createQueryChain([{ userId: 'user-1' }, { userId: 'user-3' }]));

      const sent = await repository.findSentUserIds('RECORD_REMIND', '2026-03-10', ['user-1', 'user-2', 'user-3']);

      expect(sent).toEqual(new Set(['user-1', 'user-3']));
    });
  });

  describe('save', () => {
    it('should report inserted when a row comes back', async () => {
      const chain = createQueryChain([{ id: 'log-1' }]);
      db.insert.mockReturnValueOnce(chain);

      await expect(repository.save('DAILY_CLOSE', 'user-1', '2026-03-10')).resolves.toEqual({ status: 'inserted' });
      expect(db.insert).toHaveBeenCalledWith(usrNotificationDispatchLogs);
      expect(chain.values).toHaveBeenCalledWith({
        notificationType: 'DAILY_CLOSE',
        userId: 'user-1',
        sentDate: '2026-03-10',
      });
      expect(chain.onConflictDoNothing).toHaveBeenCalledWith({
        target: [
          usrNotificationDispatchLogs.notificationType,
          usrNotificationDispatchLogs.userId,
          usrNotificationDispatchLogs.sentDate,
        ],
      });
    });

    it('should report already_exists when the conflict swallowed the insert', async () => {
      db.insert.mockReturnValueOnce(createQueryChain([]));

      await expect(repository.save('RECORD_REMIND', 'user-1', '2026-03-10')).resolves.toEqual({
        status: 'already_exists',
      });
    });

    it('should map a unique violation to already_exists', async () => {
      db.insert.mockReturnValueOnce(createFailingQueryChain(pgError('23505', 'duplicate key value')));

      await expect(repository.save('RECORD_REMIND', 'user-1', '2026-03-10')).resolves.toEqual({
        status: 'already_exists',
      });
    });

    it('should return failed with the error for anything else', async () => {
      const error = pgError('57014', 'canceling statement due to statement timeout');
      db.insert.mockReturnValueOnce(createFailingQueryChain(error));

      await expect(repository.save('RECORD_REMIND', 'user-1', '2026-03-10')).resolves.toEqual({
        status: 'failed',
        error,
      });
    });
  });

  describe('isUniqueViolation', () => {
    it('should look through the cause chain', () => {
      const wrapped = new Error('insert failed', { cause: pgError('23505', 'duplicate key value') });

      expect(isUniqueViolation(wrapped)).toBe(true);
      expect(isUniqueViolation(new Error('other'))).toBe(false);
      expect(isUniqueViolation('23505')).toBe(false);
    });
  });
});
