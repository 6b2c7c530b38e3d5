import { describe, it, expect } from 'vitest';
import { groupTokensByUser } from '../../../domains/notifications/token-grouping';

describe('groupTokensByUser', () => {
  it('should collapse repeated tokens per user', () => {
    const grouped = groupTokensByUser([
      { userId: 'user-1', token: 't1' },
      { userId: 'user-1', token: 't1' },
      { userId: 'user-1', token: 't2' },
    ]);

    expect(grouped).toEqual(new Map([['user-1', ['t1', 't2']]]));
  });

  it('should drop null and blank tokens and omit users left empty', () => {
    const grouped = groupTokensByUser([
      { userId: 'user-1', token: null },
      { userId: 'user-1', token: '' },
      { userId: 'user-2', token: '  ' },
      { userId: 'user-2', token: 't3' },
    ]);

    expect(Array.from(grouped.keys())).toEqual(['user-2']);
    expect(grouped.get('user-2')).toEqual(['t3']);
  });

  it('should keep the same token under two different users', () => {
    const grouped = groupTokensByUser([
      { userId: 'user-1', token: 'shared' },
      { userId: 'user-2', token: 'shared' },
    ]);

    expect(grouped.get('user-1')).toEqual(['shared']);
    expect(grouped.get('user-2')).toEqual(['shared']);
  });

  it('should return an empty map for no rows', () => {
    expect(groupTokensByUser([]).size).toBe(0);
  });
});
