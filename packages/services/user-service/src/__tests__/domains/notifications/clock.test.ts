import { describe, it, expect } from 'vitest';
import {
  isTimeOfDay,
  isValidTimeZone,
  normalizeTimeOfDay,
  toZonedMinute,
} from '../../../domains/notifications/clock';

describe('toZonedMinute', () => {
  it('should shift a UTC instant into Asia/Seoul', () => {
    expect(toZonedMinute(new Date('2026-03-10T00:00:00Z'), 'Asia/Seoul')).toEqual({
      date: '2026-03-10',
      time: '09:00',
    });
  });

  it('should drop seconds', () => {
    expect(toZonedMinute(new Date('2026-03-10T12:34:59.999Z'), 'Asia/Seoul').time).toBe('21:34');
  });

  it('should roll the calendar day over at local midnight', () => {
    expect(toZonedMinute(new Date('2026-03-10T15:00:00Z'), 'Asia/Seoul')).toEqual({
      date: '2026-03-11',
      time: '00:00',
    });
  });

  it('should keep the previous local day just before midnight', () => {
    expect(toZonedMinute(new Date('2026-03-10T14:59:00Z'), 'Asia/Seoul')).toEqual({
      date: '2026-03-10',
      time: '23:59',
    });
  });

  it('should honour other zones', () => {
    expect(toZonedMinute(new Date('2026-03-10T00:00:00Z'), 'UTC')).toEqual({ date: '2026-03-10', time: '00:00' });
  });
});

describe('time of day helpers', () => {
  it('should accept HH:MM and HH:MM:SS', () => {
    expect(isTimeOfDay('09:00')).toBe(true);
    expect(isTimeOfDay('21:00:00')).toBe(true);
    expect(isTimeOfDay('24:00')).toBe(false);
    expect(isTimeOfDay('9:00')).toBe(false);
    expect(isTimeOfDay('12:60')).toBe(false);
  });

  it('should normalise to HH:MM', () => {
    expect(normalizeTimeOfDay('14:00:00')).toBe('14:00');
    expect(normalizeTimeOfDay('9:05')).toBe('09:05');
    expect(normalizeTimeOfDay('21:00')).toBe('21:00');
  });

  it('should reject malformed times', () => {
    expect(() => normalizeTimeOfDay('25:00')).toThrow(RangeError);
  });

  it('should validate IANA zone names', () => {
    expect(isValidTimeZone('Asia/Seoul')).toBe(true);
    expect(isValidTimeZone('Not/AZone')).toBe(false);
  });
});
