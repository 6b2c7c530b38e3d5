import type { LocalDate, TimeOfDay } from './types';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface ZonedMinute {
  date: LocalDate;
  time: TimeOfDay;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Calendar day and minute of `instant` as seen in `timeZone`; seconds are dropped.
 */
export function toZonedMinute(instant: Date, timeZone: string): ZonedMinute {
  const parts = getFormatter(timeZone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? '00';

  return {
    date: `${pick('year')}-${pick('month')}-${pick('day')}`,
    time: `${pick('hour')}:${pick('minute')}`,
  };
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::[0-5]\d)?$/;

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY_PATTERN.test(value);
}

/**
 * Normalise `H:MM`, `HH:MM` or `HH:MM:SS` to `HH:MM`
 */
export function normalizeTimeOfDay(value: string): TimeOfDay {
  const padded = /^\d:/.test(value) ? `0${value}` : value;
  if (!isTimeOfDay(padded)) {
    throw new RangeError(`Invalid time of day: ${value}`);
  }
  return padded.substring(0, 5);
}
