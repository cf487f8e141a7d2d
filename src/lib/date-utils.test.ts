import { describe, it, expect } from 'vitest';
import {
  dayBounds,
  formatClockTime,
  formatDateKey,
  isWithinDay,
  overlapPercentage,
  parseClockTime,
  parseDateKey,
  remainingTimeInWeek,
  roundToPrecision,
  timeOfDayForHour,
  weekBounds,
  weekDateKeys,
  weekdayId,
  weekdayInitial,
  weekdayTitle,
  weekProgress
} from './date-utils';

describe('date keys', () => {
  it('formats and parses local calendar days', () => {
    expect(formatDateKey(new Date(2024, 2, 14, 23, 59))).toBe('2024-03-14');
    const parsed = parseDateKey('2024-03-14');
    expect(parsed.getFullYear()).toBe(2024);
    expect(parsed.getMonth()).toBe(2);
    expect(parsed.getDate()).toBe(14);
  });

  it('rejects keys that are not dates', () => {
    expect(() => parseDateKey('not-a-date')).toThrow(RangeError);
  });
});

describe('dayBounds', () => {
  it('runs from midnight to one second before the next midnight', () => {
    const { start, end } = dayBounds(new Date(2024, 2, 14, 15, 30));
    expect(start).toEqual(new Date(2024, 2, 14, 0, 0, 0));
    expect(end).toEqual(new Date(2024, 2, 14, 23, 59, 59));
  });

  it('checks membership inclusively', () => {
    const bounds = dayBounds(new Date(2024, 2, 14));
    expect(isWithinDay(new Date(2024, 2, 14, 23, 59, 59), bounds)).toBe(true);
    expect(isWithinDay(new Date(2024, 2, 15, 0, 0, 0), bounds)).toBe(false);
  });
});

describe('weekdays and times of day', () => {
  it('numbers weekdays from Sunday', () => {
    expect(weekdayId(new Date(2024, 2, 10))).toBe(1); // Sunday
    expect(weekdayId(new Date(2024, 2, 14))).toBe(5); // Thursday
    expect(weekdayId(new Date(2024, 2, 16))).toBe(7); // Saturday
  });

  it('names weekdays', () => {
    expect(weekdayTitle(new Date(2024, 2, 14))).toBe('Thursday');
    expect(weekdayInitial(new Date(2024, 2, 14))).toBe('T');
    expect(weekdayInitial(new Date(2024, 2, 10))).toBe('S');
  });

  it('maps hours onto the five periods', () => {
    expect(timeOfDayForHour(5)).toBe('night');
    expect(timeOfDayForHour(6)).toBe('morning');
    expect(timeOfDayForHour(10)).toBe('midday');
    expect(timeOfDayForHour(14)).toBe('afternoon');
    expect(timeOfDayForHour(18)).toBe('evening');
    expect(timeOfDayForHour(22)).toBe('night');
  });
});

describe('weeks', () => {
  it('starts the week on the configured day', () => {
    const thursday = new Date(2024, 2, 14, 12);
    expect(weekBounds(thursday, 1).start).toEqual(new Date(2024, 2, 11));
    expect(weekBounds(thursday, 0).start).toEqual(new Date(2024, 2, 10));
    expect(weekDateKeys(thursday, 1)).toEqual([
      '2024-03-11',
      '2024-03-12',
      '2024-03-13',
      '2024-03-14',
      '2024-03-15',
      '2024-03-16',
      '2024-03-17'
    ]);
  });

  it('reports progress through the week between 0 and 1', () => {
    expect(weekProgress(new Date(2024, 2, 11, 0, 0), 1)).toBe(0);
    expect(weekProgress(new Date(2024, 2, 14, 12, 0), 1)).toBeCloseTo(0.5, 2);
  });

  it('counts the seconds left in the week', () => {
    expect(remainingTimeInWeek(new Date(2024, 2, 17, 23, 0, 0), 1)).toBe(3599);
  });
});

describe('overlapPercentage', () => {
  const at = (hour: number) => new Date(2024, 2, 14, hour);

  it('returns the share of the first interval covered by the second', () => {
    expect(overlapPercentage({ start: at(10), end: at(12) }, { start: at(11), end: at(13) })).toBe(0.5);
    expect(overlapPercentage({ start: at(10), end: at(12) }, { start: at(9), end: at(13) })).toBe(1);
  });

  it('is zero for disjoint or empty intervals', () => {
    expect(overlapPercentage({ start: at(10), end: at(11) }, { start: at(11), end: at(12) })).toBe(0);
    expect(overlapPercentage({ start: at(10), end: at(10) }, { start: at(9), end: at(12) })).toBe(0);
  });
});

describe('roundToPrecision', () => {
  const date = new Date(2024, 2, 14, 10, 7, 30);

  it('rounds to five minute steps', () => {
    expect(roundToPrecision(date, 300, 'up')).toEqual(new Date(2024, 2, 14, 10, 10));
    expect(roundToPrecision(date, 300, 'down')).toEqual(new Date(2024, 2, 14, 10, 5));
    expect(roundToPrecision(date, 300)).toEqual(new Date(2024, 2, 14, 10, 10));
  });

  it('leaves the date alone without a precision', () => {
    expect(roundToPrecision(date, 0)).toEqual(date);
  });
});

describe('clock times', () => {
  const day = new Date(2024, 2, 14);

  it('formats and parses HH:mm', () => {
    expect(formatClockTime(new Date(2024, 2, 14, 9, 5))).toBe('09:05');
    expect(parseClockTime('9:05', day)).toEqual(new Date(2024, 2, 14, 9, 5));
  });

  it('returns null for text that is not a time', () => {
    expect(parseClockTime('24:00', day)).toBeNull();
    expect(parseClockTime('later', day)).toBeNull();
  });
});
