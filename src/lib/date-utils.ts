import {
  format,
  parse,
  startOfDay,
  addDays,
  addSeconds,
  startOfWeek,
  endOfWeek,
  eachDayOfInterval,
  differenceInSeconds,
  getDay,
  isValid
} from 'date-fns';
import type { TimeOfDay, WeekdayId } from './types';

export type RoundingMode = 'nearest' | 'up' | 'down';

export interface DateInterval {
  start: Date;
  end: Date;
}

export function formatDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDateKey(dateKey: string): Date {
  const parsed = parse(dateKey, 'yyyy-MM-dd', new Date());
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid date key: ${dateKey}`);
  }
  return parsed;
}

// A day runs from local midnight to one second before the next midnight
export function dayBounds(date: Date): DateInterval {
  const start = startOfDay(date);
  return { start, end: addSeconds(addDays(start, 1), -1) };
}

export function isWithinDay(date: Date, bounds: DateInterval): boolean {
  return date.getTime() >= bounds.start.getTime() && date.getTime() <= bounds.end.getTime();
}

export function weekdayId(date: Date): WeekdayId {
  const ids: WeekdayId[] = [1, 2, 3, 4, 5, 6, 7];
  return ids[getDay(date)];
}

export function weekdayTitle(date: Date): string {
  return format(date, 'EEEE');
}

export function weekdayInitial(date: Date): string {
  return format(date, 'EEEEE');
}

export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour >= 6 && hour < 10) return 'morning';
  if (hour >= 10 && hour < 14) return 'midday';
  if (hour >= 14 && hour < 18) return 'afternoon';
  if (hour >= 18 && hour < 22) return 'evening';
  return 'night';
}

export function timeOfDay(date: Date): TimeOfDay {
  return timeOfDayForHour(date.getHours());
}

export function weekBounds(date: Date, weekStartDay: 0 | 1): DateInterval {
  return {
    start: startOfWeek(date, { weekStartsOn: weekStartDay }),
    end: endOfWeek(date, { weekStartsOn: weekStartDay })
  };
}

export function weekDateKeys(date: Date, weekStartDay: 0 | 1): string[] {
  const { start, end } = weekBounds(date, weekStartDay);
  return eachDayOfInterval({ start, end }).map(formatDateKey);
}

export function weekProgress(now: Date, weekStartDay: 0 | 1): number {
  const { start, end } = weekBounds(now, weekStartDay);
  const total = end.getTime() - start.getTime();
  if (total <= 0) return 0;
  const elapsed = now.getTime() - start.getTime();
  return Math.min(Math.max(elapsed / total, 0), 1);
}

export function remainingTimeInWeek(now: Date, weekStartDay: 0 | 1): number {
  const { end } = weekBounds(now, weekStartDay);
  return Math.max(differenceInSeconds(end, now), 0);
}

// Fraction of `a` covered by `b`
export function overlapPercentage(a: DateInterval, b: DateInterval): number {
  const length = a.end.getTime() - a.start.getTime();
  if (length <= 0) return 0;

  const overlapStart = Math.max(a.start.getTime(), b.start.getTime());
  const overlapEnd = Math.min(a.end.getTime(), b.end.getTime());
  if (overlapEnd <= overlapStart) return 0;

  return (overlapEnd - overlapStart) / length;
}

export function roundToPrecision(date: Date, precisionSeconds: number, mode: RoundingMode = 'nearest'): Date {
  if (precisionSeconds <= 0) return new Date(date);

  const precisionMs = precisionSeconds * 1000;
  // Round against local midnight so minute boundaries line up with the wall clock
  const dayStart = startOfDay(date).getTime();
  const offset = (date.getTime() - dayStart) / precisionMs;

  let steps: number;
  switch (mode) {
    case 'up':
      steps = Math.ceil(offset);
      break;
    case 'down':
      steps = Math.floor(offset);
      break;
    default:
      steps = Math.round(offset);
  }
  return new Date(dayStart + steps * precisionMs);
}

export function formatClockTime(date: Date): string {
  return format(date, 'HH:mm');
}

// Parses "HH:mm" onto the given day; null when the text is not a time
export function parseClockTime(text: string, day: Date): Date | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  const result = startOfDay(day);
  result.setHours(hours, minutes, 0, 0);
  return result;
}
