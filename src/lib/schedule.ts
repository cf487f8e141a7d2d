import type { DayTimeSchedule, Goal, TimeOfDay, WeekdayId } from './types';
import { TIMES_OF_DAY, WEEKDAY_IDS } from './types';

export function timesForWeekday(schedule: DayTimeSchedule, weekday: WeekdayId): TimeOfDay[] {
  return schedule[weekday] ?? [];
}

export function hasSchedule(goal: Pick<Goal, 'dayTimeSchedule'>): boolean {
  return WEEKDAY_IDS.some(weekday => timesForWeekday(goal.dayTimeSchedule, weekday).length > 0);
}

export function isScheduled(goal: Pick<Goal, 'dayTimeSchedule'>, weekday: WeekdayId, time: TimeOfDay): boolean {
  return timesForWeekday(goal.dayTimeSchedule, weekday).includes(time);
}

// Union of every scheduled time, in morning-to-night order
export function preferredTimesOfDay(goal: Pick<Goal, 'dayTimeSchedule'>): TimeOfDay[] {
  const scheduled = new Set(WEEKDAY_IDS.flatMap(weekday => timesForWeekday(goal.dayTimeSchedule, weekday)));
  return TIMES_OF_DAY.filter(time => scheduled.has(time));
}

export function setScheduledTimes(schedule: DayTimeSchedule, weekday: WeekdayId, times: TimeOfDay[]): DayTimeSchedule {
  const next: DayTimeSchedule = { ...schedule };
  if (times.length === 0) {
    delete next[weekday];
  } else {
    next[weekday] = TIMES_OF_DAY.filter(time => times.includes(time));
  }
  return next;
}

export function cloneSchedule(schedule: DayTimeSchedule): DayTimeSchedule {
  const copy: DayTimeSchedule = {};
  for (const weekday of WEEKDAY_IDS) {
    const times = schedule[weekday];
    if (times && times.length > 0) copy[weekday] = [...times];
  }
  return copy;
}
