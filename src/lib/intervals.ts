import type { Interval, IntervalKind, IntervalList, IntervalListSession } from './types';

export interface IntervalDraft {
  name: string;
  durationSeconds: number;
  kind: IntervalKind;
}

function reindex(intervals: Interval[]): Interval[] {
  return intervals.map((interval, index) => ({ ...interval, orderIndex: index }));
}

export function sortedIntervals(list: IntervalList): Interval[] {
  return [...list.intervals].sort((a, b) => a.orderIndex - b.orderIndex);
}

export function createIntervalList(name: string, drafts: IntervalDraft[] = []): IntervalList {
  return addIntervals({ id: crypto.randomUUID(), name, intervals: [] }, drafts);
}

export function addInterval(list: IntervalList, draft: IntervalDraft): IntervalList {
  return addIntervals(list, [draft]);
}

export function addIntervals(list: IntervalList, drafts: IntervalDraft[]): IntervalList {
  const created: Interval[] = drafts.map(draft => ({
    id: crypto.randomUUID(),
    name: draft.name,
    durationSeconds: draft.durationSeconds,
    kind: draft.kind,
    orderIndex: 0
  }));
  return { ...list, intervals: reindex([...sortedIntervals(list), ...created]) };
}

export function removeInterval(list: IntervalList, intervalId: string): IntervalList {
  return { ...list, intervals: reindex(sortedIntervals(list).filter(interval => interval.id !== intervalId)) };
}

export function moveInterval(list: IntervalList, fromIndex: number, toIndex: number): IntervalList {
  const intervals = sortedIntervals(list);
  if (fromIndex < 0 || fromIndex >= intervals.length) return list;
  const [moved] = intervals.splice(fromIndex, 1);
  const target = Math.min(Math.max(toIndex, 0), intervals.length);
  intervals.splice(target, 0, moved);
  return { ...list, intervals: reindex(intervals) };
}

export function totalDuration(list: IntervalList): number {
  return list.intervals.reduce((total, interval) => total + interval.durationSeconds, 0);
}

/**
 * Builds `repeatCount` break/work pairs: "Break 1", "Work 1", "Break 2", ...
 */
export function buildAlternatingSequence(
  breakSeconds: number,
  workSeconds: number,
  repeatCount: number,
  breakName = 'Break',
  workName = 'Work'
): IntervalDraft[] {
  if (repeatCount <= 0) return [];

  const drafts: IntervalDraft[] = [];
  for (let i = 1; i <= repeatCount; i++) {
    drafts.push({ name: `${breakName} ${i}`, durationSeconds: breakSeconds, kind: 'breakTime' });
    drafts.push({ name: `${workName} ${i}`, durationSeconds: workSeconds, kind: 'work' });
  }
  return drafts;
}

export function createListSession(list: IntervalList): IntervalListSession {
  return {
    id: crypto.randomUUID(),
    listId: list.id,
    intervals: sortedIntervals(list).map(interval => ({
      id: crypto.randomUUID(),
      intervalId: interval.id,
      elapsedSeconds: 0,
      isCompleted: false
    }))
  };
}

// Copies a list with fresh ids, keeping order
export function duplicateIntervalList(list: IntervalList): IntervalList {
  return {
    id: crypto.randomUUID(),
    name: list.name,
    intervals: sortedIntervals(list).map(interval => ({ ...interval, id: crypto.randomUUID() }))
  };
}
