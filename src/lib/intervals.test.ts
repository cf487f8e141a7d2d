import { describe, it, expect } from 'vitest';
import {
  addInterval,
  buildAlternatingSequence,
  createIntervalList,
  createListSession,
  duplicateIntervalList,
  moveInterval,
  removeInterval,
  sortedIntervals,
  totalDuration
} from './intervals';

const names = (list: ReturnType<typeof createIntervalList>) => sortedIntervals(list).map(interval => interval.name);

describe('intervals', () => {
  it('builds alternating break and work pairs', () => {
    expect(buildAlternatingSequence(60, 300, 2)).toEqual([
      { name: 'Break 1', durationSeconds: 60, kind: 'breakTime' },
      { name: 'Work 1', durationSeconds: 300, kind: 'work' },
      { name: 'Break 2', durationSeconds: 60, kind: 'breakTime' },
      { name: 'Work 2', durationSeconds: 300, kind: 'work' }
    ]);
    expect(buildAlternatingSequence(60, 300, 0)).toEqual([]);
  });

  it('creates lists with contiguous order indexes', () => {
    const list = createIntervalList('Pomodoro', buildAlternatingSequence(300, 1500, 2));
    expect(list.intervals.map(interval => interval.orderIndex)).toEqual([0, 1, 2, 3]);
    expect(totalDuration(list)).toBe(3600);
  });

  it('adds, moves and removes intervals', () => {
    let list = createIntervalList('Drills', [
      { name: 'Warm up', durationSeconds: 120, kind: 'work' },
      { name: 'Sprint', durationSeconds: 30, kind: 'work' }
    ]);
    list = addInterval(list, { name: 'Rest', durationSeconds: 60, kind: 'breakTime' });
    expect(names(list)).toEqual(['Warm up', 'Sprint', 'Rest']);

    list = moveInterval(list, 2, 0);
    expect(names(list)).toEqual(['Rest', 'Warm up', 'Sprint']);

    list = removeInterval(list, sortedIntervals(list)[1].id);
    expect(names(list)).toEqual(['Rest', 'Sprint']);
    expect(list.intervals.map(interval => interval.orderIndex)).toEqual([0, 1]);
  });

  it('ignores moves from outside the list', () => {
    const list = createIntervalList('Drills', [{ name: 'Sprint', durationSeconds: 30, kind: 'work' }]);
    expect(moveInterval(list, 3, 0)).toBe(list);
  });

  it('starts a fresh session for the list', () => {
    const list = createIntervalList('Pomodoro', buildAlternatingSequence(300, 1500, 1));
    const session = createListSession(list);
    expect(session.listId).toBe(list.id);
    expect(session.intervals.map(entry => [entry.intervalId, entry.elapsedSeconds, entry.isCompleted])).toEqual([
      [list.intervals[0].id, 0, false],
      [list.intervals[1].id, 0, false]
    ]);
  });

  it('duplicates with new ids', () => {
    const list = createIntervalList('Pomodoro', buildAlternatingSequence(300, 1500, 1));
    const copy = duplicateIntervalList(list);
    expect(copy.id).not.toBe(list.id);
    expect(names(copy)).toEqual(names(list));
    expect(copy.intervals[0].id).not.toBe(list.intervals[0].id);
  });
});
