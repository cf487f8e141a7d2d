import { describe, it, expect } from 'vitest';
import { computeProgress, dailyTarget, elapsedTimeForGoal, sessionProgress } from './sessionProgress';
import { makeDay, makeGoal, makeHistorical } from '@/test/factories';

describe('sessionProgress', () => {
  it('spreads the weekly target evenly over seven days', () => {
    expect(dailyTarget({ weeklyTarget: 7 * 3600 })).toBe(3600);
  });

  it('reports partial progress', () => {
    expect(computeProgress(900, 3600)).toEqual({
      dailyTarget: 3600,
      elapsedTime: 900,
      progress: 0.25,
      hasMetDailyTarget: false,
      remainingTime: 2700,
      progressPercentage: '25%'
    });
  });

  it('caps progress at the target', () => {
    const progress = computeProgress(5000, 3600);
    expect(progress.progress).toBe(1);
    expect(progress.hasMetDailyTarget).toBe(true);
    expect(progress.remainingTime).toBe(0);
    expect(progress.progressPercentage).toBe('100%');
  });

  it('treats a zero target as no progress', () => {
    expect(computeProgress(120, 0).progress).toBe(0);
  });

  it('sums only the goal\'s own history', () => {
    const guitar = makeGoal();
    const reading = makeGoal({ title: 'Read' });
    const date = new Date(2024, 2, 14);
    const day = makeDay(date, [guitar, reading]);
    day.historicalSessions.push(
      makeHistorical([guitar.id], new Date(2024, 2, 14, 9, 0), 600),
      makeHistorical([reading.id], new Date(2024, 2, 14, 10, 0), 300),
      makeHistorical([guitar.id], new Date(2024, 2, 14, 18, 0), 1200)
    );

    expect(elapsedTimeForGoal(day, guitar.id)).toBe(1800);
    expect(sessionProgress(guitar, day).progressPercentage).toBe('50%');
  });
});
