import type { Day, Goal, HistoricalSession } from './types';

export interface SessionProgress {
  dailyTarget: number;
  elapsedTime: number;
  progress: number;
  hasMetDailyTarget: boolean;
  remainingTime: number;
  progressPercentage: string;
}

export function dailyTarget(goal: Pick<Goal, 'weeklyTarget'>): number {
  return goal.weeklyTarget / 7;
}

export function historicalSessionsForGoal(historicalSessions: HistoricalSession[], goalId: string): HistoricalSession[] {
  return historicalSessions.filter(session => session.goalIds.includes(goalId));
}

export function elapsedTimeForGoal(day: Pick<Day, 'historicalSessions'>, goalId: string): number {
  return historicalSessionsForGoal(day.historicalSessions, goalId)
    .reduce((total, session) => total + session.duration, 0);
}

export function computeProgress(elapsedTime: number, target: number): SessionProgress {
  const progress = target > 0 ? Math.min(elapsedTime / target, 1) : 0;
  return {
    dailyTarget: target,
    elapsedTime,
    progress,
    hasMetDailyTarget: elapsedTime >= target,
    remainingTime: Math.max(target - elapsedTime, 0),
    progressPercentage: `${Math.floor(progress * 100)}%`
  };
}

export function sessionProgress(goal: Goal, day: Pick<Day, 'historicalSessions'>): SessionProgress {
  return computeProgress(elapsedTimeForGoal(day, goal.id), dailyTarget(goal));
}
