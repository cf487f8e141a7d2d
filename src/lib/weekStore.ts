import type { Day, Goal, GoalSession } from './types';
import { getDaysInRange, getOrCreateDay, saveDay } from './db';
import { createChecklistSession, syncSessionChecklist } from './checklist';
import { createListSession } from './intervals';
import { elapsedTimeForGoal } from './sessionProgress';
import { formatDateKey, weekBounds } from './date-utils';
import { settingsService } from './settingsService';
import { NotFoundError } from './errors';

export interface GoalWeekSummary {
  goalId: string;
  title: string;
  trackedSeconds: number;
  weeklyTarget: number;
  progress: number; // 0..1
}

export function createSessionForGoal(goal: Goal, day: Pick<Day, 'id'>): GoalSession {
  return {
    id: crypto.randomUUID(),
    goalId: goal.id,
    title: goal.title,
    dayId: day.id,
    status: 'active',
    checklist: createChecklistSession(goal.checklistItems),
    intervalLists: goal.intervalLists.map(createListSession),
    plannedStartTime: null,
    plannedDuration: null,
    plannedPriority: null,
    plannedReasoning: null,
    recommendationReasons: []
  };
}

export async function fetchCurrentDay(now: Date = new Date()): Promise<Day> {
  return getOrCreateDay(now);
}

/**
 * Brings the day's sessions in line with the goal list: orphans are removed,
 * every non-archived goal gets a session, and titles and checklists follow
 * their goal.
 */
export async function refreshGoals(day: Day, goals: Goal[]): Promise<Day> {
  const goalMap = new Map(goals.map(goal => [goal.id, goal]));

  const kept = day.sessions.filter(session => goalMap.has(session.goalId));
  const removed = day.sessions.length - kept.length;

  const sessions = kept.map(session => {
    const goal = goalMap.get(session.goalId);
    if (!goal) return session;
    return { ...session, title: goal.title, checklist: syncSessionChecklist(goal, session) };
  });

  const covered = new Set(sessions.map(session => session.goalId));
  for (const goal of goals) {
    if (goal.status !== 'archived' && !covered.has(goal.id)) {
      sessions.push(createSessionForGoal(goal, day));
    }
  }

  if (removed > 0) {
    console.debug(`Removed ${removed} orphaned session(s) from ${day.id}`);
  }

  day.sessions = sessions;
  await saveDay(day);
  return day;
}

export async function skipSession(day: Day, sessionId: string): Promise<GoalSession> {
  const session = day.sessions.find(candidate => candidate.id === sessionId);
  if (!session) {
    throw new NotFoundError('session', sessionId);
  }

  session.status = session.status === 'skipped' ? 'active' : 'skipped';
  await saveDay(day);
  return session;
}

export async function fetchWeekDays(now: Date = new Date()): Promise<Day[]> {
  const settings = await settingsService.getSettings();
  const { start, end } = weekBounds(now, settings.weekStartDay);
  return getDaysInRange(formatDateKey(start), formatDateKey(end));
}

export function summarizeWeek(days: Day[], goals: Goal[]): GoalWeekSummary[] {
  return goals.map(goal => {
    const trackedSeconds = days.reduce((total, day) => total + elapsedTimeForGoal(day, goal.id), 0);
    return {
      goalId: goal.id,
      title: goal.title,
      trackedSeconds,
      weeklyTarget: goal.weeklyTarget,
      progress: goal.weeklyTarget > 0 ? Math.min(trackedSeconds / goal.weeklyTarget, 1) : 0
    };
  });
}

export async function weekSummary(goals: Goal[], now: Date = new Date()): Promise<GoalWeekSummary[]> {
  return summarizeWeek(await fetchWeekDays(now), goals);
}
