import type { DayTimeSchedule, Goal, GoalStatus } from './types';
import { deleteGoalRecord, getGoal, putGoal } from './database';
import { getAllDays, saveDay } from './db';
import { cloneSchedule } from './schedule';
import { duplicateIntervalList } from './intervals';
import { sessionTimerManager, type SessionTimerManager } from './sessionTimerManager';
import { NotFoundError, ValidationError } from './errors';

export interface GoalInput {
  title: string;
  weeklyTarget: number; // seconds
  status?: GoalStatus;
  primaryTagId?: string | null;
  otherTagIds?: string[];
  notificationsEnabled?: boolean;
  scheduleNotificationsEnabled?: boolean;
  completionNotificationsEnabled?: boolean;
  dayTimeSchedule?: DayTimeSchedule;
}

function validateInput(input: Pick<GoalInput, 'title' | 'weeklyTarget'>): string {
  const title = input.title.trim();
  if (!title) {
    throw new ValidationError('title', 'Goal title cannot be empty');
  }
  if (!Number.isFinite(input.weeklyTarget) || input.weeklyTarget <= 0) {
    throw new ValidationError('weeklyTarget', 'Weekly target must be greater than zero');
  }
  return title;
}

export function buildGoal(input: GoalInput): Goal {
  const title = validateInput(input);
  const now = new Date();
  return {
    id: crypto.randomUUID(),
    title,
    status: input.status ?? 'active',
    primaryTagId: input.primaryTagId ?? null,
    otherTagIds: input.otherTagIds ?? [],
    weeklyTarget: input.weeklyTarget,
    notificationsEnabled: input.notificationsEnabled ?? false,
    scheduleNotificationsEnabled: input.scheduleNotificationsEnabled ?? false,
    completionNotificationsEnabled: input.completionNotificationsEnabled ?? false,
    dayTimeSchedule: input.dayTimeSchedule ?? {},
    checklistItems: [],
    intervalLists: [],
    createdAt: now,
    updatedAt: now
  };
}

export async function createGoal(input: GoalInput): Promise<Goal> {
  return putGoal(buildGoal(input));
}

export async function updateGoal(goal: Goal): Promise<Goal> {
  const title = validateInput(goal);
  return putGoal({ ...goal, title });
}

/**
 * Removes the goal with its sessions and history links. A running timer on
 * the goal is discarded without being recorded.
 */
export async function deleteGoal(goal: Goal, timerManager: SessionTimerManager = sessionTimerManager): Promise<void> {
  if (timerManager.activeGoalId === goal.id) {
    timerManager.clearActiveSession();
  }

  const days = await getAllDays();
  for (const day of days) {
    const sessions = day.sessions.filter(session => session.goalId !== goal.id);
    const historicalSessions = day.historicalSessions
      .map(session => ({ ...session, goalIds: session.goalIds.filter(id => id !== goal.id) }))
      .filter(session => session.goalIds.length > 0);

    if (sessions.length !== day.sessions.length || historicalSessions.length !== day.historicalSessions.length) {
      await saveDay({ ...day, sessions, historicalSessions });
    }
  }

  await deleteGoalRecord(goal.id);
}

export async function toggleArchive(goal: Goal): Promise<Goal> {
  return putGoal({ ...goal, status: goal.status === 'archived' ? 'active' : 'archived' });
}

export async function activateSuggestion(goalId: string): Promise<Goal> {
  const goal = await getGoal(goalId);
  if (!goal) {
    throw new NotFoundError('goal', goalId);
  }
  return putGoal({ ...goal, status: 'active' });
}

export async function duplicateGoal(goal: Goal): Promise<Goal> {
  const now = new Date();
  const copy: Goal = {
    ...goal,
    id: crypto.randomUUID(),
    title: `${goal.title} (Copy)`,
    otherTagIds: [...goal.otherTagIds],
    dayTimeSchedule: cloneSchedule(goal.dayTimeSchedule),
    checklistItems: goal.checklistItems.map(item => ({ ...item, id: crypto.randomUUID(), createdAt: now })),
    intervalLists: goal.intervalLists.map(duplicateIntervalList),
    createdAt: now,
    updatedAt: now
  };
  return putGoal(copy);
}
