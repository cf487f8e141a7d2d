import { addSeconds, differenceInMilliseconds } from 'date-fns';
import type { Day, Goal, GoalSession, HistoricalSession } from './types';
import { addHistoricalSession, saveDay } from './db';
import { completeAllChecklistItems } from './checklist';
import { sessionProgress } from './sessionProgress';
import { isWithinDay } from './date-utils';
import { NotFoundError, ValidationError } from './errors';

export const MANUAL_DURATION_OPTIONS = [300, 600, 900, 1200, 1800, 2700, 3600, 5400, 7200] as const;
export const DEFAULT_MANUAL_DURATION = 1800;

function replaceSession(day: Day, session: GoalSession): void {
  const index = day.sessions.findIndex(existing => existing.id === session.id);
  if (index < 0) {
    throw new NotFoundError('session', session.id);
  }
  day.sessions[index] = session;
}

/**
 * Records [start, end] against the session's goal. Returns null and records
 * nothing when the span is empty or negative.
 */
export async function saveHistoricalSession(
  session: Pick<GoalSession, 'title' | 'goalId'>,
  day: Day,
  start: Date,
  end: Date,
  title: string = session.title
): Promise<HistoricalSession | null> {
  const duration = differenceInMilliseconds(end, start) / 1000;
  if (duration <= 0) {
    console.debug('Will not create historical session: duration is zero.');
    return null;
  }

  const historical: HistoricalSession = {
    id: crypto.randomUUID(),
    title,
    goalIds: [session.goalId],
    startDate: start,
    endDate: end,
    duration
  };

  addHistoricalSession(day, historical);
  await saveDay(day);
  return historical;
}

/**
 * Fills the rest of today's target starting at `now` and ticks off the checklist.
 */
export async function markGoalAsDone(goal: Goal, session: GoalSession, day: Day, now: Date = new Date()): Promise<HistoricalSession | null> {
  const { remainingTime } = sessionProgress(goal, day);

  let historical: HistoricalSession | null = null;
  if (remainingTime > 0) {
    const historicalEntry: HistoricalSession = {
      id: crypto.randomUUID(),
      title: session.title,
      goalIds: [goal.id],
      startDate: now,
      endDate: addSeconds(now, remainingTime),
      duration: remainingTime
    };
    addHistoricalSession(day, historicalEntry);
    historical = historicalEntry;
  }

  replaceSession(day, completeAllChecklistItems(session));
  await saveDay(day);
  return historical;
}

export async function logManualSession(
  goal: Goal,
  session: GoalSession,
  day: Day,
  start: Date,
  durationSeconds: number = DEFAULT_MANUAL_DURATION
): Promise<HistoricalSession> {
  if (durationSeconds <= 0) {
    throw new ValidationError('duration', 'Manual entries need a positive duration');
  }
  if (!isWithinDay(start, day)) {
    throw new ValidationError('start', `Start time must fall on ${day.id}`);
  }

  const historical = await saveHistoricalSession(
    session,
    day,
    start,
    addSeconds(start, durationSeconds),
    `${goal.title} - Manual Entry`
  );
  if (!historical) {
    throw new ValidationError('duration', 'Manual entries need a positive duration');
  }
  return historical;
}

export async function deleteHistoricalSession(day: Day, historicalSessionId: string): Promise<void> {
  const before = day.historicalSessions.length;
  day.historicalSessions = day.historicalSessions.filter(session => session.id !== historicalSessionId);
  if (day.historicalSessions.length === before) {
    throw new NotFoundError('session', historicalSessionId);
  }
  await saveDay(day);
}
