import { subDays } from 'date-fns';
import type { Goal, GoalSession, GoalTag, HistoricalSession, RecommendationReason } from '../types';
import type { FocusMode } from './types';
import { timeOfDay, weekdayId } from '../date-utils';
import { timesForWeekday } from '../schedule';
import { dailyTarget } from '../sessionProgress';

export interface ScoringContext {
  goal: Goal;
  session?: Pick<GoalSession, 'plannedStartTime'>;
  now: Date;
  weeklyElapsed: number; // seconds tracked this week
  dailyElapsed: number; // seconds tracked today
  focusMode: FocusMode;
  primaryTag?: GoalTag | null;
  selectedThemeIds?: string[];
  recentHistory?: HistoricalSession[];
}

export const REASON_LABELS: Record<RecommendationReason, string> = {
  weeklyProgress: 'Behind on this week',
  quickFinish: 'Almost done for today',
  preferredTime: 'Scheduled for now',
  energyLevel: 'Good energy window',
  plannedTheme: 'Matches your focus themes',
  usualTime: 'You usually do this now'
};

const USUAL_TIME_LOOKBACK_DAYS = 14;
const USUAL_TIME_WINDOW_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;
const USUAL_TIME_MIN_SESSIONS = 3;

export function weeklyPercent(goal: Goal, weeklyElapsed: number): number {
  if (goal.weeklyTarget <= 0) return 100;
  return (weeklyElapsed / goal.weeklyTarget) * 100;
}

export function matchesPreferredTime(goal: Goal, now: Date): boolean {
  return timesForWeekday(goal.dayTimeSchedule, weekdayId(now)).includes(timeOfDay(now));
}

function plannedTimeBonus(session: ScoringContext['session'], now: Date): number {
  if (!session?.plannedStartTime) return 0;

  const minutes = Math.abs(session.plannedStartTime.getTime() - now.getTime()) / 60000;
  if (minutes <= 15) return 25;
  if (minutes <= 30) return 20;
  if (minutes <= 60) return 10;
  if (minutes <= 120) return 5;
  return 0;
}

function focusModeBonus(goal: Goal, focusMode: FocusMode): number {
  const targetMinutes = goal.weeklyTarget / 60;
  switch (focusMode) {
    case 'deepWork':
      return Math.min(20, targetMinutes / 50);
    case 'flexible':
      return Math.max(0, 20 - targetMinutes / 50);
    default:
      return 10;
  }
}

/**
 * Higher scores mean the session is a better fit for `now`. The parts are
 * progress (up to 40), time of day (30, or 15 with no schedule), focus mode
 * (up to 20), closeness to the planned start (up to 25) and notifications (10).
 */
export function scoreSession(context: ScoringContext): number {
  const { goal, now } = context;
  let score = Math.max(0, 40 * (1 - weeklyPercent(goal, context.weeklyElapsed) / 100));

  const scheduledToday = timesForWeekday(goal.dayTimeSchedule, weekdayId(now));
  if (scheduledToday.length > 0) {
    score += matchesPreferredTime(goal, now) ? 30 : 0;
  } else {
    score += 15;
  }

  score += focusModeBonus(goal, context.focusMode);
  score += plannedTimeBonus(context.session, now);

  if (goal.notificationsEnabled) {
    score += 10;
  }
  return score;
}

// Sessions of this goal that started within an hour of now's clock time, over the last two weeks
function usualTimeMatches(goal: Goal, now: Date, history: HistoricalSession[]): number {
  const cutoff = subDays(now, USUAL_TIME_LOOKBACK_DAYS).getTime();
  const nowOffset = now.getHours() * 3600000 + now.getMinutes() * 60000;

  return history.filter(session => {
    if (!session.goalIds.includes(goal.id)) return false;
    const started = session.startDate.getTime();
    if (started < cutoff || started > now.getTime()) return false;

    const offset = session.startDate.getHours() * 3600000 + session.startDate.getMinutes() * 60000;
    // Clock distance wraps at midnight
    const distance = Math.abs(offset - nowOffset);
    return Math.min(distance, DAY_MS - distance) <= USUAL_TIME_WINDOW_MS;
  }).length;
}

export function recommendationReasons(context: ScoringContext): RecommendationReason[] {
  const { goal, now } = context;
  const reasons: RecommendationReason[] = [];

  if (context.weeklyElapsed < goal.weeklyTarget * 0.5 && weekdayId(now) >= 4) {
    reasons.push('weeklyProgress');
  }

  const target = dailyTarget(goal);
  const remaining = target - context.dailyElapsed;
  if (remaining > 0 && remaining < target * 0.25) {
    reasons.push('quickFinish');
  }

  if (matchesPreferredTime(goal, now)) {
    reasons.push('preferredTime');
  }

  const hour = now.getHours();
  if ((hour >= 6 && hour <= 9) || (hour >= 13 && hour <= 15)) {
    reasons.push('energyLevel');
  }

  if (context.primaryTag && context.selectedThemeIds?.includes(context.primaryTag.themeId)) {
    reasons.push('plannedTheme');
  }

  if (context.recentHistory && usualTimeMatches(goal, now, context.recentHistory) >= USUAL_TIME_MIN_SESSIONS) {
    reasons.push('usualTime');
  }

  return reasons;
}
