import { addDays, addMinutes, setHours, startOfDay } from 'date-fns';
import type { DailyPlan, DailyPlanProvider, FocusMode, PlanCandidate, PlannedSession, PlanRequest } from './types';
import { FOCUS_MODE_DESCRIPTIONS } from './types';
import { REASON_LABELS } from './scoring';
import { formatClockTime, roundToPrecision } from '../date-utils';
import { formatHourMinute } from '../time-format';

const MAX_SESSION_MINUTES: Record<FocusMode, number> = {
  deepWork: 90,
  balanced: 45,
  flexible: 25
};

const MIN_SESSION_MINUTES = 5;
const DAY_START_HOUR = 8;
const EVENING_CUTOFF_HOUR = 18;
const MORNING_PREFERENCE_BONUS = 10;

function layoutWindow(request: PlanRequest): { start: Date; end: Date } {
  const { now, preferences } = request;
  const base = preferences.planningHorizon === 'nextDay' ? addDays(startOfDay(now), 1) : startOfDay(now);

  const start = preferences.planningHorizon === 'remainingDay'
    ? roundToPrecision(now, 300, 'up')
    : setHours(base, DAY_START_HOUR);

  const end = preferences.avoidEveningSessions
    ? setHours(base, EVENING_CUTOFF_HOUR)
    : addMinutes(addDays(base, 1), -1);

  return { start, end };
}

function rankCandidates(request: PlanRequest): PlanCandidate[] {
  const bonus = (candidate: PlanCandidate) =>
    request.preferences.preferMorningSessions && candidate.preferredTimes.includes('morning')
      ? MORNING_PREFERENCE_BONUS
      : 0;

  return request.candidates
    .filter(candidate => candidate.remainingSeconds > 0)
    .sort((a, b) => (b.score + bonus(b)) - (a.score + bonus(a)));
}

function reasoningFor(candidate: PlanCandidate): string {
  const remaining = `${formatHourMinute(candidate.remainingSeconds)} left today`;
  if (candidate.reasons.length === 0) {
    return remaining;
  }
  return `${candidate.reasons.map(reason => REASON_LABELS[reason]).join(', ')}; ${remaining}`;
}

/**
 * Lays out the highest scoring goals back to back, separated by the minimum
 * break, until the session cap, the time budget or the end of the window.
 */
export class HeuristicPlanProvider implements DailyPlanProvider {
  readonly name = 'heuristic';

  async generatePlan(request: PlanRequest): Promise<DailyPlan> {
    const { preferences } = request;
    const limit = Math.min(request.maxSessions, preferences.maxSessionsPerDay);
    const { start, end } = layoutWindow(request);

    const sessions: PlannedSession[] = [];
    let cursor = start;
    let budget = request.availableTimeMinutes;

    for (const candidate of rankCandidates(request)) {
      if (sessions.length >= limit || budget < MIN_SESSION_MINUTES) break;

      const needed = Math.ceil(candidate.remainingSeconds / 60);
      const duration = Math.min(
        Math.max(MIN_SESSION_MINUTES, Math.min(MAX_SESSION_MINUTES[preferences.focusMode], needed)),
        budget
      );
      const sessionEnd = addMinutes(cursor, duration);
      if (sessionEnd.getTime() > end.getTime()) break;

      sessions.push({
        id: candidate.goalId,
        goalTitle: candidate.title,
        recommendedStartTime: formatClockTime(cursor),
        suggestedDuration: duration,
        priority: Math.min(sessions.length + 1, 5),
        reasoning: reasoningFor(candidate)
      });

      budget -= duration;
      cursor = addMinutes(sessionEnd, preferences.minimumBreakMinutes);
    }

    const totalMinutes = sessions.reduce((total, session) => total + session.suggestedDuration, 0);
    const topThree = sessions.slice(0, 3);

    return {
      sessions,
      overallStrategy: sessions.length > 0
        ? `${FOCUS_MODE_DESCRIPTIONS[preferences.focusMode]}. ${sessions.length} session(s), ${formatHourMinute(totalMinutes * 60)} in total.`
        : 'Nothing left to plan: every goal has met its target for the day.',
      topThreeRecommendations: topThree.map(session => session.id),
      recommendationReasoning: topThree.map(session => `${session.goalTitle}: ${session.reasoning}`).join('\n')
    };
  }
}
