import { addDays, differenceInMilliseconds, subDays } from 'date-fns';
import type { Day, Goal, GoalSession, GoalTag, RecommendationReason } from '../types';
import type { DailyPlan, DailyPlanProvider, PlanCandidate } from './types';
import type { AppSettings } from '../settingsService';
import { settingsService } from '../settingsService';
import { HeuristicPlanProvider } from './heuristicProvider';
import { recommendationReasons, scoreSession } from './scoring';
import { getDaysInRange, getOrCreateDay, saveDay } from '../db';
import { createSessionForGoal } from '../weekStore';
import { elapsedTimeForGoal, sessionProgress } from '../sessionProgress';
import { formatDateKey, parseClockTime, weekBounds } from '../date-utils';
import { preferredTimesOfDay } from '../schedule';

const UNLIMITED_SESSION_CAP = 100;
const MINUTES_PER_SLOT = 30;
const AUTO_PLAN_INTERVAL_MS = 60 * 60 * 1000;
const HISTORY_LOOKBACK_DAYS = 14;

export function maxPlannableSessions(settings: Pick<AppSettings, 'maxPlannedSessions' | 'unlimitedPlannedSessions' | 'availableTimeMinutes'>): number {
  const cap = settings.unlimitedPlannedSessions ? UNLIMITED_SESSION_CAP : settings.maxPlannedSessions;
  return Math.min(cap, Math.max(1, Math.floor(settings.availableTimeMinutes / MINUTES_PER_SLOT)));
}

export function shouldAutoPlan(
  settings: Pick<AppSettings, 'lastPlanDateKey' | 'lastPlanGeneratedAt'>,
  dayKey: string,
  goals: Goal[],
  now: Date = new Date()
): boolean {
  if (settings.lastPlanDateKey === dayKey) return false;
  if (goals.length === 0) return false;
  if (settings.lastPlanGeneratedAt && differenceInMilliseconds(now, settings.lastPlanGeneratedAt) < AUTO_PLAN_INTERVAL_MS) {
    return false;
  }
  return true;
}

function clearPlanning(session: GoalSession): void {
  session.plannedStartTime = null;
  session.plannedDuration = null;
  session.plannedPriority = null;
  session.plannedReasoning = null;
  session.recommendationReasons = [];
}

/**
 * Writes a plan onto the day's sessions. Entries are matched to goals by id,
 * then by title; entries that match neither are skipped. Sessions left out of
 * the plan lose their planning details.
 */
export async function applyPlan(
  plan: DailyPlan,
  day: Day,
  goals: Goal[],
  reasons: Map<string, RecommendationReason[]> = new Map()
): Promise<Day> {
  const ordered = plan.sessions
    .map(entry => ({ entry, start: parseClockTime(entry.recommendedStartTime, day.start) }))
    .sort((a, b) => {
      if (a.start && b.start && a.start.getTime() !== b.start.getTime()) {
        return a.start.getTime() - b.start.getTime();
      }
      return a.entry.priority - b.entry.priority;
    });

  const planned = new Set<string>();
  for (const { entry, start } of ordered) {
    const goal = goals.find(candidate => candidate.id === entry.id)
      ?? goals.find(candidate => candidate.title === entry.goalTitle);
    if (!goal) {
      console.warn(`Skipping planned session for unknown goal "${entry.goalTitle}"`);
      continue;
    }

    let session = day.sessions.find(candidate => candidate.goalId === goal.id);
    if (!session) {
      session = createSessionForGoal(goal, day);
      day.sessions.push(session);
    }

    session.status = 'active';
    session.plannedStartTime = start;
    session.plannedDuration = entry.suggestedDuration;
    session.plannedPriority = entry.priority;
    session.plannedReasoning = entry.reasoning;
    session.recommendationReasons = reasons.get(goal.id) ?? [];
    planned.add(session.id);
  }

  day.sessions.filter(session => !planned.has(session.id)).forEach(clearPlanning);

  const covered = new Set(day.sessions.map(session => session.goalId));
  goals
    .filter(goal => goal.status === 'active' && !covered.has(goal.id))
    .forEach(goal => day.sessions.push(createSessionForGoal(goal, day)));

  await saveDay(day);
  return day;
}

export interface CandidateInputs {
  goals: Goal[];
  tags: GoalTag[];
  day: Day;
  weekDays: Day[];
  recentDays: Day[];
  settings: AppSettings;
  now: Date;
}

// With themes selected, only goals whose primary tag carries one of them are planned
function inSelectedThemes(goal: Goal, tags: GoalTag[], selectedThemeIds: string[]): boolean {
  if (selectedThemeIds.length === 0) return true;
  const primaryTag = tags.find(tag => tag.id === goal.primaryTagId);
  return primaryTag !== undefined && selectedThemeIds.includes(primaryTag.themeId);
}

export function buildCandidates(inputs: CandidateInputs): PlanCandidate[] {
  const { day, now, settings } = inputs;
  const recentHistory = inputs.recentDays.flatMap(recent => recent.historicalSessions);

  return inputs.goals
    .filter(goal => goal.status === 'active' && inSelectedThemes(goal, inputs.tags, settings.selectedThemeIds))
    .map(goal => {
      const session = day.sessions.find(candidate => candidate.goalId === goal.id);
      const weeklyElapsed = inputs.weekDays.reduce((total, weekDay) => total + elapsedTimeForGoal(weekDay, goal.id), 0);
      const progress = sessionProgress(goal, day);
      const context = {
        goal,
        session,
        now,
        weeklyElapsed,
        dailyElapsed: progress.elapsedTime,
        focusMode: settings.plannerPreferences.focusMode,
        primaryTag: inputs.tags.find(tag => tag.id === goal.primaryTagId) ?? null,
        selectedThemeIds: settings.selectedThemeIds,
        recentHistory
      };

      return {
        goalId: goal.id,
        title: goal.title,
        score: scoreSession(context),
        remainingSeconds: progress.remainingTime,
        weeklyProgress: goal.weeklyTarget > 0 ? Math.min(weeklyElapsed / goal.weeklyTarget, 1) : 0,
        reasons: recommendationReasons(context),
        preferredTimes: preferredTimesOfDay(goal)
      };
    });
}

export interface PlanResult {
  plan: DailyPlan;
  day: Day;
}

export class DailyPlanner {
  constructor(private readonly provider: DailyPlanProvider = new HeuristicPlanProvider()) {}

  async planDay(goals: Goal[], tags: GoalTag[], now: Date = new Date()): Promise<PlanResult> {
    const settings = await settingsService.getSettings();
    const targetDate = settings.plannerPreferences.planningHorizon === 'nextDay' ? addDays(now, 1) : now;

    const day = await getOrCreateDay(targetDate);
    const week = weekBounds(targetDate, settings.weekStartDay);
    const weekDays = await getDaysInRange(formatDateKey(week.start), formatDateKey(week.end));
    const recentDays = await getDaysInRange(formatDateKey(subDays(now, HISTORY_LOOKBACK_DAYS)), formatDateKey(now));

    const candidates = buildCandidates({ goals, tags, day, weekDays, recentDays, settings, now });
    const maxSessions = maxPlannableSessions(settings);
    const plan = await this.provider.generatePlan({
      now,
      candidates,
      // The settings cap replaces the per-day preference
      preferences: { ...settings.plannerPreferences, maxSessionsPerDay: maxSessions },
      maxSessions,
      availableTimeMinutes: settings.availableTimeMinutes
    });

    const reasons = new Map(candidates.map(candidate => [candidate.goalId, candidate.reasons]));
    const updated = await applyPlan(plan, day, goals, reasons);

    await settingsService.saveSettings({
      lastPlanGeneratedAt: now,
      lastPlanDateKey: day.id
    });
    console.debug(`Planned ${plan.sessions.length} session(s) for ${day.id} with ${this.provider.name} provider`);

    return { plan, day: updated };
  }

  async autoPlanIfNeeded(goals: Goal[], tags: GoalTag[], now: Date = new Date()): Promise<PlanResult | null> {
    const settings = await settingsService.getSettings();
    if (!shouldAutoPlan(settings, formatDateKey(now), goals, now)) {
      return null;
    }
    return this.planDay(goals, tags, now);
  }
}

export const dailyPlanner = new DailyPlanner();
