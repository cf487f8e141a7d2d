import type { Day, Goal, GoalSession, GoalTag } from './types';
import { elapsedTimeForGoal, sessionProgress, type SessionProgress } from './sessionProgress';
import type { DailyPlan, FocusMode } from './planner/types';
import { scoreSession } from './planner/scoring';

export type SessionFilter =
  | { kind: 'activeToday' }
  | { kind: 'allGoals' }
  | { kind: 'completedToday' }
  | { kind: 'skippedSessions' }
  | { kind: 'theme'; tag: GoalTag };

export interface SessionEntry {
  session: GoalSession;
  goal: Goal;
  primaryTag: GoalTag | null;
  progress: SessionProgress;
}

export type ScoreFn = (entry: SessionEntry) => number;

export interface ScoreInputs {
  now: Date;
  weekDays: Day[];
  focusMode: FocusMode;
  selectedThemeIds: string[];
}

export function createScoreFn(inputs: ScoreInputs): ScoreFn {
  return entry => scoreSession({
    goal: entry.goal,
    session: entry.session,
    now: inputs.now,
    weeklyElapsed: inputs.weekDays.reduce((total, day) => total + elapsedTimeForGoal(day, entry.goal.id), 0),
    dailyElapsed: entry.progress.elapsedTime,
    focusMode: inputs.focusMode,
    primaryTag: entry.primaryTag,
    selectedThemeIds: inputs.selectedThemeIds
  });
}

export const FIXED_FILTERS: SessionFilter[] = [
  { kind: 'activeToday' },
  { kind: 'allGoals' },
  { kind: 'completedToday' },
  { kind: 'skippedSessions' }
];

const RECOMMENDATION_COUNT = 3;
const MIN_SESSIONS_FOR_SCORED_RECOMMENDATIONS = 5;
const GLANCE_LIMIT = 10;

// Sessions whose goal no longer exists are left out
export function buildSessionEntries(day: Day, goals: Goal[], tags: GoalTag[]): SessionEntry[] {
  const goalsById = new Map(goals.map(goal => [goal.id, goal]));
  const entries: SessionEntry[] = [];
  for (const session of day.sessions) {
    const goal = goalsById.get(session.goalId);
    if (!goal) continue;
    entries.push({
      session,
      goal,
      primaryTag: tags.find(tag => tag.id === goal.primaryTagId) ?? null,
      progress: sessionProgress(goal, day)
    });
  }
  return entries;
}

export function filterId(filter: SessionFilter): string {
  return filter.kind === 'theme' ? `theme_${filter.tag.id}` : filter.kind;
}

export function filterText(filter: SessionFilter): string {
  switch (filter.kind) {
    case 'activeToday':
      return 'Today';
    case 'allGoals':
      return 'All';
    case 'completedToday':
      return 'Completed';
    case 'skippedSessions':
      return 'Skipped';
    case 'theme':
      return filter.tag.title;
  }
}

function isActiveToday(entry: SessionEntry): boolean {
  return entry.goal.status !== 'archived' && entry.session.status !== 'skipped';
}

export function matchesFilter(entry: SessionEntry, filter: SessionFilter): boolean {
  switch (filter.kind) {
    case 'activeToday':
      return isActiveToday(entry);
    case 'allGoals':
      return true;
    case 'completedToday':
      return entry.progress.hasMetDailyTarget;
    case 'skippedSessions':
      return entry.session.status === 'skipped';
    case 'theme':
      return isActiveToday(entry) && entry.primaryTag?.themeId === filter.tag.themeId;
  }
}

function plannedTime(entry: SessionEntry): number | null {
  return entry.session.plannedStartTime ? entry.session.plannedStartTime.getTime() : null;
}

// Planned sessions first in start order, then the rest by goal title
export function compareEntries(a: SessionEntry, b: SessionEntry): number {
  const aTime = plannedTime(a);
  const bTime = plannedTime(b);
  if (aTime !== null && bTime !== null) return aTime - bTime;
  if (aTime !== null) return -1;
  if (bTime !== null) return 1;
  return a.goal.title.localeCompare(b.goal.title);
}

export function filterSessions(entries: SessionEntry[], filter: SessionFilter): SessionEntry[] {
  return entries.filter(entry => matchesFilter(entry, filter)).sort(compareEntries);
}

export function countSessions(entries: SessionEntry[], filter: SessionFilter): number {
  return entries.filter(entry => matchesFilter(entry, filter)).length;
}

export function buildAvailableFilters(tags: GoalTag[]): SessionFilter[] {
  const seenThemes = new Set<string>();
  const themeFilters: SessionFilter[] = [];
  for (const tag of tags) {
    if (seenThemes.has(tag.themeId)) continue;
    seenThemes.add(tag.themeId);
    themeFilters.push({ kind: 'theme', tag });
  }
  return [...FIXED_FILTERS, ...themeFilters];
}

/**
 * Picks up to three sessions to highlight. In order of preference: planned
 * sessions that carry reasons, the plan's own top three, and, once there are
 * more than four sessions, the best scoring ones.
 */
export function getRecommendedSessions(
  entries: SessionEntry[],
  scoreFor: ScoreFn,
  plan?: DailyPlan | null
): SessionEntry[] {
  const candidates = entries.filter(isActiveToday);

  const planned = candidates
    .filter(entry => entry.session.plannedStartTime !== null && entry.session.recommendationReasons.length > 0)
    .sort(compareEntries);
  if (planned.length > 0) {
    return planned.slice(0, RECOMMENDATION_COUNT);
  }

  if (plan && plan.topThreeRecommendations.length > 0) {
    const fromPlan = plan.topThreeRecommendations
      .map(goalId => candidates.find(entry => entry.goal.id === goalId))
      .filter((entry): entry is SessionEntry => entry !== undefined);
    if (fromPlan.length > 0) {
      return fromPlan.slice(0, RECOMMENDATION_COUNT);
    }
  }

  if (entries.length < MIN_SESSIONS_FOR_SCORED_RECOMMENDATIONS) {
    return [];
  }

  return candidates
    .map(entry => ({ entry, score: scoreFor(entry) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, RECOMMENDATION_COUNT)
    .map(({ entry }) => entry);
}

// Recommended sessions first, then planned ones by time, then the rest by score
export function glanceList(
  entries: SessionEntry[],
  scoreFor: ScoreFn,
  plan?: DailyPlan | null
): SessionEntry[] {
  const recommended = getRecommendedSessions(entries, scoreFor, plan);
  const recommendedIds = new Set(recommended.map(entry => entry.session.id));

  const rest = entries
    .filter(entry => isActiveToday(entry) && !recommendedIds.has(entry.session.id))
    .map(entry => ({ entry, time: plannedTime(entry), score: scoreFor(entry) }))
    .sort((a, b) => {
      if (a.time !== null && b.time !== null) return a.time - b.time;
      if (a.time !== null) return -1;
      if (b.time !== null) return 1;
      return b.score - a.score;
    })
    .map(({ entry }) => entry);

  return [...recommended, ...rest].slice(0, GLANCE_LIMIT);
}

// Sessions due today that the glance list leaves out
export function glanceOverflow(entries: SessionEntry[], glance: SessionEntry[]): number {
  return Math.max(0, entries.filter(isActiveToday).length - glance.length);
}
