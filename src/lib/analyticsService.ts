import { subDays, eachDayOfInterval } from 'date-fns';
import type { Day, Goal } from './types';
import { getDay, isDBAvailable } from './db';
import { formatDateKey, weekBounds } from './date-utils';
import { settingsService } from './settingsService';
import { sessionProgress } from './sessionProgress';
import { summarizeWeek, type GoalWeekSummary } from './weekStore';

export interface DayAnalytics {
  date: string;
  trackedSeconds: number;
  goalsTracked: number;
  goalsMet: number;
  completionRate: number; // percentage of tracked goals that met their daily target
  hasData: boolean;
}

export interface StreakInfo {
  currentStreak: number;
  longestStreak: number;
  streakStart: string | null;
  streakEnd: string | null;
}

export interface PeriodAnalytics {
  completionRate: number;
  totalDays: number;
  activeDays: number;
  trackedSeconds: number;
  streakInfo: StreakInfo;
}

export function analyzeDay(dateKey: string, day: Day | null, goals: Goal[]): DayAnalytics {
  const analytics: DayAnalytics = {
    date: dateKey,
    trackedSeconds: 0,
    goalsTracked: 0,
    goalsMet: 0,
    completionRate: 0,
    hasData: false
  };
  if (!day) return analytics;

  analytics.trackedSeconds = day.historicalSessions.reduce((sum, session) => sum + session.duration, 0);
  analytics.hasData = analytics.trackedSeconds > 0;

  const tracked = goals.filter(goal => goal.status !== 'archived' && day.sessions.some(session => session.goalId === goal.id));
  analytics.goalsTracked = tracked.length;
  analytics.goalsMet = tracked.filter(goal => sessionProgress(goal, day).hasMetDailyTarget).length;
  if (analytics.goalsTracked > 0) {
    analytics.completionRate = Math.round((analytics.goalsMet / analytics.goalsTracked) * 100);
  }
  return analytics;
}

// A streak day is one where at least one goal met its daily target
export function calculateStreak(dayAnalytics: DayAnalytics[]): StreakInfo {
  let longestStreak = 0;
  let run = 0;
  for (const day of dayAnalytics) {
    run = day.goalsMet > 0 ? run + 1 : 0;
    longestStreak = Math.max(longestStreak, run);
  }

  let currentStreak = 0;
  for (let i = dayAnalytics.length - 1; i >= 0 && dayAnalytics[i].goalsMet > 0; i--) {
    currentStreak++;
  }

  const last = dayAnalytics.length - 1;
  return {
    currentStreak,
    longestStreak,
    streakStart: currentStreak > 0 ? dayAnalytics[last - currentStreak + 1].date : null,
    streakEnd: currentStreak > 0 ? dayAnalytics[last].date : null
  };
}

class AnalyticsService {
  private cache = new Map<string, DayAnalytics>();
  private cacheExpiry = new Map<string, number>();
  private readonly CACHE_DURATION = 5 * 60 * 1000; // 5 minutes
  private listenersSetup = false;

  constructor() {
    this.setupListeners();
  }

  private setupListeners(): void {
    if (this.listenersSetup || typeof window === 'undefined') return;

    window.addEventListener('settingsChanged', () => this.clearCache());
    window.addEventListener('goalsChanged', () => this.clearCache());
    window.addEventListener('dayDataChanged', (event: Event) => {
      const date = event instanceof CustomEvent && typeof event.detail?.date === 'string' ? event.detail.date : undefined;
      this.clearCache(date);
    });

    this.listenersSetup = true;
  }

  async getDayAnalytics(date: Date, goals: Goal[]): Promise<DayAnalytics> {
    const dateKey = formatDateKey(date);
    const cached = this.getCachedAnalytics(dateKey);
    if (cached) {
      return cached;
    }

    try {
      const analytics = analyzeDay(dateKey, await getDay(dateKey), goals);
      this.setCachedAnalytics(dateKey, analytics);
      return analytics;
    } catch (error) {
      console.error('Error getting day analytics:', error);
      return analyzeDay(dateKey, null, goals);
    }
  }

  async getPeriodAnalytics(startDate: Date, endDate: Date, goals: Goal[]): Promise<PeriodAnalytics> {
    const days = eachDayOfInterval({ start: startDate, end: endDate });
    const dayAnalytics = await Promise.all(days.map(day => this.getDayAnalytics(day, goals)));

    const activeDays = dayAnalytics.filter(day => day.hasData);
    const rated = dayAnalytics.filter(day => day.goalsTracked > 0);
    const completionRate = rated.length > 0
      ? Math.round(rated.reduce((sum, day) => sum + day.completionRate, 0) / rated.length)
      : 0;

    return {
      completionRate,
      totalDays: days.length,
      activeDays: activeDays.length,
      trackedSeconds: dayAnalytics.reduce((sum, day) => sum + day.trackedSeconds, 0),
      streakInfo: calculateStreak(dayAnalytics)
    };
  }

  async getWeekAnalytics(date: Date, goals: Goal[]): Promise<PeriodAnalytics> {
    const settings = await settingsService.getSettings();
    const { start, end } = weekBounds(date, settings.weekStartDay);
    return this.getPeriodAnalytics(start, end, goals);
  }

  async getGoalWeekTotals(date: Date, goals: Goal[]): Promise<GoalWeekSummary[]> {
    const settings = await settingsService.getSettings();
    const { start, end } = weekBounds(date, settings.weekStartDay);
    const keys = eachDayOfInterval({ start, end }).map(formatDateKey);
    const days = await Promise.all(keys.map(key => getDay(key)));
    return summarizeWeek(days.filter((day): day is Day => day !== null), goals);
  }

  // Tracked minutes per day, oldest first
  async getSparklineData(date: Date, days: number, goals: Goal[]): Promise<number[]> {
    if (days <= 0) return [];
    const dateRange = eachDayOfInterval({ start: subDays(date, days - 1), end: date });
    const dayAnalytics = await Promise.all(dateRange.map(day => this.getDayAnalytics(day, goals)));
    return dayAnalytics.map(day => Math.round(day.trackedSeconds / 60));
  }

  private getCachedAnalytics(dateKey: string): DayAnalytics | null {
    const expiry = this.cacheExpiry.get(dateKey);
    if (expiry && Date.now() < expiry) {
      return this.cache.get(dateKey) ?? null;
    }

    this.cache.delete(dateKey);
    this.cacheExpiry.delete(dateKey);
    return null;
  }

  private setCachedAnalytics(dateKey: string, analytics: DayAnalytics): void {
    this.cache.set(dateKey, analytics);
    this.cacheExpiry.set(dateKey, Date.now() + this.CACHE_DURATION);
  }

  clearCache(dateKey?: string): void {
    if (dateKey) {
      this.cache.delete(dateKey);
      this.cacheExpiry.delete(dateKey);
    } else {
      this.cache.clear();
      this.cacheExpiry.clear();
    }
  }

  isAvailable(): boolean {
    return isDBAvailable();
  }
}

export const analyticsService = new AnalyticsService();
