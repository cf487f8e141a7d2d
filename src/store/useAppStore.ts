import { create } from 'zustand';
import type { Day, Goal, GoalSession, GoalTag } from '@/lib/types';
import type { DailyPlan } from '@/lib/planner/types';
import { listGoals, listTags, seedPredefinedTags } from '@/lib/database';
import { getDay } from '@/lib/db';
import { fetchCurrentDay, fetchWeekDays, refreshGoals, skipSession as skipDaySession } from '@/lib/weekStore';
import { logManualSession, markGoalAsDone } from '@/lib/goalStore';
import { sessionTimerManager } from '@/lib/sessionTimerManager';
import { dailyPlanner } from '@/lib/planner/dailyPlanner';
import { DEFAULT_SETTINGS, settingsService, type AppSettings } from '@/lib/settingsService';
import { NotFoundError, toError } from '@/lib/errors';

export type AppTab = 'today' | 'analytics' | 'settings';

interface AppState {
  day: Day | null;
  weekDays: Day[];
  goals: Goal[];
  tags: GoalTag[];
  plan: DailyPlan | null;
  settings: AppSettings;
  selectedFilterId: string;
  activeTab: AppTab;
  isSearchOpen: boolean;
  isLoading: boolean;
  error: string | null;
  initialize: (now?: Date) => Promise<void>;
  reloadDay: (now?: Date) => Promise<void>;
  reloadGoals: () => Promise<void>;
  toggleTimer: (sessionId: string, now?: Date) => Promise<void>;
  pauseTimer: (now?: Date) => Promise<void>;
  resumeTimer: (now?: Date) => void;
  stopTimer: (now?: Date) => Promise<void>;
  skipSession: (sessionId: string) => Promise<void>;
  markDone: (sessionId: string, now?: Date) => Promise<void>;
  logManual: (sessionId: string, start: Date, duration: number) => Promise<void>;
  planDay: (now?: Date) => Promise<void>;
  setSettings: (settings: AppSettings) => void;
  setSelectedFilterId: (filterId: string) => void;
  setActiveTab: (tab: AppTab) => void;
  setSearchOpen: (open: boolean) => void;
  clearError: () => void;
}

interface SessionContext {
  day: Day;
  session: GoalSession;
  goal: Goal;
}

export const useAppStore = create<AppState>((set, get) => {
  // Works on a copy so services never mutate the stored day
  const findContext = (sessionId: string): SessionContext => {
    const { day: current, goals } = get();
    if (!current) {
      throw new NotFoundError('day', 'today');
    }
    const day = structuredClone(current);
    const session = day.sessions.find(candidate => candidate.id === sessionId);
    if (!session) {
      throw new NotFoundError('session', sessionId);
    }
    const goal = goals.find(candidate => candidate.id === session.goalId);
    if (!goal) {
      throw new NotFoundError('goal', session.goalId);
    }
    return { day, session, goal };
  };

  // Failed actions surface through `error`; the UI shows it until dismissed
  const run = async (label: string, action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (error) {
      console.error(`Failed to ${label}:`, error);
      set({ error: toError(error).message });
    }
  };

  return {
    day: null,
    weekDays: [],
    goals: [],
    tags: [],
    plan: null,
    settings: DEFAULT_SETTINGS,
    selectedFilterId: 'activeToday',
    activeTab: 'today',
    isSearchOpen: false,
    isLoading: true,
    error: null,

    initialize: (now = new Date()) => run('initialize', async () => {
      set({ isLoading: true });
      const seeded = await seedPredefinedTags();
      if (seeded > 0) {
        console.debug(`Seeded ${seeded} predefined tags`);
      }

      const [goals, tags, settings] = await Promise.all([listGoals(), listTags(), settingsService.getSettings()]);
      let day = await refreshGoals(await fetchCurrentDay(now), goals);
      sessionTimerManager.loadTimerState(day, goals);

      const planned = await dailyPlanner.autoPlanIfNeeded(goals, tags, now);
      if (planned && planned.day.id === day.id) {
        day = planned.day;
      }

      set({
        day,
        goals,
        tags,
        settings,
        plan: planned?.plan ?? null,
        weekDays: await fetchWeekDays(now)
      });
    }).finally(() => set({ isLoading: false })),

    reloadDay: (now = new Date()) => run('reload day', async () => {
      const current = get().day;
      if (!current) return;
      const [day, weekDays] = await Promise.all([getDay(current.id), fetchWeekDays(now)]);
      set({ day: day ?? current, weekDays });
    }),

    reloadGoals: () => run('reload goals', async () => {
      const [goals, tags] = await Promise.all([listGoals(), listTags()]);
      const current = get().day;
      set({ goals, tags, day: current ? await refreshGoals(structuredClone(current), goals) : current });
    }),

    toggleTimer: (sessionId, now = new Date()) => run('toggle timer', async () => {
      const { day, session, goal } = findContext(sessionId);
      await sessionTimerManager.toggle(session, goal, day, now);
      await get().reloadDay(now);
    }),

    pauseTimer: (now = new Date()) => run('pause timer', async () => {
      await sessionTimerManager.pause(now);
      await get().reloadDay(now);
    }),

    resumeTimer: (now = new Date()) => sessionTimerManager.resume(now),

    stopTimer: (now = new Date()) => run('stop timer', async () => {
      await sessionTimerManager.stop(now);
      await get().reloadDay(now);
    }),

    skipSession: (sessionId) => run('skip session', async () => {
      const { day } = findContext(sessionId);
      await skipDaySession(day, sessionId);
      await get().reloadDay();
    }),

    markDone: (sessionId, now = new Date()) => run('mark goal as done', async () => {
      const { day, session, goal } = findContext(sessionId);
      if (sessionTimerManager.isActive(sessionId)) {
        await sessionTimerManager.stop(now);
      }
      const latest = (await getDay(day.id)) ?? day;
      await markGoalAsDone(goal, session, latest, now);
      await get().reloadDay(now);
    }),

    logManual: (sessionId, start, duration) => run('log manual session', async () => {
      const { day, session, goal } = findContext(sessionId);
      await logManualSession(goal, session, day, start, duration);
      await get().reloadDay();
    }),

    planDay: (now = new Date()) => run('plan day', async () => {
      const { goals, tags, day } = get();
      const result = await dailyPlanner.planDay(goals, tags, now);
      set({
        plan: result.plan,
        settings: await settingsService.getSettings(),
        day: day && result.day.id === day.id ? result.day : day
      });
    }),

    setSettings: (settings) => set({ settings }),
    setSelectedFilterId: (filterId) => set({ selectedFilterId: filterId }),
    setActiveTab: (tab) => set({ activeTab: tab }),
    setSearchOpen: (open) => set({ isSearchOpen: open }),
    clearError: () => set({ error: null }),
  };
});
