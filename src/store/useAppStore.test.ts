import { describe, it, expect, beforeEach } from 'vitest';
import { useAppStore } from './useAppStore';
import { db, putGoal } from '@/lib/database';
import { clearDays } from '@/lib/db';
import { settingsService } from '@/lib/settingsService';
import { sessionTimerManager } from '@/lib/sessionTimerManager';
import type { Goal } from '@/lib/types';
import { makeGoal } from '@/test/factories';

const at = (hour: number, minute = 0) => new Date(2024, 2, 14, hour, minute);

function currentDay() {
  const { day } = useAppStore.getState();
  if (!day) throw new Error('store has no day');
  return day;
}

describe('useAppStore', () => {
  let goal: Goal;

  beforeEach(async () => {
    sessionTimerManager.clearActiveSession();
    await db.goals.clear();
    await db.tags.clear();
    await clearDays();
    settingsService.clearCache();
    await settingsService.resetToDefaults();
    useAppStore.setState({ day: null, weekDays: [], goals: [], tags: [], plan: null, error: null });

    goal = makeGoal({ title: 'Run' });
    await putGoal(goal);
    await useAppStore.getState().initialize(at(7));
  });

  it('loads goals, seeds tags and prepares today', () => {
    const state = useAppStore.getState();
    expect(state.isLoading).toBe(false);
    expect(state.goals.map(loaded => loaded.id)).toEqual([goal.id]);
    expect(state.tags.length).toBeGreaterThan(0);
    expect(currentDay().id).toBe('2024-03-14');
    expect(currentDay().sessions.map(session => session.goalId)).toEqual([goal.id]);
    expect(state.plan?.sessions.map(planned => planned.id)).toEqual([goal.id]);
  });

  it('starts and stops the timer', async () => {
    const sessionId = currentDay().sessions[0].id;
    await useAppStore.getState().toggleTimer(sessionId, at(9));
    expect(sessionTimerManager.isActive(sessionId)).toBe(true);

    await useAppStore.getState().toggleTimer(sessionId, at(9, 10));
    expect(sessionTimerManager.activeSession).toBeNull();
    expect(currentDay().historicalSessions.map(session => session.duration)).toEqual([600]);
  });

  it('pauses without ending the session, then resumes', async () => {
    const sessionId = currentDay().sessions[0].id;
    await useAppStore.getState().toggleTimer(sessionId, at(9));
    await useAppStore.getState().pauseTimer(at(9, 10));

    expect(sessionTimerManager.isActive(sessionId)).toBe(true);
    expect(sessionTimerManager.isPaused(sessionId)).toBe(true);
    expect(currentDay().historicalSessions.map(session => session.duration)).toEqual([600]);

    useAppStore.getState().resumeTimer(at(9, 20));
    expect(sessionTimerManager.isPaused(sessionId)).toBe(false);

    await useAppStore.getState().stopTimer(at(9, 30));
    expect(sessionTimerManager.activeSession).toBeNull();
    expect(currentDay().historicalSessions.map(session => session.duration)).toEqual([600, 600]);
  });

  it('logs time by hand', async () => {
    const sessionId = currentDay().sessions[0].id;
    await useAppStore.getState().logManual(sessionId, at(6), 900);

    expect(currentDay().historicalSessions).toMatchObject([
      { title: 'Run - Manual Entry', goalIds: [goal.id], startDate: at(6), endDate: at(6, 15), duration: 900 }
    ]);
  });

  it('stops a running timer before marking the goal done', async () => {
    const sessionId = currentDay().sessions[0].id;
    await useAppStore.getState().toggleTimer(sessionId, at(9));
    await useAppStore.getState().markDone(sessionId, at(9, 20));

    expect(sessionTimerManager.activeSession).toBeNull();
    expect(currentDay().historicalSessions.map(session => session.duration)).toEqual([1200, 2400]);
  });

  it('skips sessions without touching the stored state object', async () => {
    const before = currentDay();
    await useAppStore.getState().skipSession(before.sessions[0].id);

    expect(before.sessions[0].status).toBe('active');
    expect(currentDay().sessions[0].status).toBe('skipped');
  });

  it('surfaces failures as an error message', async () => {
    await useAppStore.getState().toggleTimer('missing', at(9));
    expect(useAppStore.getState().error).toBe('No session found with id missing');

    useAppStore.getState().clearError();
    expect(useAppStore.getState().error).toBeNull();
  });
});
