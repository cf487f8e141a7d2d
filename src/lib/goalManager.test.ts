import { describe, it, expect, beforeEach } from 'vitest';
import { activateSuggestion, buildGoal, createGoal, deleteGoal, duplicateGoal, toggleArchive, updateGoal } from './goalManager';
import { db, getGoal, listGoals } from './database';
import { clearDays, getDay, saveDay } from './db';
import { addChecklistItem } from './checklist';
import { createIntervalList } from './intervals';
import { SessionTimerManager } from './sessionTimerManager';
import { createMemoryTimerStateStore } from './timerStateStore';
import { NotFoundError, ValidationError } from './errors';
import { makeDay, makeHistorical, sessionFor } from '@/test/factories';

describe('goalManager', () => {
  beforeEach(async () => {
    await db.goals.clear();
    await clearDays();
  });

  it('validates and trims new goals', async () => {
    const goal = await createGoal({ title: '  Learn Spanish ', weeklyTarget: 3600 });
    expect(goal.title).toBe('Learn Spanish');
    expect(goal.status).toBe('active');
    expect((await getGoal(goal.id))?.title).toBe('Learn Spanish');

    expect(() => buildGoal({ title: ' ', weeklyTarget: 3600 })).toThrow(ValidationError);
    await expect(createGoal({ title: 'Run', weeklyTarget: 0 })).rejects.toThrow('Weekly target must be greater than zero');
  });

  it('updates goals', async () => {
    const goal = await createGoal({ title: 'Run', weeklyTarget: 3600 });
    await updateGoal({ ...goal, title: 'Run far ', weeklyTarget: 7200 });
    expect(await getGoal(goal.id)).toMatchObject({ title: 'Run far', weeklyTarget: 7200 });
  });

  it('archives, restores and filters by status', async () => {
    const goal = await createGoal({ title: 'Run', weeklyTarget: 3600 });
    await createGoal({ title: 'Read', weeklyTarget: 3600 });

    await toggleArchive(goal);
    expect((await listGoals('archived')).map(archived => archived.title)).toEqual(['Run']);
    expect((await listGoals('active')).map(active => active.title)).toEqual(['Read']);

    const restored = await toggleArchive({ ...goal, status: 'archived' });
    expect(restored.status).toBe('active');
  });

  it('activates suggestions', async () => {
    const suggestion = await createGoal({ title: 'Stretch', weeklyTarget: 3600, status: 'suggestion' });
    expect((await activateSuggestion(suggestion.id)).status).toBe('active');
    await expect(activateSuggestion('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('duplicates with fresh ids', async () => {
    const base = await createGoal({ title: 'Guitar', weeklyTarget: 3600, dayTimeSchedule: { 2: ['evening'] } });
    const withParts = { ...addChecklistItem(base, 'Scales'), intervalLists: [createIntervalList('Drills', [{ name: 'Play', durationSeconds: 60, kind: 'work' }])] };

    const copy = await duplicateGoal(withParts);
    expect(copy.title).toBe('Guitar (Copy)');
    expect(copy.id).not.toBe(base.id);
    expect(copy.dayTimeSchedule).toEqual({ 2: ['evening'] });
    expect(copy.checklistItems[0].title).toBe('Scales');
    expect(copy.checklistItems[0].id).not.toBe(withParts.checklistItems[0].id);
    expect(copy.intervalLists[0].id).not.toBe(withParts.intervalLists[0].id);
  });

  it('deletes a goal with its sessions, history links and running timer', async () => {
    const run = await createGoal({ title: 'Run', weeklyTarget: 3600 });
    const read = await createGoal({ title: 'Read', weeklyTarget: 3600 });
    const day = makeDay(new Date(2024, 2, 14), [run, read]);
    const solo = makeHistorical([run.id], new Date(2024, 2, 14, 7), 600);
    const shared = makeHistorical([run.id, read.id], new Date(2024, 2, 14, 8), 300);
    day.historicalSessions.push(solo, shared);
    await saveDay(day);

    const manager = new SessionTimerManager({ stateStore: createMemoryTimerStateStore(), tick: false });
    await manager.start(sessionFor(day, run), run, day, new Date(2024, 2, 14, 9));

    await deleteGoal(run, manager);

    expect(manager.activeSession).toBeNull();
    expect(await getGoal(run.id)).toBeUndefined();
    const stored = await getDay(day.id);
    expect(stored?.sessions.map(session => session.goalId)).toEqual([read.id]);
    expect(stored?.historicalSessions.map(session => [session.id, session.goalIds])).toEqual([[shared.id, [read.id]]]);
  });
});
