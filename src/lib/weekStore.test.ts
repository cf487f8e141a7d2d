import { describe, it, expect, beforeEach } from 'vitest';
import { createSessionForGoal, fetchWeekDays, refreshGoals, skipSession, summarizeWeek, weekSummary } from './weekStore';
import { buildEmptyDay, clearDays, getDay, saveDay } from './db';
import { addChecklistItem } from './checklist';
import { settingsService } from './settingsService';
import { NotFoundError } from './errors';
import { makeDay, makeGoal, makeHistorical } from '@/test/factories';

describe('weekStore', () => {
  beforeEach(async () => {
    await clearDays();
    settingsService.clearCache();
    await settingsService.resetToDefaults();
  });

  it('creates an active session from the goal', () => {
    const goal = addChecklistItem(makeGoal({ title: 'Run' }), 'Stretch');
    const session = createSessionForGoal(goal, { id: '2024-03-14' });
    expect(session).toMatchObject({ goalId: goal.id, title: 'Run', dayId: '2024-03-14', status: 'active' });
    expect(session.checklist).toHaveLength(1);
    expect(session.plannedStartTime).toBeNull();
  });

  it('aligns sessions with the goal list', async () => {
    const kept = makeGoal({ title: 'Run' });
    const orphan = makeGoal({ title: 'Deleted' });
    const day = makeDay(new Date(2024, 2, 14), [kept, orphan]);

    const added = makeGoal({ title: 'Read' });
    const archived = makeGoal({ title: 'Old', status: 'archived' });
    await refreshGoals(day, [{ ...kept, title: 'Run outside' }, added, archived]);

    expect(day.sessions.map(session => session.title)).toEqual(['Run outside', 'Read']);
    const stored = await getDay('2024-03-14');
    expect(stored?.sessions.map(session => session.goalId)).toEqual([kept.id, added.id]);
  });

  it('toggles skipped status', async () => {
    const goal = makeGoal();
    const day = makeDay(new Date(2024, 2, 14), [goal]);
    const sessionId = day.sessions[0].id;

    expect((await skipSession(day, sessionId)).status).toBe('skipped');
    expect((await skipSession(day, sessionId)).status).toBe('active');
    await expect(skipSession(day, 'missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('loads the days of the current week', async () => {
    for (const date of [10, 11, 14, 17, 18]) {
      await saveDay(buildEmptyDay(new Date(2024, 2, date)));
    }
    const days = await fetchWeekDays(new Date(2024, 2, 14, 12));
    expect(days.map(day => day.id)).toEqual(['2024-03-11', '2024-03-14', '2024-03-17']);
  });

  it('sums tracked time per goal over the week', () => {
    const run = makeGoal({ title: 'Run', weeklyTarget: 7200 });
    const read = makeGoal({ title: 'Read', weeklyTarget: 3600 });
    const monday = makeDay(new Date(2024, 2, 11), [run, read]);
    const tuesday = makeDay(new Date(2024, 2, 12), [run, read]);
    monday.historicalSessions.push(makeHistorical([run.id], new Date(2024, 2, 11, 7), 1800));
    tuesday.historicalSessions.push(
      makeHistorical([run.id], new Date(2024, 2, 12, 7), 1800),
      makeHistorical([read.id], new Date(2024, 2, 12, 21), 5400)
    );

    expect(summarizeWeek([monday, tuesday], [run, read])).toEqual([
      { goalId: run.id, title: 'Run', trackedSeconds: 3600, weeklyTarget: 7200, progress: 0.5 },
      { goalId: read.id, title: 'Read', trackedSeconds: 5400, weeklyTarget: 3600, progress: 1 }
    ]);
  });

  it('summarises the stored days of the current week', async () => {
    const run = makeGoal({ title: 'Run', weeklyTarget: 7200 });
    const lastSunday = makeDay(new Date(2024, 2, 10), [run]);
    const monday = makeDay(new Date(2024, 2, 11), [run]);
    lastSunday.historicalSessions.push(makeHistorical([run.id], new Date(2024, 2, 10, 7), 1800));
    monday.historicalSessions.push(makeHistorical([run.id], new Date(2024, 2, 11, 7), 1800));
    await saveDay(lastSunday);
    await saveDay(monday);

    expect(await weekSummary([run], new Date(2024, 2, 14, 12))).toEqual([
      { goalId: run.id, title: 'Run', trackedSeconds: 1800, weeklyTarget: 7200, progress: 0.25 }
    ]);
  });
});
