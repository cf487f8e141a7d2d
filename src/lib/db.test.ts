import { describe, it, expect, beforeEach } from 'vitest';
import {
  addHistoricalSession,
  buildEmptyDay,
  clearDays,
  deleteDay,
  forceInMemoryStorage,
  getAllDays,
  getDay,
  getDaysInRange,
  getOrCreateDay,
  putDayRecords,
  saveDay
} from './db';
import { makeDay, makeGoal, makeHistorical } from '@/test/factories';

describe('day storage', () => {
  beforeEach(async () => {
    await clearDays();
  });

  it('returns null for a day that was never saved', async () => {
    expect(await getDay('2024-03-14')).toBeNull();
  });

  it('builds days keyed by local date', () => {
    const day = buildEmptyDay(new Date(2024, 2, 14, 15, 0));
    expect(day.id).toBe('2024-03-14');
    expect(day.start).toEqual(new Date(2024, 2, 14));
    expect(day.end).toEqual(new Date(2024, 2, 14, 23, 59, 59));
    expect(day.sessions).toEqual([]);
  });

  it('saves and reloads sessions and history', async () => {
    const goal = makeGoal();
    const day = makeDay(new Date(2024, 2, 14), [goal]);
    day.historicalSessions.push(makeHistorical([goal.id], new Date(2024, 2, 14, 9), 600));
    await saveDay(day);

    const loaded = await getDay('2024-03-14');
    expect(loaded?.sessions.map(session => session.goalId)).toEqual([goal.id]);
    expect(loaded?.historicalSessions[0].duration).toBe(600);
    expect(loaded?.historicalSessions[0].startDate).toEqual(new Date(2024, 2, 14, 9));
  });

  it('stamps updatedAt on save', async () => {
    const day = buildEmptyDay(new Date(2024, 2, 14));
    day.updatedAt = new Date(2000, 0, 1);
    await saveDay(day);
    expect(day.updatedAt.getFullYear()).toBeGreaterThan(2000);
  });

  it('creates a day only when missing', async () => {
    const created = await getOrCreateDay(new Date(2024, 2, 14, 8));
    const again = await getOrCreateDay(new Date(2024, 2, 14, 20));
    expect(again.id).toBe(created.id);
    expect(again.createdAt).toEqual(created.createdAt);
  });

  it('reads inclusive ranges in date order', async () => {
    for (const date of [16, 12, 14, 18]) {
      await saveDay(buildEmptyDay(new Date(2024, 2, date)));
    }
    const days = await getDaysInRange('2024-03-12', '2024-03-16');
    expect(days.map(day => day.id)).toEqual(['2024-03-12', '2024-03-14', '2024-03-16']);
    expect(await getAllDays()).toHaveLength(4);
  });

  it('writes imported records without restamping them', async () => {
    const day = buildEmptyDay(new Date(2024, 2, 14));
    day.updatedAt = new Date(2024, 2, 14, 22, 0);
    await putDayRecords([day]);
    expect((await getDay(day.id))?.updatedAt).toEqual(new Date(2024, 2, 14, 22, 0));
  });

  it('deletes a day', async () => {
    await saveDay(buildEmptyDay(new Date(2024, 2, 14)));
    await deleteDay('2024-03-14');
    expect(await getDay('2024-03-14')).toBeNull();
  });

  it('upserts history entries by id', () => {
    const day = buildEmptyDay(new Date(2024, 2, 14));
    const entry = makeHistorical(['goal-a'], new Date(2024, 2, 14, 9), 300);
    addHistoricalSession(day, entry);
    addHistoricalSession(day, { ...entry, duration: 450 });
    expect(day.historicalSessions).toHaveLength(1);
    expect(day.historicalSessions[0].duration).toBe(450);
  });
});

// Runs last: switching to memory cannot be undone for this module instance
describe('in-memory storage', () => {
  it('keeps working without IndexedDB and returns copies', async () => {
    forceInMemoryStorage();
    const day = buildEmptyDay(new Date(2024, 2, 20));
    await saveDay(day);

    const loaded = await getDay('2024-03-20');
    expect(loaded?.id).toBe('2024-03-20');
    expect(loaded).not.toBe(day);
    expect(await getDaysInRange('2024-03-19', '2024-03-21')).toHaveLength(1);
  });
});
