import { openDB, type DBSchema, type IDBPDatabase } from 'idb';
import type { Day, HistoricalSession } from './types';
import { dayBounds, formatDateKey } from './date-utils';

interface DayStoreSchema extends DBSchema {
  days: {
    key: string;
    value: Day;
    indexes: { updatedAt: Date };
  };
}

const DB_NAME = 'tempo-goals';
const DB_VERSION = 1;

let dbInstance: IDBPDatabase<DayStoreSchema> | null = null;
let isIndexedDBAvailable = true;
const fallbackStorage: Map<string, Day> = new Map();

export async function initDB(): Promise<IDBPDatabase<DayStoreSchema> | null> {
  try {
    dbInstance = await openDB<DayStoreSchema>(DB_NAME, DB_VERSION, {
      upgrade(db) {
        if (!db.objectStoreNames.contains('days')) {
          const dayStore = db.createObjectStore('days', {
            keyPath: 'id'
          });
          dayStore.createIndex('updatedAt', 'updatedAt');
        }
      },
    });
    return dbInstance;
  } catch (error) {
    console.warn('IndexedDB not available, falling back to in-memory storage:', error);
    isIndexedDBAvailable = false;
    return null;
  }
}

export function isDBAvailable(): boolean {
  return isIndexedDBAvailable;
}

// Test hook: forces the in-memory path
export function forceInMemoryStorage(): void {
  isIndexedDBAvailable = false;
  dbInstance = null;
}

function dispatchDayChanged(dayId: string): void {
  if (typeof window !== 'undefined') {
    window.dispatchEvent(new CustomEvent('dayDataChanged', { detail: { date: dayId } }));
  }
}

async function getConnection(): Promise<IDBPDatabase<DayStoreSchema> | null> {
  if (!isIndexedDBAvailable) return null;
  if (!dbInstance) {
    await initDB();
  }
  return dbInstance;
}

export async function getDay(id: string): Promise<Day | null> {
  try {
    const connection = await getConnection();
    if (!connection) {
      const day = fallbackStorage.get(id);
      return day ? structuredClone(day) : null;
    }
    return (await connection.get('days', id)) ?? null;
  } catch (error) {
    console.error('Error getting day:', error);
    const day = fallbackStorage.get(id);
    return day ? structuredClone(day) : null;
  }
}

export async function saveDay(day: Day): Promise<void> {
  day.updatedAt = new Date();

  try {
    const connection = await getConnection();
    if (!connection) {
      fallbackStorage.set(day.id, structuredClone(day));
    } else {
      await connection.put('days', day);
    }
  } catch (error) {
    console.error('Error saving day:', error);
    fallbackStorage.set(day.id, structuredClone(day));
  }

  dispatchDayChanged(day.id);
}

export function buildEmptyDay(date: Date): Day {
  const { start, end } = dayBounds(date);
  const now = new Date();
  return {
    id: formatDateKey(date),
    start,
    end,
    sessions: [],
    historicalSessions: [],
    createdAt: now,
    updatedAt: now
  };
}

export async function createEmptyDay(date: Date): Promise<Day> {
  const day = buildEmptyDay(date);
  await saveDay(day);
  return day;
}

export async function getOrCreateDay(date: Date): Promise<Day> {
  const id = formatDateKey(date);
  const existing = await getDay(id);
  if (existing) return existing;

  const day = await createEmptyDay(date);
  console.debug(`No existing day found for ${id}; created new one.`);
  return day;
}

// Inclusive on both keys
export async function getDaysInRange(startKey: string, endKey: string): Promise<Day[]> {
  try {
    const connection = await getConnection();
    if (!connection) {
      return [...fallbackStorage.values()]
        .filter(day => day.id >= startKey && day.id <= endKey)
        .map(day => structuredClone(day))
        .sort((a, b) => a.id.localeCompare(b.id));
    }
    return await connection.getAll('days', IDBKeyRange.bound(startKey, endKey));
  } catch (error) {
    console.error('Error getting days in range:', error);
    return [];
  }
}

export async function getAllDays(): Promise<Day[]> {
  try {
    const connection = await getConnection();
    if (!connection) {
      return [...fallbackStorage.values()]
        .map(day => structuredClone(day))
        .sort((a, b) => a.id.localeCompare(b.id));
    }
    return await connection.getAll('days');
  } catch (error) {
    console.error('Error getting all days:', error);
    return [];
  }
}

// Writes the records as given in one transaction; used by import
export async function putDayRecords(days: Day[]): Promise<void> {
  const connection = await getConnection();
  if (!connection) {
    days.forEach(day => fallbackStorage.set(day.id, structuredClone(day)));
    return;
  }

  const tx = connection.transaction('days', 'readwrite');
  await Promise.all([...days.map(day => tx.store.put(day)), tx.done]);
}

export async function deleteDay(id: string): Promise<void> {
  fallbackStorage.delete(id);
  const connection = await getConnection();
  if (connection) {
    await connection.delete('days', id);
  }
  dispatchDayChanged(id);
}

export async function clearDays(): Promise<void> {
  fallbackStorage.clear();
  const connection = await getConnection();
  if (connection) {
    await connection.clear('days');
  }
}

// Upserts by id so re-saving a segment never double counts it
export function addHistoricalSession(day: Day, session: HistoricalSession): void {
  const index = day.historicalSessions.findIndex(existing => existing.id === session.id);
  if (index >= 0) {
    day.historicalSessions[index] = session;
  } else {
    day.historicalSessions.push(session);
  }
}
