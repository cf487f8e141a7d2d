import Dexie, { type Table } from 'dexie';
import type { Goal, GoalStatus, GoalTag } from './types';
import { predefinedSmartTags } from './tags';

const database = new Dexie('TempoGoalsDB') as Dexie & {
  goals: Table<Goal, string>;
  tags: Table<GoalTag, string>;
};

database.version(1).stores({
  goals: 'id, status, primaryTagId, createdAt',
  tags: 'id, title, themeId'
});

export const db = database;

function notifyGoalsChanged(goalId?: string): void {
  if (typeof window !== 'undefined') {
    window.dispatchEvent(new CustomEvent('goalsChanged', { detail: { goalId } }));
  }
}

export async function listGoals(status?: GoalStatus): Promise<Goal[]> {
  const goals = status
    ? await db.goals.where('status').equals(status).toArray()
    : await db.goals.toArray();
  return goals.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
}

export async function getGoal(id: string): Promise<Goal | undefined> {
  return db.goals.get(id);
}

export async function putGoal(goal: Goal): Promise<Goal> {
  const saved: Goal = { ...goal, updatedAt: new Date() };
  await db.goals.put(saved);
  notifyGoalsChanged(goal.id);
  return saved;
}

export async function deleteGoalRecord(id: string): Promise<void> {
  await db.goals.delete(id);
  notifyGoalsChanged(id);
}

export async function listTags(): Promise<GoalTag[]> {
  return db.tags.orderBy('title').toArray();
}

export async function getTag(id: string): Promise<GoalTag | undefined> {
  return db.tags.get(id);
}

export async function putTag(tag: GoalTag): Promise<void> {
  await db.tags.put(tag);
}

export async function deleteTag(id: string): Promise<void> {
  await db.tags.delete(id);
}

// Seeds the predefined smart tags the first time the database is used
export async function seedPredefinedTags(): Promise<number> {
  const tagCount = await db.tags.count();
  if (tagCount > 0) return 0;

  const tags = predefinedSmartTags();
  await db.tags.bulkPut(tags);
  return tags.length;
}
