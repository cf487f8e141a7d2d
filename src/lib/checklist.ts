import type { ChecklistItem, ChecklistItemSession, Goal, GoalSession } from './types';
import { ValidationError } from './errors';

function sortedItems(items: ChecklistItem[]): ChecklistItem[] {
  return [...items].sort((a, b) => a.order - b.order);
}

export function addChecklistItem(goal: Goal, title: string): Goal {
  const trimmed = title.trim();
  if (!trimmed) {
    throw new ValidationError('title', 'Checklist item title cannot be empty');
  }

  const maxOrder = goal.checklistItems.length > 0
    ? Math.max(...goal.checklistItems.map(item => item.order))
    : -1;

  const item: ChecklistItem = {
    id: crypto.randomUUID(),
    title: trimmed,
    order: maxOrder + 1,
    createdAt: new Date()
  };
  return { ...goal, checklistItems: sortedItems([...goal.checklistItems, item]) };
}

export function renameChecklistItem(goal: Goal, itemId: string, title: string): Goal {
  const trimmed = title.trim();
  if (!trimmed) {
    throw new ValidationError('title', 'Checklist item title cannot be empty');
  }
  return {
    ...goal,
    checklistItems: goal.checklistItems.map(item => item.id === itemId ? { ...item, title: trimmed } : item)
  };
}

export function removeChecklistItem(goal: Goal, itemId: string): Goal {
  return { ...goal, checklistItems: goal.checklistItems.filter(item => item.id !== itemId) };
}

// Items missing from `itemIds` are dropped
export function reorderChecklistItems(goal: Goal, itemIds: string[]): Goal {
  const itemMap = new Map(goal.checklistItems.map(item => [item.id, item]));
  const reordered: ChecklistItem[] = [];
  itemIds.forEach(id => {
    const item = itemMap.get(id);
    if (item) {
      reordered.push({ ...item, order: reordered.length });
    }
  });
  return { ...goal, checklistItems: reordered };
}

export function createChecklistSession(items: ChecklistItem[]): ChecklistItemSession[] {
  return sortedItems(items).map(item => ({
    id: crypto.randomUUID(),
    checklistItemId: item.id,
    isCompleted: false
  }));
}

/**
 * Aligns a session's checklist with its goal: new goal items are added
 * unchecked, removed ones are dropped, and completion is preserved.
 */
export function syncSessionChecklist(goal: Goal, session: GoalSession): ChecklistItemSession[] {
  const existing = new Map(session.checklist.map(entry => [entry.checklistItemId, entry]));
  return sortedItems(goal.checklistItems).map(item => existing.get(item.id) ?? {
    id: crypto.randomUUID(),
    checklistItemId: item.id,
    isCompleted: false
  });
}

export function toggleChecklistItem(session: GoalSession, checklistItemId: string): GoalSession {
  return {
    ...session,
    checklist: session.checklist.map(entry =>
      entry.checklistItemId === checklistItemId ? { ...entry, isCompleted: !entry.isCompleted } : entry
    )
  };
}

export function completeAllChecklistItems(session: GoalSession): GoalSession {
  return {
    ...session,
    checklist: session.checklist.map(entry => ({ ...entry, isCompleted: true }))
  };
}

export function completedCount(session: GoalSession): number {
  return session.checklist.filter(entry => entry.isCompleted).length;
}

export function checklistProgress(session: GoalSession): number {
  if (session.checklist.length === 0) return 0;
  return completedCount(session) / session.checklist.length;
}
