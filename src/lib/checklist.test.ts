import { describe, it, expect } from 'vitest';
import {
  addChecklistItem,
  checklistProgress,
  completeAllChecklistItems,
  completedCount,
  createChecklistSession,
  removeChecklistItem,
  renameChecklistItem,
  reorderChecklistItems,
  syncSessionChecklist,
  toggleChecklistItem
} from './checklist';
import { createSessionForGoal } from './weekStore';
import { ValidationError } from './errors';
import { makeGoal } from '@/test/factories';

describe('checklist', () => {
  it('appends trimmed items in order', () => {
    let goal = addChecklistItem(makeGoal(), '  Scales ');
    goal = addChecklistItem(goal, 'Chords');
    expect(goal.checklistItems.map(item => [item.title, item.order])).toEqual([
      ['Scales', 0],
      ['Chords', 1]
    ]);
  });

  it('rejects blank titles', () => {
    expect(() => addChecklistItem(makeGoal(), '   ')).toThrow(ValidationError);
    const goal = addChecklistItem(makeGoal(), 'Scales');
    expect(() => renameChecklistItem(goal, goal.checklistItems[0].id, '')).toThrow('Checklist item title cannot be empty');
  });

  it('renames, removes and reorders items', () => {
    let goal = addChecklistItem(addChecklistItem(makeGoal(), 'Scales'), 'Chords');
    const [scales, chords] = goal.checklistItems;

    goal = renameChecklistItem(goal, scales.id, 'Arpeggios');
    expect(goal.checklistItems[0].title).toBe('Arpeggios');

    goal = reorderChecklistItems(goal, [chords.id, scales.id]);
    expect(goal.checklistItems.map(item => [item.id, item.order])).toEqual([
      [chords.id, 0],
      [scales.id, 1]
    ]);

    goal = removeChecklistItem(goal, chords.id);
    expect(goal.checklistItems.map(item => item.id)).toEqual([scales.id]);
  });

  it('tracks completion on the session', () => {
    const goal = addChecklistItem(addChecklistItem(makeGoal(), 'Scales'), 'Chords');
    let session = createSessionForGoal(goal, { id: '2024-03-14' });
    expect(session.checklist).toHaveLength(2);
    expect(checklistProgress(session)).toBe(0);

    session = toggleChecklistItem(session, goal.checklistItems[1].id);
    expect(completedCount(session)).toBe(1);
    expect(checklistProgress(session)).toBe(0.5);

    session = completeAllChecklistItems(session);
    expect(checklistProgress(session)).toBe(1);
  });

  it('has no progress without items', () => {
    const session = createSessionForGoal(makeGoal(), { id: '2024-03-14' });
    expect(createChecklistSession([])).toEqual([]);
    expect(checklistProgress(session)).toBe(0);
  });

  it('keeps completion when syncing with an edited goal', () => {
    let goal = addChecklistItem(addChecklistItem(makeGoal(), 'Scales'), 'Chords');
    const [scales, chords] = goal.checklistItems;
    const session = toggleChecklistItem(createSessionForGoal(goal, { id: '2024-03-14' }), scales.id);

    goal = addChecklistItem(removeChecklistItem(goal, chords.id), 'Songs');
    const synced = syncSessionChecklist(goal, session);

    expect(synced.map(entry => entry.checklistItemId)).toEqual([scales.id, goal.checklistItems[1].id]);
    expect(synced.map(entry => entry.isCompleted)).toEqual([true, false]);
  });
});
