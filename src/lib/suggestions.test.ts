import { describe, it, expect } from 'vitest';
import { findSuggestion, loadSuggestionCategories, parseSuggestionCategories, suggestionToGoal } from './suggestions';

describe('suggestions', () => {
  it('loads the bundled categories', () => {
    const categories = loadSuggestionCategories();
    expect(categories.map(category => category.id)).toContain('fitness');
    expect(findSuggestion('fitness-1')?.title).toBe('Morning Run');
    expect(findSuggestion('missing')).toBeUndefined();
  });

  it('skips malformed entries', () => {
    const categories = parseSuggestionCategories([
      { id: 'ok', name: 'Ok', icon: 'star', color: 'red', suggestions: [
        { id: 's1', title: 'Good', subtitle: '', duration: 60, theme: 'red', icon: 'star' },
        { id: 's2', title: 'No duration', subtitle: '', theme: 'red', icon: 'star' }
      ] },
      { id: 'broken' },
      'nonsense'
    ]);
    expect(categories).toHaveLength(1);
    expect(categories[0].suggestions.map(suggestion => suggestion.id)).toEqual(['s1']);
    expect(categories[0].suggestions[0].healthMetric).toBeNull();
    expect(parseSuggestionCategories({ not: 'a list' })).toEqual([]);
  });

  it('turns a suggestion into a goal that is not active yet', () => {
    const suggestion = findSuggestion('fitness-1');
    if (!suggestion) throw new Error('missing fixture suggestion');
    const goal = suggestionToGoal(suggestion, 'tag-outdoor-cardio');
    expect(goal).toMatchObject({ title: 'Morning Run', weeklyTarget: 9000, status: 'suggestion', primaryTagId: 'tag-outdoor-cardio' });
  });
});
