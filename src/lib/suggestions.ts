import suggestionData from '@/data/goal-suggestions.json';
import type { Goal } from './types';
import { buildGoal } from './goalManager';

export interface GoalSuggestionTemplate {
  id: string;
  title: string;
  subtitle: string;
  duration: number; // minutes per week
  theme: string;
  healthMetric: string | null;
  icon: string;
}

export interface SuggestionCategory {
  id: string;
  name: string;
  icon: string;
  color: string;
  suggestions: GoalSuggestionTemplate[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseSuggestion(value: unknown): GoalSuggestionTemplate | null {
  if (!isRecord(value)) return null;
  const { id, title, subtitle, duration, theme, healthMetric, icon } = value;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    typeof subtitle !== 'string' ||
    typeof duration !== 'number' ||
    typeof theme !== 'string' ||
    typeof icon !== 'string'
  ) {
    return null;
  }
  return {
    id,
    title,
    subtitle,
    duration,
    theme,
    healthMetric: typeof healthMetric === 'string' ? healthMetric : null,
    icon
  };
}

export function parseSuggestionCategories(data: unknown): SuggestionCategory[] {
  if (!Array.isArray(data)) {
    console.warn('Goal suggestions are not a list; ignoring them');
    return [];
  }

  const categories: SuggestionCategory[] = [];
  for (const raw of data) {
    if (!isRecord(raw)) continue;
    const { id, name, icon, color, suggestions } = raw;
    if (typeof id !== 'string' || typeof name !== 'string' || typeof icon !== 'string' || typeof color !== 'string' || !Array.isArray(suggestions)) {
      console.warn('Skipping malformed goal suggestion category:', raw);
      continue;
    }
    categories.push({
      id,
      name,
      icon,
      color,
      suggestions: suggestions
        .map(parseSuggestion)
        .filter((suggestion): suggestion is GoalSuggestionTemplate => suggestion !== null)
    });
  }
  return categories;
}

let cachedCategories: SuggestionCategory[] | null = null;

export function loadSuggestionCategories(): SuggestionCategory[] {
  if (!cachedCategories) {
    cachedCategories = parseSuggestionCategories(suggestionData);
  }
  return cachedCategories;
}

export function findSuggestion(suggestionId: string): GoalSuggestionTemplate | undefined {
  return loadSuggestionCategories()
    .flatMap(category => category.suggestions)
    .find(suggestion => suggestion.id === suggestionId);
}

// The goal stays a suggestion until activated
export function suggestionToGoal(suggestion: GoalSuggestionTemplate, primaryTagId: string | null = null): Goal {
  return buildGoal({
    title: suggestion.title,
    weeklyTarget: suggestion.duration * 60,
    status: 'suggestion',
    primaryTagId
  });
}
