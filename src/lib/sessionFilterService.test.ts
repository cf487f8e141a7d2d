import { describe, it, expect } from 'vitest';
import {
  buildAvailableFilters,
  buildSessionEntries,
  compareEntries,
  countSessions,
  createScoreFn,
  filterId,
  filterSessions,
  filterText,
  getRecommendedSessions,
  glanceList,
  glanceOverflow,
  type SessionEntry
} from './sessionFilterService';
import type { DailyPlan } from './planner/types';
import type { Day, Goal, GoalTag } from './types';
import { makeDay, makeGoal, makeHistorical, sessionFor } from '@/test/factories';

const fitness: GoalTag = { id: 'tag-fitness', title: 'Fitness', themeId: 'green', requiresDaylight: false };
const outdoors: GoalTag = { id: 'tag-outdoors', title: 'Outdoors', themeId: 'green', requiresDaylight: true };
const books: GoalTag = { id: 'tag-books', title: 'Books', themeId: 'blue', requiresDaylight: false };

const titles = (entries: SessionEntry[]) => entries.map(entry => entry.goal.title);

function fixture(): { day: Day; goals: Goal[]; entries: () => SessionEntry[] } {
  const goals = [
    makeGoal({ title: 'Run', primaryTagId: fitness.id }),
    makeGoal({ title: 'Read', primaryTagId: books.id }),
    makeGoal({ title: 'Cook' }),
    makeGoal({ title: 'Draw', status: 'archived' })
  ];
  const day = makeDay(new Date(2024, 2, 14), goals);
  return { day, goals, entries: () => buildSessionEntries(day, goals, [fitness, books]) };
}

describe('buildSessionEntries', () => {
  it('pairs sessions with their goal, tag and progress', () => {
    const { day, goals } = fixture();
    day.historicalSessions.push(makeHistorical([goals[0].id], new Date(2024, 2, 14, 7), 1800));
    const [run] = buildSessionEntries(day, goals, [fitness, books]);
    expect(run.primaryTag).toBe(fitness);
    expect(run.progress.elapsedTime).toBe(1800);
  });

  it('leaves out sessions of deleted goals', () => {
    const { day, goals } = fixture();
    expect(titles(buildSessionEntries(day, goals.slice(1), []))).toEqual(['Read', 'Cook', 'Draw']);
  });
});

describe('filters', () => {
  it('names filters', () => {
    expect(filterId({ kind: 'activeToday' })).toBe('activeToday');
    expect(filterId({ kind: 'theme', tag: books })).toBe('theme_tag-books');
    expect(filterText({ kind: 'completedToday' })).toBe('Completed');
    expect(filterText({ kind: 'theme', tag: books })).toBe('Books');
  });

  it('adds one theme filter per theme', () => {
    const filters = buildAvailableFilters([fitness, outdoors, books]);
    expect(filters.map(filterId)).toEqual([
      'activeToday',
      'allGoals',
      'completedToday',
      'skippedSessions',
      'theme_tag-fitness',
      'theme_tag-books'
    ]);
  });

  it('hides archived and skipped sessions from today', () => {
    const { day, goals, entries } = fixture();
    sessionFor(day, goals[2]).status = 'skipped';

    expect(titles(filterSessions(entries(), { kind: 'activeToday' }))).toEqual(['Read', 'Run']);
    expect(titles(filterSessions(entries(), { kind: 'skippedSessions' }))).toEqual(['Cook']);
    expect(countSessions(entries(), { kind: 'allGoals' })).toBe(4);
  });

  it('selects completed sessions and theme members', () => {
    const { day, goals, entries } = fixture();
    day.historicalSessions.push(makeHistorical([goals[1].id], new Date(2024, 2, 14, 21), 3600));

    expect(titles(filterSessions(entries(), { kind: 'completedToday' }))).toEqual(['Read']);
    expect(titles(filterSessions(entries(), { kind: 'theme', tag: outdoors }))).toEqual(['Run']);
  });

  it('orders planned sessions by start time before the rest', () => {
    const { day, goals, entries } = fixture();
    sessionFor(day, goals[2]).plannedStartTime = new Date(2024, 2, 14, 11);
    sessionFor(day, goals[0]).plannedStartTime = new Date(2024, 2, 14, 9);

    expect(titles(entries().sort(compareEntries))).toEqual(['Run', 'Cook', 'Draw', 'Read']);
  });
});

describe('recommendations', () => {
  const emptyPlan: DailyPlan = { sessions: [], overallStrategy: '', topThreeRecommendations: [], recommendationReasoning: '' };

  it('prefers planned sessions with reasons', () => {
    const { day, goals, entries } = fixture();
    const cook = sessionFor(day, goals[2]);
    cook.plannedStartTime = new Date(2024, 2, 14, 18);
    cook.recommendationReasons = ['preferredTime'];

    expect(titles(getRecommendedSessions(entries(), () => 0, emptyPlan))).toEqual(['Cook']);
  });

  it('falls back to the plan\'s top three', () => {
    const { goals, entries } = fixture();
    const plan = { ...emptyPlan, topThreeRecommendations: [goals[1].id, goals[3].id, goals[0].id] };
    expect(titles(getRecommendedSessions(entries(), () => 0, plan))).toEqual(['Read', 'Run']);
  });

  it('scores only once there are enough sessions', () => {
    const { entries } = fixture();
    expect(getRecommendedSessions(entries(), () => 1)).toEqual([]);

    const goals = ['A', 'B', 'C', 'D', 'E'].map(title => makeGoal({ title }));
    const many = buildSessionEntries(makeDay(new Date(2024, 2, 14), goals), goals, []);
    const score = (entry: SessionEntry) => 'ABCDE'.indexOf(entry.goal.title);
    expect(titles(getRecommendedSessions(many, score))).toEqual(['E', 'D', 'C']);
  });

  it('lists recommendations first, then planned, then by score', () => {
    const goals = ['A', 'B', 'C', 'D', 'E', 'F'].map(title => makeGoal({ title }));
    const day = makeDay(new Date(2024, 2, 14), goals);
    sessionFor(day, goals[0]).plannedStartTime = new Date(2024, 2, 14, 15);
    const entries = buildSessionEntries(day, goals, []);
    const score = (entry: SessionEntry) => 'ABCDEF'.indexOf(entry.goal.title);

    expect(titles(glanceList(entries, score))).toEqual(['F', 'E', 'D', 'A', 'C', 'B']);
  });

  it('caps the list at ten and counts what it leaves out', () => {
    const goals = Array.from({ length: 12 }, (_, index) => makeGoal({ title: `Goal ${index + 1}` }));
    const day = makeDay(new Date(2024, 2, 14), goals);
    const entries = buildSessionEntries(day, goals, []);

    const glance = glanceList(entries, () => 0);
    expect(glance).toHaveLength(10);
    expect(glanceOverflow(entries, glance)).toBe(2);

    sessionFor(day, goals[0]).status = 'skipped';
    const withSkipped = buildSessionEntries(day, goals, []);
    expect(glanceOverflow(withSkipped, glanceList(withSkipped, () => 0))).toBe(1);
  });
});

describe('createScoreFn', () => {
  it('uses the week\'s tracked time', () => {
    const goal = makeGoal();
    const today = makeDay(new Date(2024, 2, 14), [goal]);
    const monday = makeDay(new Date(2024, 2, 11), [goal]);
    monday.historicalSessions.push(makeHistorical([goal.id], new Date(2024, 2, 11, 8), 12600));
    const [entry] = buildSessionEntries(today, [goal], []);

    const fresh = createScoreFn({ now: new Date(2024, 2, 14, 15), weekDays: [], focusMode: 'balanced', selectedThemeIds: [] });
    const halfway = createScoreFn({ now: new Date(2024, 2, 14, 15), weekDays: [monday], focusMode: 'balanced', selectedThemeIds: [] });
    expect(fresh(entry)).toBe(65);
    expect(halfway(entry)).toBe(45);
  });
});
