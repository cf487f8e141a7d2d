import type { SessionEntry, SessionFilter } from './sessionFilterService';
import { filterSessions } from './sessionFilterService';

export interface Highlight {
  start: number;
  end: number;
}

export interface SearchResult {
  entry: SessionEntry;
  score: number;
  highlights: Highlight[];
}

export interface SearchGroup {
  filter: SessionFilter;
  results: SearchResult[];
}

export function calculateFuzzyScore(query: string, content: string): number {
  const queryLower = query.toLowerCase();
  const contentLower = content.toLowerCase();

  // Substring matches beat scattered ones, and earlier matches score higher
  if (contentLower.includes(queryLower)) {
    const position = contentLower.indexOf(queryLower);
    return 100 - (position / contentLower.length) * 20;
  }

  let queryIndex = 0;
  for (let i = 0; i < contentLower.length && queryIndex < queryLower.length; i++) {
    if (contentLower[i] === queryLower[queryIndex]) {
      queryIndex++;
    }
  }

  // Only complete in-order matches count
  if (queryIndex < queryLower.length) return 0;
  return 80 * (queryLower.length / contentLower.length);
}

export function findHighlights(query: string, content: string): Highlight[] {
  const highlights: Highlight[] = [];
  const queryLower = query.toLowerCase();
  const contentLower = content.toLowerCase();
  if (!queryLower) return highlights;

  let startIndex = 0;
  while (true) {
    const index = contentLower.indexOf(queryLower, startIndex);
    if (index === -1) break;

    highlights.push({ start: index, end: index + query.length });
    startIndex = index + 1;
  }

  return highlights;
}

/**
 * Matches goal titles against the query and groups the hits by filter.
 * An empty query returns every session. Groups without hits are left out.
 */
export function searchSessions(query: string, entries: SessionEntry[], filters: SessionFilter[]): SearchGroup[] {
  const trimmed = query.trim();

  const scored = new Map<string, SearchResult>();
  for (const entry of entries) {
    const score = trimmed ? calculateFuzzyScore(trimmed, entry.goal.title) : 0;
    if (trimmed && score <= 0) continue;
    scored.set(entry.session.id, {
      entry,
      score,
      highlights: trimmed ? findHighlights(trimmed, entry.goal.title) : []
    });
  }

  const matching = entries.filter(entry => scored.has(entry.session.id));
  const groups: SearchGroup[] = [];
  for (const filter of filters) {
    const results = filterSessions(matching, filter)
      .map(entry => scored.get(entry.session.id))
      .filter((result): result is SearchResult => result !== undefined)
      .sort((a, b) => b.score - a.score);
    if (results.length > 0) {
      groups.push({ filter, results });
    }
  }
  return groups;
}
