import { db as goalsDB } from './database';
import { getAllDays, getDay, putDayRecords } from './db';
import { settingsService, type AppSettings } from './settingsService';
import { analyticsService } from './analyticsService';
import type { Day, Goal, GoalTag } from './types';
import { PersistenceError, ValidationError, toError } from './errors';
import {
  CURRENT_SCHEMA_VERSION,
  validateExportSchema,
  type ExportData,
  type ExportDay,
  type ExportGoal,
  type ExportSettings,
  type ValidationIssue
} from './exportSchema';

export interface RecordChanges<T> {
  new: number;
  overwritten: number;
  unchanged: number;
  examples: {
    new: T[];
    overwritten: T[];
    unchanged: T[];
  };
}

export interface ImportSummary {
  goals: RecordChanges<ExportGoal>;
  tags: RecordChanges<GoalTag>;
  days: RecordChanges<ExportDay>;
  totalRecords: number;
  validationErrors: ValidationIssue[];
}

export interface ImportProgress {
  phase: 'validating' | 'analyzing' | 'importing';
  completed: number;
  total: number;
  message: string;
}

export type ImportProgressCallback = (progress: ImportProgress) => void;

const EXAMPLE_LIMIT = 3;

export function toExportGoal(goal: Goal): ExportGoal {
  return {
    ...goal,
    checklistItems: goal.checklistItems.map(item => ({ ...item, createdAt: item.createdAt.toISOString() })),
    createdAt: goal.createdAt.toISOString(),
    updatedAt: goal.updatedAt.toISOString()
  };
}

export function fromExportGoal(goal: ExportGoal): Goal {
  return {
    ...goal,
    checklistItems: goal.checklistItems.map(item => ({ ...item, createdAt: new Date(item.createdAt) })),
    createdAt: new Date(goal.createdAt),
    updatedAt: new Date(goal.updatedAt)
  };
}

export function toExportDay(day: Day): ExportDay {
  return {
    ...day,
    start: day.start.toISOString(),
    end: day.end.toISOString(),
    sessions: day.sessions.map(session => ({
      ...session,
      plannedStartTime: session.plannedStartTime ? session.plannedStartTime.toISOString() : null
    })),
    historicalSessions: day.historicalSessions.map(session => ({
      ...session,
      startDate: session.startDate.toISOString(),
      endDate: session.endDate.toISOString()
    })),
    createdAt: day.createdAt.toISOString(),
    updatedAt: day.updatedAt.toISOString()
  };
}

export function fromExportDay(day: ExportDay): Day {
  return {
    ...day,
    start: new Date(day.start),
    end: new Date(day.end),
    sessions: day.sessions.map(session => ({
      ...session,
      plannedStartTime: session.plannedStartTime ? new Date(session.plannedStartTime) : null
    })),
    historicalSessions: day.historicalSessions.map(session => ({
      ...session,
      startDate: new Date(session.startDate),
      endDate: new Date(session.endDate)
    })),
    createdAt: new Date(day.createdAt),
    updatedAt: new Date(day.updatedAt)
  };
}

function toExportSettings(settings: AppSettings): ExportSettings {
  const { createdAt, updatedAt, ...rest } = settings;
  return {
    ...rest,
    lastPlanGeneratedAt: settings.lastPlanGeneratedAt ? settings.lastPlanGeneratedAt.toISOString() : null
  };
}

function fromExportSettings(settings: ExportSettings): Partial<AppSettings> {
  return {
    ...settings,
    lastPlanGeneratedAt: settings.lastPlanGeneratedAt ? new Date(settings.lastPlanGeneratedAt) : null
  };
}

export async function exportAllData(now: Date = new Date()): Promise<ExportData> {
  const [goals, tags, days, settings] = await Promise.all([
    goalsDB.goals.toArray(),
    goalsDB.tags.toArray(),
    getAllDays(),
    settingsService.getSettings()
  ]);

  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    exportTimestamp: now.toISOString(),
    goals: goals.map(toExportGoal),
    tags,
    days: days.map(toExportDay),
    settings: toExportSettings(settings)
  };
}

export function downloadExportFile(data: ExportData, filename?: string): void {
  const jsonString = JSON.stringify(data, null, 2);
  const blob = new Blob([jsonString], { type: 'application/json' });
  const url = URL.createObjectURL(blob);

  const link = document.createElement('a');
  link.href = url;
  link.download = filename || `tempo-goals-export-${new Date().toISOString().split('T')[0]}.json`;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);

  URL.revokeObjectURL(url);
}

function emptyChanges<T>(): RecordChanges<T> {
  return { new: 0, overwritten: 0, unchanged: 0, examples: { new: [], overwritten: [], unchanged: [] } };
}

function record<T>(changes: RecordChanges<T>, kind: 'new' | 'overwritten' | 'unchanged', item: T): void {
  changes[kind]++;
  if (changes.examples[kind].length < EXAMPLE_LIMIT) {
    changes.examples[kind].push(item);
  }
}

// Records compare in their exported form so dates match as strings
function classify<T>(existing: T | undefined, imported: T): 'new' | 'overwritten' | 'unchanged' {
  if (existing === undefined) return 'new';
  return JSON.stringify(existing) === JSON.stringify(imported) ? 'unchanged' : 'overwritten';
}

export async function analyzeImport(importData: ExportData): Promise<ImportSummary> {
  const validationErrors = validateExportSchema(importData);

  const existingGoals = new Map((await goalsDB.goals.toArray()).map(goal => [goal.id, toExportGoal(goal)]));
  const goals = emptyChanges<ExportGoal>();
  for (const goal of importData.goals) {
    record(goals, classify(existingGoals.get(goal.id), goal), goal);
  }

  const existingTags = new Map((await goalsDB.tags.toArray()).map(tag => [tag.id, tag]));
  const tags = emptyChanges<GoalTag>();
  for (const tag of importData.tags) {
    record(tags, classify(existingTags.get(tag.id), tag), tag);
  }

  const days = emptyChanges<ExportDay>();
  for (const day of importData.days) {
    const existing = await getDay(day.id);
    record(days, classify(existing ? toExportDay(existing) : undefined, day), day);
  }

  return {
    goals,
    tags,
    days,
    totalRecords: importData.goals.length + importData.tags.length + importData.days.length,
    validationErrors
  };
}

export async function importData(
  data: ExportData,
  onProgress?: ImportProgressCallback
): Promise<void> {
  onProgress?.({
    phase: 'validating',
    completed: 0,
    total: 100,
    message: 'Validating import data...'
  });

  const criticalErrors = validateExportSchema(data).filter(issue => issue.type === 'error');
  if (criticalErrors.length > 0) {
    throw new ValidationError(
      criticalErrors[0].field,
      `Validation failed: ${criticalErrors.map(issue => issue.message).join(', ')}`
    );
  }

  onProgress?.({
    phase: 'validating',
    completed: 100,
    total: 100,
    message: 'Validation complete'
  });

  const totalItems = data.goals.length + data.tags.length + data.days.length;
  let completed = 0;

  try {
    onProgress?.({
      phase: 'importing',
      completed,
      total: totalItems,
      message: 'Importing days...'
    });

    await putDayRecords(data.days.map(fromExportDay));
    completed += data.days.length;

    onProgress?.({
      phase: 'importing',
      completed,
      total: totalItems,
      message: `Importing goals and tags... (${completed}/${totalItems})`
    });

    await goalsDB.transaction('rw', goalsDB.goals, goalsDB.tags, async () => {
      await goalsDB.tags.bulkPut(data.tags);
      await goalsDB.goals.bulkPut(data.goals.map(fromExportGoal));
    });
    completed += data.goals.length + data.tags.length;

    if (data.settings) {
      await settingsService.saveSettings(fromExportSettings(data.settings));
    }
  } catch (error) {
    throw new PersistenceError('import did not complete', toError(error));
  }

  analyticsService.clearCache();

  if (typeof window !== 'undefined') {
    window.dispatchEvent(new CustomEvent('dayDataChanged'));
    window.dispatchEvent(new CustomEvent('goalsChanged'));
  }

  onProgress?.({
    phase: 'importing',
    completed: totalItems,
    total: totalItems,
    message: 'Import complete'
  });
}
