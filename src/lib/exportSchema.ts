import type { ChecklistItem, Day, Goal, GoalSession, GoalTag, HistoricalSession } from './types';
import type { AppSettings } from './settingsService';

export const CURRENT_SCHEMA_VERSION = '1.0.0';

export type ExportChecklistItem = Omit<ChecklistItem, 'createdAt'> & { createdAt: string };

export type ExportGoal = Omit<Goal, 'checklistItems' | 'createdAt' | 'updatedAt'> & {
  checklistItems: ExportChecklistItem[];
  createdAt: string;
  updatedAt: string;
};

export type ExportSession = Omit<GoalSession, 'plannedStartTime'> & { plannedStartTime: string | null };

export type ExportHistoricalSession = Omit<HistoricalSession, 'startDate' | 'endDate'> & {
  startDate: string;
  endDate: string;
};

export type ExportDay = Omit<Day, 'start' | 'end' | 'sessions' | 'historicalSessions' | 'createdAt' | 'updatedAt'> & {
  start: string;
  end: string;
  sessions: ExportSession[];
  historicalSessions: ExportHistoricalSession[];
  createdAt: string;
  updatedAt: string;
};

export type ExportSettings = Omit<AppSettings, 'lastPlanGeneratedAt' | 'createdAt' | 'updatedAt'> & {
  lastPlanGeneratedAt: string | null;
};

export interface ExportData {
  schemaVersion: string;
  exportTimestamp: string;
  goals: ExportGoal[];
  tags: GoalTag[];
  days: ExportDay[];
  settings?: ExportSettings;
}

export interface ValidationIssue {
  type: 'error' | 'warning';
  field: string;
  message: string;
  value?: unknown;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  error(field: string, message: string, value?: unknown): void {
    this.issues.push(value === undefined ? { type: 'error', field, message } : { type: 'error', field, message, value });
  }

  warning(field: string, message: string, value?: unknown): void {
    this.issues.push({ type: 'warning', field, message, value });
  }

  string(record: Fields, key: string, path: string, allowEmpty = false): void {
    const value = record[key];
    if (typeof value !== 'string' || (!allowEmpty && value.length === 0)) {
      this.error(join(path, key), `Missing or invalid ${key}`);
    }
  }

  number(record: Fields, key: string, path: string): void {
    const value = record[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.error(join(path, key), `${key} must be a number`);
    }
  }

  nullableNumber(record: Fields, key: string, path: string): void {
    if (record[key] !== null) this.number(record, key, path);
  }

  boolean(record: Fields, key: string, path: string): void {
    if (typeof record[key] !== 'boolean') {
      this.error(join(path, key), `${key} must be a boolean`);
    }
  }

  timestamp(record: Fields, key: string, path: string, nullable = false): void {
    const value = record[key];
    if (nullable && value === null) return;
    if (typeof value !== 'string') {
      this.error(join(path, key), `Missing or invalid ${key}`);
    } else if (isNaN(Date.parse(value))) {
      this.error(join(path, key), `Invalid ${key} format`, value);
    }
  }

  oneOf(record: Fields, key: string, path: string, allowed: readonly string[]): void {
    const value = record[key];
    if (typeof value !== 'string' || !allowed.includes(value)) {
      this.error(join(path, key), `${key} must be one of ${allowed.join(', ')}`, value);
    }
  }

  stringArray(record: Fields, key: string, path: string): void {
    const value = record[key];
    if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
      this.error(join(path, key), `${key} must be an array of strings`);
    }
  }

  // Runs the item validator for every entry of an array field
  each(record: Fields, key: string, path: string, validate: (item: Fields, itemPath: string) => void): void {
    const value = record[key];
    if (!Array.isArray(value)) {
      this.error(join(path, key), `${key} must be an array`);
      return;
    }
    value.forEach((item: unknown, index: number) => {
      const itemPath = `${join(path, key)}[${index}]`;
      if (!isRecord(item)) {
        this.error(itemPath, 'Entry must be an object');
        return;
      }
      validate(item, itemPath);
    });
  }
}

const GOAL_STATUSES = ['suggestion', 'active', 'archived'] as const;
const SESSION_STATUSES = ['suggestion', 'active', 'skipped'] as const;
const INTERVAL_KINDS = ['work', 'breakTime'] as const;
const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function validateGoal(issues: IssueCollector, goal: Fields, path: string): void {
  issues.string(goal, 'id', path);
  issues.string(goal, 'title', path);
  issues.oneOf(goal, 'status', path, GOAL_STATUSES);
  if (goal.primaryTagId !== null) issues.string(goal, 'primaryTagId', path);
  issues.stringArray(goal, 'otherTagIds', path);
  issues.number(goal, 'weeklyTarget', path);
  issues.boolean(goal, 'notificationsEnabled', path);
  issues.boolean(goal, 'scheduleNotificationsEnabled', path);
  issues.boolean(goal, 'completionNotificationsEnabled', path);
  if (!isRecord(goal.dayTimeSchedule)) {
    issues.error(join(path, 'dayTimeSchedule'), 'dayTimeSchedule must be an object');
  }
  issues.each(goal, 'checklistItems', path, (item, itemPath) => {
    issues.string(item, 'id', itemPath);
    issues.string(item, 'title', itemPath);
    issues.number(item, 'order', itemPath);
    issues.timestamp(item, 'createdAt', itemPath);
  });
  issues.each(goal, 'intervalLists', path, (list, listPath) => {
    issues.string(list, 'id', listPath);
    issues.string(list, 'name', listPath, true);
    issues.each(list, 'intervals', listPath, (interval, intervalPath) => {
      issues.string(interval, 'id', intervalPath);
      issues.string(interval, 'name', intervalPath, true);
      issues.number(interval, 'durationSeconds', intervalPath);
      issues.oneOf(interval, 'kind', intervalPath, INTERVAL_KINDS);
      issues.number(interval, 'orderIndex', intervalPath);
    });
  });
  issues.timestamp(goal, 'createdAt', path);
  issues.timestamp(goal, 'updatedAt', path);
}

function validateTag(issues: IssueCollector, tag: Fields, path: string): void {
  issues.string(tag, 'id', path);
  issues.string(tag, 'title', path);
  issues.string(tag, 'themeId', path);
  issues.boolean(tag, 'requiresDaylight', path);
}

function validateSession(issues: IssueCollector, session: Fields, path: string): void {
  issues.string(session, 'id', path);
  issues.string(session, 'goalId', path);
  issues.string(session, 'title', path, true);
  issues.string(session, 'dayId', path);
  issues.oneOf(session, 'status', path, SESSION_STATUSES);
  issues.each(session, 'checklist', path, (item, itemPath) => {
    issues.string(item, 'id', itemPath);
    issues.string(item, 'checklistItemId', itemPath);
    issues.boolean(item, 'isCompleted', itemPath);
  });
  issues.each(session, 'intervalLists', path, (list, listPath) => {
    issues.string(list, 'id', listPath);
    issues.string(list, 'listId', listPath);
    issues.each(list, 'intervals', listPath, (interval, intervalPath) => {
      issues.string(interval, 'id', intervalPath);
      issues.string(interval, 'intervalId', intervalPath);
      issues.number(interval, 'elapsedSeconds', intervalPath);
      issues.boolean(interval, 'isCompleted', intervalPath);
    });
  });
  issues.timestamp(session, 'plannedStartTime', path, true);
  issues.nullableNumber(session, 'plannedDuration', path);
  issues.nullableNumber(session, 'plannedPriority', path);
  if (session.plannedReasoning !== null) issues.string(session, 'plannedReasoning', path, true);
  issues.stringArray(session, 'recommendationReasons', path);
}

function validateDay(issues: IssueCollector, day: Fields, path: string): void {
  if (typeof day.id !== 'string') {
    issues.error(join(path, 'id'), 'Missing or invalid id');
  } else if (!DATE_KEY_PATTERN.test(day.id)) {
    issues.error(join(path, 'id'), 'Day id must be in YYYY-MM-DD format', day.id);
  }
  issues.timestamp(day, 'start', path);
  issues.timestamp(day, 'end', path);
  issues.each(day, 'sessions', path, (session, sessionPath) => validateSession(issues, session, sessionPath));
  issues.each(day, 'historicalSessions', path, (session, sessionPath) => {
    issues.string(session, 'id', sessionPath);
    issues.string(session, 'title', sessionPath, true);
    issues.stringArray(session, 'goalIds', sessionPath);
    issues.timestamp(session, 'startDate', sessionPath);
    issues.timestamp(session, 'endDate', sessionPath);
    issues.number(session, 'duration', sessionPath);
  });
  issues.timestamp(day, 'createdAt', path);
  issues.timestamp(day, 'updatedAt', path);
}

function validateSettings(issues: IssueCollector, settings: Fields): void {
  const path = 'settings';
  if (settings.weekStartDay !== 0 && settings.weekStartDay !== 1) {
    issues.error(join(path, 'weekStartDay'), 'weekStartDay must be 0 or 1', settings.weekStartDay);
  }
  issues.number(settings, 'maxPlannedSessions', path);
  issues.boolean(settings, 'unlimitedPlannedSessions', path);
  issues.number(settings, 'availableTimeMinutes', path);
  if (!isRecord(settings.plannerPreferences)) {
    issues.error(join(path, 'plannerPreferences'), 'plannerPreferences must be an object');
  }
  issues.stringArray(settings, 'selectedThemeIds', path);
  issues.timestamp(settings, 'lastPlanGeneratedAt', path, true);
  if (settings.lastPlanDateKey !== null) issues.string(settings, 'lastPlanDateKey', path);
}

export function validateExportSchema(data: unknown): ValidationIssue[] {
  const issues = new IssueCollector();

  if (!isRecord(data)) {
    issues.error('root', 'Export data must be a valid JSON object');
    return issues.issues;
  }

  if (typeof data.schemaVersion !== 'string' || !data.schemaVersion) {
    issues.error('schemaVersion', 'Missing or invalid schema version');
  } else if (data.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    issues.warning(
      'schemaVersion',
      `Schema version ${data.schemaVersion} may not be compatible with current version ${CURRENT_SCHEMA_VERSION}`,
      data.schemaVersion
    );
  }

  issues.timestamp(data, 'exportTimestamp', '');
  issues.each(data, 'goals', '', (goal, path) => validateGoal(issues, goal, path));
  issues.each(data, 'tags', '', (tag, path) => validateTag(issues, tag, path));
  issues.each(data, 'days', '', (day, path) => validateDay(issues, day, path));

  if (data.settings === undefined) {
    issues.warning('settings', 'No settings in export; current settings will be kept');
  } else if (!isRecord(data.settings)) {
    issues.error('settings', 'settings must be an object');
  } else {
    validateSettings(issues, data.settings);
  }

  // Sessions pointing at goals missing from the file still import, but orphaned
  if (Array.isArray(data.goals) && Array.isArray(data.days)) {
    const goalIds = new Set(data.goals.filter(isRecord).map(goal => goal.id));
    data.days.filter(isRecord).forEach(day => {
      if (!Array.isArray(day.sessions)) return;
      day.sessions.filter(isRecord).forEach(session => {
        if (typeof session.goalId === 'string' && !goalIds.has(session.goalId)) {
          issues.warning(`days.${String(day.id)}`, `Session for unknown goal ${session.goalId}`, session.goalId);
        }
      });
    });
  }

  return issues.issues;
}

export function isExportData(data: unknown): data is ExportData {
  return validateExportSchema(data).every(issue => issue.type !== 'error');
}
