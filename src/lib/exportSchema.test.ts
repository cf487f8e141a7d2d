import { describe, it, expect } from 'vitest';
import { CURRENT_SCHEMA_VERSION, isExportData, validateExportSchema, type ExportData } from './exportSchema';
import { toExportDay, toExportGoal } from './dataImportExport';
import { makeDay, makeGoal } from '@/test/factories';

function minimalExport(overrides: Partial<ExportData> = {}): ExportData {
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    exportTimestamp: '2024-03-14T12:00:00.000Z',
    goals: [],
    tags: [],
    days: [],
    ...overrides
  };
}

describe('validateExportSchema', () => {
  it('rejects anything that is not an object', () => {
    expect(validateExportSchema([])).toEqual([
      { type: 'error', field: 'root', message: 'Export data must be a valid JSON object' }
    ]);
    expect(isExportData('text')).toBe(false);
  });

  it('accepts a minimal export and warns about missing settings', () => {
    const issues = validateExportSchema(minimalExport());
    expect(issues.map(issue => [issue.type, issue.field, issue.message])).toEqual([
      ['warning', 'settings', 'No settings in export; current settings will be kept']
    ]);
    expect(isExportData(minimalExport())).toBe(true);
  });

  it('warns about other schema versions', () => {
    const issues = validateExportSchema(minimalExport({ schemaVersion: '0.9.0' }));
    expect(issues[0]).toMatchObject({ type: 'warning', field: 'schemaVersion', value: '0.9.0' });
  });

  it('reports nested fields by path', () => {
    const goal = makeGoal();
    const data = {
      ...minimalExport(),
      goals: [{ ...toExportGoal(goal), title: '', weeklyTarget: 'lots' }],
      days: [{ ...toExportDay(makeDay(new Date(2024, 2, 14), [goal])), id: '14/03/2024' }]
    };

    const errors = validateExportSchema(data).filter(issue => issue.type === 'error');
    expect(errors.map(issue => [issue.field, issue.message])).toEqual([
      ['goals[0].title', 'Missing or invalid title'],
      ['goals[0].weeklyTarget', 'weeklyTarget must be a number'],
      ['days[0].id', 'Day id must be in YYYY-MM-DD format']
    ]);
    expect(isExportData(data)).toBe(false);
  });

  it('flags broken entries inside sessions', () => {
    const goal = makeGoal();
    const day = toExportDay(makeDay(new Date(2024, 2, 14), [goal]));
    const data = {
      ...minimalExport({ goals: [toExportGoal(goal)] }),
      days: [{ ...day, sessions: [{ ...day.sessions[0], status: 'paused' }], historicalSessions: 'none' }]
    };

    expect(validateExportSchema(data).filter(issue => issue.type === 'error').map(issue => issue.field)).toEqual([
      'days[0].sessions[0].status',
      'days[0].historicalSessions'
    ]);
  });

  it('warns about sessions whose goal is not in the file', () => {
    const goal = makeGoal();
    const data = minimalExport({ days: [toExportDay(makeDay(new Date(2024, 2, 14), [goal]))] });
    expect(validateExportSchema(data)).toContainEqual({
      type: 'warning',
      field: 'days.2024-03-14',
      message: `Session for unknown goal ${goal.id}`,
      value: goal.id
    });
    expect(isExportData(data)).toBe(true);
  });

  it('rejects settings that are not an object', () => {
    expect(validateExportSchema({ ...minimalExport(), settings: 'defaults' })).toContainEqual({
      type: 'error',
      field: 'settings',
      message: 'settings must be an object'
    });
  });
});
