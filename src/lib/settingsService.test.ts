import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_SETTINGS, settingsService } from './settingsService';
import { DEFAULT_PLANNER_PREFERENCES } from './planner/types';

describe('settingsService', () => {
  beforeEach(async () => {
    settingsService.clearCache();
    await settingsService.resetToDefaults();
    settingsService.clearCache();
  });

  it('starts from the defaults', async () => {
    const settings = await settingsService.getSettings();
    expect(settings.weekStartDay).toBe(DEFAULT_SETTINGS.weekStartDay);
    expect(settings.maxPlannedSessions).toBe(5);
    expect(settings.plannerPreferences).toEqual(DEFAULT_PLANNER_PREFERENCES);
  });

  it('persists partial updates', async () => {
    await settingsService.saveSettings({ weekStartDay: 0, availableTimeMinutes: 90 });
    settingsService.clearCache();

    const settings = await settingsService.getSettings();
    expect(settings.weekStartDay).toBe(0);
    expect(settings.availableTimeMinutes).toBe(90);
    expect(settings.unlimitedPlannedSessions).toBe(false);
  });

  it('merges planner preferences', async () => {
    await settingsService.savePlannerPreferences({ focusMode: 'deepWork' });
    const settings = await settingsService.savePlannerPreferences({ avoidEveningSessions: true });
    expect(settings.plannerPreferences).toEqual({
      ...DEFAULT_PLANNER_PREFERENCES,
      focusMode: 'deepWork',
      avoidEveningSessions: true
    });
  });

  it('resets everything', async () => {
    await settingsService.saveSettings({ selectedThemeIds: ['blue'], maxPlannedSessions: 2 });
    const settings = await settingsService.resetToDefaults();
    expect(settings.selectedThemeIds).toEqual([]);
    expect(settings.maxPlannedSessions).toBe(5);
  });
});
