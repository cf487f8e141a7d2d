import { openDB, type IDBPDatabase } from 'idb';
import { DEFAULT_PLANNER_PREFERENCES, type PlannerPreferences } from './planner/types';
import { PersistenceError, toError } from './errors';

export interface AppSettings {
  weekStartDay: 0 | 1; // 0 = Sunday, 1 = Monday
  maxPlannedSessions: number;
  unlimitedPlannedSessions: boolean;
  availableTimeMinutes: number; // time budget handed to the planner
  plannerPreferences: PlannerPreferences;
  selectedThemeIds: string[];
  lastPlanGeneratedAt: Date | null;
  lastPlanDateKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const SETTINGS_DB_NAME = 'tempo-goals-settings';
const SETTINGS_DB_VERSION = 1;
const SETTINGS_STORE = 'settings';
const SETTINGS_KEY = 'app-settings';

export const DEFAULT_SETTINGS: AppSettings = {
  weekStartDay: 1,
  maxPlannedSessions: 5,
  unlimitedPlannedSessions: false,
  availableTimeMinutes: 120,
  plannerPreferences: DEFAULT_PLANNER_PREFERENCES,
  selectedThemeIds: [],
  lastPlanGeneratedAt: null,
  lastPlanDateKey: null,
  createdAt: new Date(),
  updatedAt: new Date()
};

export const WEEK_START_OPTIONS = [
  { value: 0 as const, label: 'Sunday' },
  { value: 1 as const, label: 'Monday' }
];

let dbInstance: IDBPDatabase | null = null;
let isIndexedDBAvailable = true;
let fallbackSettings: AppSettings = { ...DEFAULT_SETTINGS };

// Stored records may predate newer fields
function mergeWithDefaults(stored: Partial<AppSettings>): AppSettings {
  return {
    ...DEFAULT_SETTINGS,
    ...stored,
    plannerPreferences: {
      ...DEFAULT_PLANNER_PREFERENCES,
      ...stored.plannerPreferences
    },
    selectedThemeIds: stored.selectedThemeIds ?? DEFAULT_SETTINGS.selectedThemeIds
  };
}

class SettingsService {
  private settingsCache: AppSettings | null = null;
  private cacheExpiry: number = 0;
  private readonly CACHE_DURATION = 5 * 60 * 1000; // 5 minutes

  async initializeDB(): Promise<IDBPDatabase | null> {
    try {
      dbInstance = await openDB(SETTINGS_DB_NAME, SETTINGS_DB_VERSION, {
        upgrade(db) {
          if (!db.objectStoreNames.contains(SETTINGS_STORE)) {
            db.createObjectStore(SETTINGS_STORE);
          }
        },
      });
      return dbInstance;
    } catch (error) {
      console.warn('Settings IndexedDB not available, falling back to memory storage:', error);
      isIndexedDBAvailable = false;
      return null;
    }
  }

  async getSettings(): Promise<AppSettings> {
    if (this.settingsCache && Date.now() < this.cacheExpiry) {
      return this.settingsCache;
    }

    if (!isIndexedDBAvailable) {
      this.cacheSettings(fallbackSettings);
      return fallbackSettings;
    }

    try {
      if (!dbInstance) {
        await this.initializeDB();
      }

      if (!dbInstance) {
        this.cacheSettings(fallbackSettings);
        return fallbackSettings;
      }

      const stored: Partial<AppSettings> | undefined = await dbInstance.get(SETTINGS_STORE, SETTINGS_KEY);
      const result = stored ? mergeWithDefaults(stored) : DEFAULT_SETTINGS;

      this.cacheSettings(result);
      return result;
    } catch (error) {
      console.error('Error getting settings:', error);
      this.cacheSettings(fallbackSettings);
      return fallbackSettings;
    }
  }

  async saveSettings(settings: Partial<AppSettings>): Promise<AppSettings> {
    const currentSettings = await this.getSettings();
    const updatedSettings: AppSettings = {
      ...currentSettings,
      ...settings,
      updatedAt: new Date()
    };

    if (!isIndexedDBAvailable) {
      fallbackSettings = updatedSettings;
      this.cacheSettings(updatedSettings);
      this.notifySettingsChanged(updatedSettings);
      return updatedSettings;
    }

    try {
      if (!dbInstance) {
        await this.initializeDB();
      }

      if (!dbInstance) {
        fallbackSettings = updatedSettings;
        this.cacheSettings(updatedSettings);
        this.notifySettingsChanged(updatedSettings);
        return updatedSettings;
      }

      await dbInstance.put(SETTINGS_STORE, updatedSettings, SETTINGS_KEY);
      this.cacheSettings(updatedSettings);
      this.notifySettingsChanged(updatedSettings);
      return updatedSettings;
    } catch (error) {
      console.error('Error saving settings:', error);
      throw new PersistenceError('Failed to save settings', toError(error));
    }
  }

  async savePlannerPreferences(preferences: Partial<PlannerPreferences>): Promise<AppSettings> {
    const current = await this.getSettings();
    return this.saveSettings({
      plannerPreferences: { ...current.plannerPreferences, ...preferences }
    });
  }

  async resetToDefaults(): Promise<AppSettings> {
    return await this.saveSettings({
      ...DEFAULT_SETTINGS,
      createdAt: new Date()
    });
  }

  private cacheSettings(settings: AppSettings): void {
    this.settingsCache = settings;
    this.cacheExpiry = Date.now() + this.CACHE_DURATION;
  }

  clearCache(): void {
    this.settingsCache = null;
    this.cacheExpiry = 0;
  }

  private notifySettingsChanged(settings: AppSettings): void {
    if (typeof window !== 'undefined') {
      window.dispatchEvent(new CustomEvent('settingsChanged', {
        detail: settings
      }));
    }
  }

  isAvailable(): boolean {
    return isIndexedDBAvailable;
  }
}

export const settingsService = new SettingsService();
