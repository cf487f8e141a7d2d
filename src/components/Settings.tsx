import { useState, type ReactNode } from 'react';
import { Download, Upload, RotateCcw, CalendarClock, Database } from 'lucide-react';
import { Button } from './ui/button';
import { Input } from './ui/input';
import { exportAllData, downloadExportFile } from '@/lib/dataImportExport';
import { DataImportDialog } from './DataImportDialog';
import { settingsService, WEEK_START_OPTIONS, type AppSettings } from '@/lib/settingsService';
import { FOCUS_MODE_DESCRIPTIONS, type FocusMode, type PlannerPreferences, type PlanningHorizon } from '@/lib/planner/types';
import { useAppStore } from '@/store/useAppStore';

type SaveStatus = 'idle' | 'success' | 'error';

const HORIZON_OPTIONS: { value: PlanningHorizon; label: string }[] = [
  { value: 'remainingDay', label: 'Rest of today' },
  { value: 'fullDay', label: 'All of today' },
  { value: 'nextDay', label: 'Tomorrow' }
];

const FOCUS_MODES: FocusMode[] = ['deepWork', 'balanced', 'flexible'];

const FOCUS_MODE_LABELS: Record<FocusMode, string> = {
  deepWork: 'Deep work',
  balanced: 'Balanced',
  flexible: 'Flexible'
};

function Section({ icon, title, children }: { icon: ReactNode; title: string; children: ReactNode }) {
  return (
    <section className="border rounded-lg bg-card p-6 space-y-4">
      <h2 className="text-lg font-semibold flex items-center space-x-2">
        {icon}
        <span>{title}</span>
      </h2>
      {children}
    </section>
  );
}

function Field({ label, htmlFor, children }: { label: string; htmlFor: string; children: ReactNode }) {
  return (
    <div className="flex items-center justify-between gap-4">
      <label htmlFor={htmlFor} className="text-sm font-medium">{label}</label>
      {children}
    </div>
  );
}

export function Settings() {
  const { settings, setSettings } = useAppStore();
  const [isExporting, setIsExporting] = useState(false);
  const [isImportDialogOpen, setIsImportDialogOpen] = useState(false);
  const [saveStatus, setSaveStatus] = useState<SaveStatus>('idle');

  const flashStatus = (status: SaveStatus) => {
    setSaveStatus(status);
    setTimeout(() => setSaveStatus('idle'), status === 'error' ? 5000 : 3000);
  };

  const save = async (changes: Partial<AppSettings>) => {
    try {
      setSettings(await settingsService.saveSettings(changes));
      flashStatus('success');
    } catch (error) {
      console.error('Failed to save settings:', error);
      flashStatus('error');
    }
  };

  const savePreferences = async (preferences: Partial<PlannerPreferences>) => {
    try {
      setSettings(await settingsService.savePlannerPreferences(preferences));
      flashStatus('success');
    } catch (error) {
      console.error('Failed to save planner preferences:', error);
      flashStatus('error');
    }
  };

  const handleReset = async () => {
    try {
      setSettings(await settingsService.resetToDefaults());
      flashStatus('success');
    } catch (error) {
      console.error('Failed to reset settings:', error);
      flashStatus('error');
    }
  };

  const handleExportData = async () => {
    setIsExporting(true);
    try {
      downloadExportFile(await exportAllData());
    } catch (error) {
      console.error('Export failed:', error);
      flashStatus('error');
    } finally {
      setIsExporting(false);
    }
  };

  const parsePositive = (value: string): number | null => {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
  };

  const preferences = settings.plannerPreferences;

  return (
    <div className="p-6 max-w-3xl mx-auto space-y-6">
      <div className="flex items-center justify-between">
        <h1 className="text-3xl font-bold">Settings</h1>
        {saveStatus === 'success' && <span className="text-sm text-green-600">Saved</span>}
        {saveStatus === 'error' && <span className="text-sm text-red-600">Could not save settings</span>}
      </div>

      <Section icon={<CalendarClock className="h-5 w-5" />} title="Planning">
        <Field label="Week starts on" htmlFor="week-start-select">
          <select
            id="week-start-select"
            value={settings.weekStartDay}
            onChange={e => void save({ weekStartDay: e.target.value === '0' ? 0 : 1 })}
            className="rounded-md border px-2 py-1"
          >
            {WEEK_START_OPTIONS.map(option => (
              <option key={option.value} value={option.value}>{option.label}</option>
            ))}
          </select>
        </Field>

        <Field label="Time available per day (minutes)" htmlFor="available-time-input">
          <Input
            id="available-time-input"
            type="number"
            min={15}
            step={15}
            className="w-28"
            defaultValue={settings.availableTimeMinutes}
            onBlur={e => {
              const minutes = parsePositive(e.target.value);
              if (minutes !== null) void save({ availableTimeMinutes: minutes });
            }}
          />
        </Field>

        <Field label="Most sessions to plan" htmlFor="max-sessions-input">
          <div className="flex items-center gap-3">
            <Input
              id="max-sessions-input"
              type="number"
              min={1}
              className="w-20"
              disabled={settings.unlimitedPlannedSessions}
              defaultValue={settings.maxPlannedSessions}
              onBlur={e => {
                const count = parsePositive(e.target.value);
                if (count !== null) void save({ maxPlannedSessions: count });
              }}
            />
            <label className="flex items-center gap-1 text-sm">
              <input
                type="checkbox"
                checked={settings.unlimitedPlannedSessions}
                onChange={e => void save({ unlimitedPlannedSessions: e.target.checked })}
              />
              No limit
            </label>
          </div>
        </Field>

        <Field label="Plan for" htmlFor="horizon-select">
          <select
            id="horizon-select"
            value={preferences.planningHorizon}
            onChange={e => {
              const horizon = HORIZON_OPTIONS.find(option => option.value === e.target.value);
              if (horizon) void savePreferences({ planningHorizon: horizon.value });
            }}
            className="rounded-md border px-2 py-1"
          >
            {HORIZON_OPTIONS.map(option => (
              <option key={option.value} value={option.value}>{option.label}</option>
            ))}
          </select>
        </Field>

        <div className="space-y-2">
          <div className="text-sm font-medium">Focus mode</div>
          {FOCUS_MODES.map(mode => (
            <label key={mode} className="flex items-start gap-2 text-sm">
              <input
                type="radio"
                name="focus-mode"
                checked={preferences.focusMode === mode}
                onChange={() => void savePreferences({ focusMode: mode })}
              />
              <span>
                <span className="font-medium">{FOCUS_MODE_LABELS[mode]}</span>
                <span className="block text-muted-foreground">{FOCUS_MODE_DESCRIPTIONS[mode]}</span>
              </span>
            </label>
          ))}
        </div>

        <label className="flex items-center gap-2 text-sm">
          <input
            type="checkbox"
            checked={preferences.preferMorningSessions}
            onChange={e => void savePreferences({ preferMorningSessions: e.target.checked })}
          />
          Prefer morning sessions
        </label>
        <label className="flex items-center gap-2 text-sm">
          <input
            type="checkbox"
            checked={preferences.avoidEveningSessions}
            onChange={e => void savePreferences({ avoidEveningSessions: e.target.checked })}
          />
          Avoid evening sessions
        </label>
      </Section>

      <Section icon={<Database className="h-5 w-5" />} title="Data">
        <p className="text-sm text-muted-foreground">
          Exports include goals, tags, every tracked day and these settings.
        </p>
        <div className="flex gap-2">
          <Button variant="outline" onClick={() => void handleExportData()} disabled={isExporting}>
            <Download className="h-4 w-4 mr-2" />
            {isExporting ? 'Exporting...' : 'Export Data'}
          </Button>
          <Button variant="outline" onClick={() => setIsImportDialogOpen(true)}>
            <Upload className="h-4 w-4 mr-2" />
            Import Data
          </Button>
        </div>
      </Section>

      <Button variant="ghost" onClick={() => void handleReset()}>
        <RotateCcw className="h-4 w-4 mr-2" />
        Reset to defaults
      </Button>

      <DataImportDialog isOpen={isImportDialogOpen} onClose={() => setIsImportDialogOpen(false)} />
    </div>
  );
}
