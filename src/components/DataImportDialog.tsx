import { useState, useRef, useCallback, type ChangeEvent } from 'react';
import { AlertCircle, CheckCircle2, Download, Upload, X } from 'lucide-react';
import { Button } from './ui/button';
import {
  analyzeImport,
  downloadExportFile,
  exportAllData,
  importData,
  type ImportProgress,
  type ImportSummary,
  type RecordChanges
} from '@/lib/dataImportExport';
import { isExportData, validateExportSchema, type ExportData, type ValidationIssue } from '@/lib/exportSchema';
import { useAppStore } from '@/store/useAppStore';

interface DataImportDialogProps {
  isOpen: boolean;
  onClose: () => void;
}

type ImportStep = 'input' | 'validating' | 'preview' | 'importing' | 'complete' | 'error';

function SummaryRow<T>({ title, changes }: { title: string; changes: RecordChanges<T> }) {
  return (
    <div className="flex items-center justify-between py-2 text-sm">
      <span className="font-medium">{title}</span>
      <span className="text-muted-foreground">
        {changes.new} new · {changes.overwritten} overwritten · {changes.unchanged} unchanged
      </span>
    </div>
  );
}

function IssueList({ issues }: { issues: ValidationIssue[] }) {
  if (issues.length === 0) return null;
  return (
    <ul className="space-y-1 text-sm max-h-48 overflow-auto">
      {issues.map((issue, index) => (
        <li key={index} className={issue.type === 'error' ? 'text-red-600' : 'text-yellow-600'}>
          <strong>{issue.field}:</strong> {issue.message}
        </li>
      ))}
    </ul>
  );
}

export function DataImportDialog({ isOpen, onClose }: DataImportDialogProps) {
  const [step, setStep] = useState<ImportStep>('input');
  const [pendingData, setPendingData] = useState<ExportData | null>(null);
  const [importSummary, setImportSummary] = useState<ImportSummary | null>(null);
  const [importProgress, setImportProgress] = useState<ImportProgress | null>(null);
  const [issues, setIssues] = useState<ValidationIssue[]>([]);
  const [error, setError] = useState<string | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);
  const { initialize } = useAppStore();

  const resetState = useCallback(() => {
    setStep('input');
    setPendingData(null);
    setImportSummary(null);
    setImportProgress(null);
    setIssues([]);
    setError(null);
    if (fileInputRef.current) {
      fileInputRef.current.value = '';
    }
  }, []);

  const handleClose = useCallback(() => {
    resetState();
    onClose();
  }, [resetState, onClose]);

  const processImportData = async (jsonText: string) => {
    setStep('validating');
    setError(null);

    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonText);
    } catch (err) {
      setStep('error');
      setError(`Invalid JSON: ${err instanceof Error ? err.message : 'Unknown parsing error'}`);
      return;
    }

    if (!isExportData(parsed)) {
      setIssues(validateExportSchema(parsed));
      setStep('error');
      setError('Validation failed');
      return;
    }

    try {
      const summary = await analyzeImport(parsed);
      setPendingData(parsed);
      setImportSummary(summary);
      setIssues(summary.validationErrors);
      setStep('preview');
    } catch (err) {
      setStep('error');
      setError(`Failed to analyze import: ${err instanceof Error ? err.message : 'Unknown error'}`);
    }
  };

  const handleFileSelect = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;

    if (file.type !== 'application/json' && !file.name.endsWith('.json')) {
      setError('Please select a valid JSON file');
      return;
    }

    try {
      await processImportData(await file.text());
    } catch (err) {
      setError(`Failed to read file: ${err instanceof Error ? err.message : 'Unknown error'}`);
    }
  };

  const handleConfirmImport = async () => {
    if (!pendingData) return;

    setStep('importing');
    try {
      await importData(pendingData, setImportProgress);
      await initialize();
      setStep('complete');
    } catch (err) {
      setStep('error');
      setError(`Import failed: ${err instanceof Error ? err.message : 'Unknown error'}`);
    }
  };

  const handleDownloadBackup = async () => {
    try {
      downloadExportFile(await exportAllData(), `tempo-goals-backup-${new Date().toISOString().split('T')[0]}.json`);
    } catch (err) {
      console.error('Failed to create backup:', err);
      setError('Could not create a backup before importing');
    }
  };

  if (!isOpen) return null;

  return (
    <div className="fixed inset-0 bg-black/50 z-50 flex items-center justify-center" role="dialog" aria-modal="true">
      <div className="bg-background border rounded-lg shadow-2xl w-full max-w-lg mx-4 p-6 space-y-4">
        <div className="flex items-center justify-between">
          <h2 className="text-lg font-semibold flex items-center gap-2">
            <Upload className="h-5 w-5" />
            Import Data
          </h2>
          <Button variant="ghost" size="icon" onClick={handleClose} aria-label="Close">
            <X className="h-4 w-4" />
          </Button>
        </div>

        {step === 'input' && (
          <div className="space-y-3">
            <p className="text-sm text-muted-foreground">
              Choose a file exported from this app. Records with matching ids are overwritten.
            </p>
            <input ref={fileInputRef} type="file" accept="application/json,.json" onChange={event => void handleFileSelect(event)} />
            {error && <p className="text-sm text-red-600">{error}</p>}
          </div>
        )}

        {step === 'validating' && <p className="text-sm text-muted-foreground">Checking file...</p>}

        {step === 'preview' && importSummary && (
          <div className="space-y-3">
            <div className="divide-y">
              <SummaryRow title="Goals" changes={importSummary.goals} />
              <SummaryRow title="Tags" changes={importSummary.tags} />
              <SummaryRow title="Days" changes={importSummary.days} />
            </div>
            <IssueList issues={issues} />
            <div className="flex justify-between gap-2">
              <Button variant="outline" size="sm" onClick={() => void handleDownloadBackup()}>
                <Download className="h-4 w-4 mr-2" />
                Backup first
              </Button>
              <Button size="sm" onClick={() => void handleConfirmImport()}>
                Import {importSummary.totalRecords} records
              </Button>
            </div>
            {error && <p className="text-sm text-red-600">{error}</p>}
          </div>
        )}

        {step === 'importing' && (
          <p className="text-sm text-muted-foreground">{importProgress?.message ?? 'Importing...'}</p>
        )}

        {step === 'complete' && (
          <div className="flex items-center gap-2 text-green-600">
            <CheckCircle2 className="h-5 w-5" />
            <span>Import complete</span>
          </div>
        )}

        {step === 'error' && (
          <div className="space-y-3">
            <div className="flex items-center gap-2 text-red-600">
              <AlertCircle className="h-5 w-5" />
              <span>{error}</span>
            </div>
            <IssueList issues={issues} />
            <Button variant="outline" size="sm" onClick={resetState}>Try another file</Button>
          </div>
        )}
      </div>
    </div>
  );
}
