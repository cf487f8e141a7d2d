import { useState, type FormEvent } from 'react';
import { Clock } from 'lucide-react';
import { DEFAULT_MANUAL_DURATION, MANUAL_DURATION_OPTIONS } from '@/lib/goalStore';
import { formatClockTime, parseClockTime } from '@/lib/date-utils';
import { formatHourMinute } from '@/lib/time-format';
import { Button } from './ui/button';
import { Input } from './ui/input';

interface ManualLogFormProps {
  goalTitle: string;
  dayStart: Date;
  defaultStart: Date;
  onLog: (start: Date, durationSeconds: number) => void;
}

export function ManualLogForm({ goalTitle, dayStart, defaultStart, onLog }: ManualLogFormProps) {
  const [startText, setStartText] = useState(formatClockTime(defaultStart));
  const [duration, setDuration] = useState<number>(DEFAULT_MANUAL_DURATION);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    const start = parseClockTime(startText, dayStart);
    if (!start) {
      setError('Enter a start time as HH:mm');
      return;
    }
    setError(null);
    onLog(start, duration);
  };

  return (
    <form onSubmit={handleSubmit} className="flex items-center gap-2 px-4 pb-3" aria-label={`Log time for ${goalTitle}`}>
      <Clock className="h-4 w-4 text-muted-foreground" />
      <Input
        type="time"
        value={startText}
        onChange={e => setStartText(e.target.value)}
        className="w-28"
        aria-label="Start time"
      />
      <select
        value={duration}
        onChange={e => setDuration(Number(e.target.value))}
        className="rounded-md border px-2 py-1 text-sm"
        aria-label="Duration"
      >
        {MANUAL_DURATION_OPTIONS.map(option => (
          <option key={option} value={option}>{formatHourMinute(option)}</option>
        ))}
      </select>
      <Button type="submit" size="sm" variant="outline">Log</Button>
      {error && <span className="text-sm text-red-600">{error}</span>}
    </form>
  );
}
