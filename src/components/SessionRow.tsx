import { useState } from 'react';
import { Check, Clock, Pause, Play, SkipForward, Undo2 } from 'lucide-react';
import type { SessionEntry } from '@/lib/sessionFilterService';
import { formatTimerText } from '@/lib/time-format';
import { formatClockTime, parseDateKey } from '@/lib/date-utils';
import { themeColor } from '@/lib/themes';
import { REASON_LABELS } from '@/lib/planner/scoring';
import { cn } from '@/lib/utils';
import { Button } from './ui/button';
import { ManualLogForm } from './ManualLogForm';

interface SessionRowProps {
  entry: SessionEntry;
  isActive: boolean;
  isPaused: boolean;
  timerText: string | null;
  isRecommended?: boolean;
  onToggle: (sessionId: string) => void;
  onPause: () => void;
  onSkip: (sessionId: string) => void;
  onMarkDone?: (sessionId: string) => void;
  onLogManual?: (sessionId: string, start: Date, durationSeconds: number) => void;
}

export function SessionRow({
  entry,
  isActive,
  isPaused,
  timerText,
  isRecommended = false,
  onToggle,
  onPause,
  onSkip,
  onMarkDone,
  onLogManual
}: SessionRowProps) {
  const [isLogging, setIsLogging] = useState(false);
  const { session, goal, primaryTag, progress } = entry;
  const isSkipped = session.status === 'skipped';
  const isRunning = isActive && !isPaused;
  const playLabel = isActive ? `Resume ${goal.title}` : `Start ${goal.title}`;
  const color = themeColor(primaryTag?.themeId ?? '', 'light');
  const text = isActive && timerText ? timerText : formatTimerText(progress.elapsedTime, progress.dailyTarget);

  return (
    <div className={cn('border-b', isActive && 'bg-accent')} data-testid={`session-${session.id}`}>
      <div className={cn('flex items-center gap-3 px-4 py-3 transition-colors', isSkipped && 'opacity-50')}>
        <Button
          variant="ghost"
          size="icon"
          onClick={() => (isRunning ? onPause() : onToggle(session.id))}
          aria-label={isRunning ? `Pause ${goal.title}` : playLabel}
        >
          {isRunning ? <Pause className="h-4 w-4" /> : <Play className="h-4 w-4" />}
        </Button>

        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2">
            <span className="h-2 w-2 rounded-full shrink-0" style={{ backgroundColor: color }} />
            <span className="font-medium truncate">{goal.title}</span>
            {isRecommended && (
              <span className="text-xs text-muted-foreground">Recommended</span>
            )}
            {session.plannedStartTime && (
              <span className="text-xs text-muted-foreground">{formatClockTime(session.plannedStartTime)}</span>
            )}
          </div>

          <div className="mt-2 h-1.5 rounded-full bg-muted overflow-hidden">
            <div
              className="h-full rounded-full"
              style={{ width: progress.progressPercentage, backgroundColor: color }}
            />
          </div>

          {session.recommendationReasons.length > 0 && (
            <div className="text-xs text-muted-foreground mt-1">
              {session.recommendationReasons.map(reason => REASON_LABELS[reason]).join(' · ')}
            </div>
          )}
        </div>

        <span className="text-sm tabular-nums text-muted-foreground">{text}</span>

        {onMarkDone && !progress.hasMetDailyTarget && (
          <Button variant="ghost" size="icon" onClick={() => onMarkDone(session.id)} aria-label={`Mark ${goal.title} done`}>
            <Check className="h-4 w-4" />
          </Button>
        )}

        {onLogManual && (
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsLogging(open => !open)}
            aria-label={`Log time for ${goal.title}`}
            aria-expanded={isLogging}
          >
            <Clock className="h-4 w-4" />
          </Button>
        )}

        <Button
          variant="ghost"
          size="icon"
          onClick={() => onSkip(session.id)}
          aria-label={isSkipped ? `Restore ${goal.title}` : `Skip ${goal.title}`}
        >
          {isSkipped ? <Undo2 className="h-4 w-4" /> : <SkipForward className="h-4 w-4" />}
        </Button>
      </div>
      {onLogManual && isLogging && (
        <ManualLogForm
          goalTitle={goal.title}
          dayStart={parseDateKey(session.dayId)}
          defaultStart={new Date()}
          onLog={(start, durationSeconds) => {
            setIsLogging(false);
            onLogManual(session.id, start, durationSeconds);
          }}
        />
      )}
    </div>
  );
}
