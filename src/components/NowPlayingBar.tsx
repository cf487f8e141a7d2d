import { Pause, Play, Square } from 'lucide-react';
import type { Goal } from '@/lib/types';
import { Button } from './ui/button';

interface NowPlayingBarProps {
  goal: Goal | null;
  sessionId: string | null;
  isPaused: boolean;
  timerText: string | null;
  onPause: () => void;
  onResume: () => void;
  onStop: () => void;
}

export function NowPlayingBar({ goal, sessionId, isPaused, timerText, onPause, onResume, onStop }: NowPlayingBarProps) {
  if (!goal || !sessionId) return null;

  return (
    <div className="border-t bg-card px-6 py-3 flex items-center gap-4" role="status">
      <div className="flex-1 min-w-0">
        <div className="text-xs text-muted-foreground uppercase tracking-wide">
          {isPaused ? 'Paused' : 'Now tracking'}
        </div>
        <div className="font-medium truncate">{goal.title}</div>
      </div>
      <span className="text-lg tabular-nums">{timerText}</span>
      <Button
        variant="outline"
        size="icon"
        onClick={isPaused ? onResume : onPause}
        aria-label={isPaused ? 'Resume' : 'Pause'}
      >
        {isPaused ? <Play className="h-4 w-4" /> : <Pause className="h-4 w-4" />}
      </Button>
      <Button variant="outline" size="icon" onClick={onStop} aria-label="Stop">
        <Square className="h-4 w-4" />
      </Button>
    </div>
  );
}
