import { useEffect, useState } from 'react';
import { sessionTimerManager } from '@/lib/sessionTimerManager';

export interface SessionTimerState {
  activeSessionId: string | null;
  isPaused: boolean;
  timerText: string | null;
  now: Date;
}

function snapshot(): SessionTimerState {
  const now = new Date();
  const active = sessionTimerManager.activeSession;
  return {
    activeSessionId: active?.id ?? null,
    isPaused: active?.isPaused ?? false,
    timerText: sessionTimerManager.timerText(now),
    now
  };
}

// Re-renders once a second while a session is running
export function useSessionTimer(): SessionTimerState {
  const [state, setState] = useState<SessionTimerState>(snapshot);

  useEffect(() => {
    const refresh = () => setState(snapshot());
    sessionTimerManager.addListener(refresh);
    return () => sessionTimerManager.removeListener(refresh);
  }, []);

  const isRunning = state.activeSessionId !== null && !state.isPaused;
  useEffect(() => {
    if (!isRunning) return;
    const timer = setInterval(() => setState(snapshot()), 1000);
    return () => clearInterval(timer);
  }, [isRunning]);

  return state;
}
