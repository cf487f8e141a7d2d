export const TIMER_STATE_KEYS = {
  activeSessionId: 'ActiveSessionIDV1',
  activeSessionStartDate: 'ActiveSessionStartDateV1',
  activeSessionElapsedTime: 'ActiveSessionElapsedTimeV1',
  pausedSessionId: 'PausedSessionIDV1'
} as const;

export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export interface PersistedTimerState {
  activeSessionId: string;
  startDate: Date;
  elapsedTime: number;
  pausedSessionId: string | null;
}

class MemoryStore implements KeyValueStore {
  private values = new Map<string, string>();

  getItem(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.values.set(key, value);
  }

  removeItem(key: string): void {
    this.values.delete(key);
  }
}

function resolveDefaultStore(): KeyValueStore {
  try {
    if (typeof localStorage !== 'undefined') {
      return localStorage;
    }
  } catch (error) {
    console.warn('localStorage not available, keeping timer state in memory:', error);
  }
  return new MemoryStore();
}

export class TimerStateStore {
  constructor(private readonly store: KeyValueStore = resolveDefaultStore()) {}

  save(state: PersistedTimerState): void {
    this.store.setItem(TIMER_STATE_KEYS.activeSessionId, state.activeSessionId);
    // Epoch seconds
    this.store.setItem(TIMER_STATE_KEYS.activeSessionStartDate, String(state.startDate.getTime() / 1000));
    this.store.setItem(TIMER_STATE_KEYS.activeSessionElapsedTime, String(state.elapsedTime));
    if (state.pausedSessionId) {
      this.store.setItem(TIMER_STATE_KEYS.pausedSessionId, state.pausedSessionId);
    } else {
      this.store.removeItem(TIMER_STATE_KEYS.pausedSessionId);
    }
  }

  load(): PersistedTimerState | null {
    const activeSessionId = this.store.getItem(TIMER_STATE_KEYS.activeSessionId);
    const startSeconds = Number(this.store.getItem(TIMER_STATE_KEYS.activeSessionStartDate));
    if (!activeSessionId || !Number.isFinite(startSeconds) || startSeconds <= 0) {
      return null;
    }

    const elapsedTime = Number(this.store.getItem(TIMER_STATE_KEYS.activeSessionElapsedTime) ?? 0);
    return {
      activeSessionId,
      startDate: new Date(startSeconds * 1000),
      elapsedTime: Number.isFinite(elapsedTime) ? elapsedTime : 0,
      pausedSessionId: this.store.getItem(TIMER_STATE_KEYS.pausedSessionId)
    };
  }

  clear(): void {
    Object.values(TIMER_STATE_KEYS).forEach(key => this.store.removeItem(key));
  }
}

export function createMemoryTimerStateStore(): TimerStateStore {
  return new TimerStateStore(new MemoryStore());
}
