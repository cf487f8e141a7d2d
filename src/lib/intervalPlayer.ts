import type { Interval, IntervalList, IntervalListSession, IntervalSession } from './types';

export interface IntervalPlayerOptions {
  list: IntervalList;
  session: IntervalListSession;
  isGoalTimerRunning?: () => boolean;
  onStartGoalTimer?: () => void;
  onChange?: (session: IntervalListSession) => void;
  onFinished?: () => void;
}

export interface IntervalPlayerStatus {
  label: string; // "Work 2 4/6"
  progress: number;
  remainingSeconds: number;
  isPlaying: boolean;
}

export class IntervalPlayer {
  private readonly intervals: Map<string, Interval>;
  private state: IntervalListSession;
  private currentIndex: number | null = null;
  private playing = false;

  constructor(private readonly options: IntervalPlayerOptions) {
    this.intervals = new Map(options.list.intervals.map(interval => [interval.id, interval]));
    this.state = structuredClone(options.session);
  }

  get session(): IntervalListSession {
    return this.state;
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  get playingIndex(): number | null {
    return this.currentIndex;
  }

  // Returns false when every interval is already complete
  startAll(): boolean {
    const first = this.nextIncomplete(0);
    if (first === null) return false;
    this.play(first);
    return true;
  }

  toggle(index: number): void {
    if (this.playing && this.currentIndex === index) {
      this.pause();
    } else {
      this.play(index);
    }
  }

  play(index: number): void {
    if (index < 0 || index >= this.state.intervals.length) {
      throw new RangeError(`No interval at position ${index}`);
    }
    this.currentIndex = index;
    this.playing = true;

    if (this.options.isGoalTimerRunning && !this.options.isGoalTimerRunning()) {
      this.options.onStartGoalTimer?.();
    }
    this.emitChange();
  }

  pause(): void {
    if (!this.playing) return;
    this.playing = false;
    this.emitChange();
  }

  tick(seconds = 1): void {
    if (!this.playing || this.currentIndex === null) return;

    const entry = this.state.intervals[this.currentIndex];
    const duration = this.durationOf(entry);
    entry.elapsedSeconds = Math.min(entry.elapsedSeconds + seconds, duration);

    if (entry.elapsedSeconds >= duration) {
      entry.isCompleted = true;
      const next = this.nextIncomplete(this.currentIndex + 1);
      if (next === null) {
        this.playing = false;
        this.currentIndex = null;
        this.emitChange();
        this.options.onFinished?.();
        return;
      }
      this.currentIndex = next;
    }
    this.emitChange();
  }

  reset(): void {
    this.playing = false;
    this.currentIndex = null;
    this.state.intervals.forEach(entry => {
      entry.elapsedSeconds = 0;
      entry.isCompleted = false;
    });
    this.emitChange();
  }

  status(): IntervalPlayerStatus | null {
    if (this.currentIndex === null) return null;

    const entry = this.state.intervals[this.currentIndex];
    const interval = this.intervals.get(entry.intervalId);
    const duration = this.durationOf(entry);
    return {
      label: `${interval?.name ?? 'Interval'} ${this.currentIndex + 1}/${this.state.intervals.length}`,
      progress: duration > 0 ? Math.min(entry.elapsedSeconds / duration, 1) : 1,
      remainingSeconds: Math.max(duration - entry.elapsedSeconds, 0),
      isPlaying: this.playing
    };
  }

  private durationOf(entry: IntervalSession): number {
    return this.intervals.get(entry.intervalId)?.durationSeconds ?? 0;
  }

  private nextIncomplete(from: number): number | null {
    for (let i = from; i < this.state.intervals.length; i++) {
      if (!this.state.intervals[i].isCompleted) return i;
    }
    return null;
  }

  private emitChange(): void {
    this.options.onChange?.(structuredClone(this.state));
  }
}
