import { formatTimerText } from './time-format';

export interface ActiveSessionOptions {
  id: string;
  startDate: Date;
  elapsedTime: number; // seconds recorded before startDate
  dailyTarget: number;
  isPaused?: boolean;
  onTick?: (elapsedSeconds: number) => void;
  onTargetReached?: () => void;
}

const TICK_INTERVAL = 1000;

export class ActiveSession {
  readonly id: string;
  readonly dailyTarget: number;
  startDate: Date;
  elapsedTime: number;
  isPaused: boolean;

  private readonly onTick?: (elapsedSeconds: number) => void;
  private readonly onTargetReached?: () => void;
  private hasNotifiedTarget: boolean;
  private ticker: ReturnType<typeof setInterval> | null = null;

  constructor(options: ActiveSessionOptions) {
    this.id = options.id;
    this.startDate = options.startDate;
    this.elapsedTime = options.elapsedTime;
    this.dailyTarget = options.dailyTarget;
    this.isPaused = options.isPaused ?? false;
    this.onTick = options.onTick;
    this.onTargetReached = options.onTargetReached;
    // A session that starts at or past its target never notifies
    this.hasNotifiedTarget = options.dailyTarget > 0 && options.elapsedTime >= options.dailyTarget;
  }

  currentElapsed(now: Date = new Date()): number {
    if (this.isPaused) return this.elapsedTime;
    const running = Math.max((now.getTime() - this.startDate.getTime()) / 1000, 0);
    return this.elapsedTime + running;
  }

  timerText(now: Date = new Date()): string {
    return formatTimerText(this.currentElapsed(now), this.dailyTarget);
  }

  get isTicking(): boolean {
    return this.ticker !== null;
  }

  startTicking(): void {
    if (this.ticker || this.isPaused) return;
    this.ticker = setInterval(() => this.tick(new Date()), TICK_INTERVAL);
  }

  stopTicking(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  tick(now: Date = new Date()): void {
    const elapsed = this.currentElapsed(now);
    this.onTick?.(elapsed);

    if (!this.hasNotifiedTarget && this.dailyTarget > 0 && elapsed >= this.dailyTarget) {
      this.hasNotifiedTarget = true;
      this.onTargetReached?.();
    }
  }

  // Folds the running segment into elapsedTime
  pause(now: Date = new Date()): void {
    if (this.isPaused) return;
    this.elapsedTime = this.currentElapsed(now);
    this.isPaused = true;
    this.stopTicking();
  }

  resume(now: Date = new Date()): void {
    if (!this.isPaused) return;
    this.startDate = now;
    this.isPaused = false;
  }
}
