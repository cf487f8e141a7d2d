import type { Day, Goal, GoalSession, HistoricalSession } from './types';
import { ActiveSession } from './activeSession';
import { TimerStateStore } from './timerStateStore';
import { saveHistoricalSession } from './goalStore';
import { dailyTarget, elapsedTimeForGoal } from './sessionProgress';
import { getDay, saveDay } from './db';
import { TrackerError } from './errors';

export type TimerToggleResult = 'started' | 'resumed' | 'stopped';

export interface SessionTimerManagerOptions {
  stateStore?: TimerStateStore;
  // Set to false to drive ticks manually
  tick?: boolean;
  onTick?: (sessionId: string, elapsedSeconds: number) => void;
  onTargetReached?: (sessionId: string, goalId: string) => void;
}

interface ActiveContext {
  session: Pick<GoalSession, 'id' | 'goalId' | 'title'>;
  day: Day;
}

export class SessionTimerManager {
  private active: ActiveSession | null = null;
  private context: ActiveContext | null = null;
  private listeners: Set<() => void> = new Set();
  private readonly stateStore: TimerStateStore;
  private readonly autoTick: boolean;

  constructor(private readonly options: SessionTimerManagerOptions = {}) {
    this.stateStore = options.stateStore ?? new TimerStateStore();
    this.autoTick = options.tick ?? true;
  }

  get activeSession(): ActiveSession | null {
    return this.active;
  }

  get activeGoalId(): string | null {
    return this.context?.session.goalId ?? null;
  }

  isActive(sessionId: string): boolean {
    return this.active?.id === sessionId;
  }

  isPaused(sessionId: string): boolean {
    return this.isActive(sessionId) && (this.active?.isPaused ?? false);
  }

  timerText(now: Date = new Date()): string | null {
    return this.active ? this.active.timerText(now) : null;
  }

  /**
   * On the active session: resume when paused, otherwise stop. On any other
   * session: stop and record the running one, then start this one.
   */
  async toggle(session: GoalSession, goal: Goal, day: Day, now: Date = new Date()): Promise<TimerToggleResult> {
    if (this.active && this.active.id === session.id) {
      if (this.active.isPaused) {
        this.resume(now);
        return 'resumed';
      }
      await this.stop(now);
      return 'stopped';
    }

    if (this.active) {
      await this.stop(now);
    }
    await this.start(session, goal, day, now);
    return 'started';
  }

  async start(session: GoalSession, goal: Goal, day: Day, now: Date = new Date()): Promise<ActiveSession> {
    if (session.goalId !== goal.id) {
      throw new TrackerError(`Session ${session.id} does not belong to goal ${goal.id}`);
    }
    if (this.active) {
      await this.stop(now);
    }

    if (session.status === 'skipped') {
      session.status = 'active';
      await saveDay(day);
    }

    this.active = this.createActiveSession({
      id: session.id,
      goalId: goal.id,
      startDate: now,
      elapsedTime: elapsedTimeForGoal(day, goal.id),
      target: dailyTarget(goal),
      isPaused: false
    });
    this.context = { session: { id: session.id, goalId: session.goalId, title: session.title }, day };

    if (this.autoTick) this.active.startTicking();
    this.saveTimerState();
    this.notifyListeners();
    return this.active;
  }

  // Records the running segment and keeps the session selected
  async pause(now: Date = new Date()): Promise<HistoricalSession | null> {
    if (!this.active || !this.context || this.active.isPaused) return null;

    const { session } = this.context;
    const startDate = this.active.startDate;
    this.active.pause(now);
    const recorded = await saveHistoricalSession(session, await this.latestDay(), startDate, now);
    this.saveTimerState();
    this.notifyListeners();
    return recorded;
  }

  resume(now: Date = new Date()): void {
    if (!this.active || !this.active.isPaused) return;

    this.active.resume(now);
    if (this.autoTick) this.active.startTicking();
    this.saveTimerState();
    this.notifyListeners();
  }

  async stop(now: Date = new Date()): Promise<HistoricalSession | null> {
    if (!this.active || !this.context) return null;

    const { session } = this.context;
    const running = !this.active.isPaused;
    const startDate = this.active.startDate;
    const day = await this.latestDay();
    this.clearActiveSession();

    return running ? saveHistoricalSession(session, day, startDate, now) : null;
  }

  clearActiveSession(): void {
    this.active?.stopTicking();
    this.active = null;
    this.context = null;
    this.stateStore.clear();
    this.notifyListeners();
  }

  saveTimerState(): void {
    if (!this.active) {
      this.stateStore.clear();
      return;
    }
    this.stateStore.save({
      activeSessionId: this.active.id,
      startDate: this.active.startDate,
      elapsedTime: this.active.elapsedTime,
      pausedSessionId: this.active.isPaused ? this.active.id : null
    });
  }

  /**
   * Restores a persisted timer against the given day. State pointing at a
   * session that no longer exists is discarded.
   */
  loadTimerState(day: Day, goals: Goal[]): ActiveSession | null {
    const state = this.stateStore.load();
    if (!state) return null;

    const session = day.sessions.find(candidate => candidate.id === state.activeSessionId);
    const goal = session ? goals.find(candidate => candidate.id === session.goalId) : undefined;
    if (!session || !goal) {
      console.debug(`Discarding timer state for missing session ${state.activeSessionId}`);
      this.stateStore.clear();
      return null;
    }

    this.active?.stopTicking();
    this.active = this.createActiveSession({
      id: session.id,
      goalId: goal.id,
      startDate: state.startDate,
      elapsedTime: state.elapsedTime,
      target: dailyTarget(goal),
      isPaused: state.pausedSessionId === session.id
    });
    this.context = { session: { id: session.id, goalId: session.goalId, title: session.title }, day };

    if (this.autoTick) this.active.startTicking();
    this.notifyListeners();
    return this.active;
  }

  addListener(listener: () => void): void {
    this.listeners.add(listener);
  }

  removeListener(listener: () => void): void {
    this.listeners.delete(listener);
  }

  // The stored copy may be newer than the one captured at start
  private async latestDay(): Promise<Day> {
    if (!this.context) {
      throw new TrackerError('No active session');
    }
    return (await getDay(this.context.day.id)) ?? this.context.day;
  }

  private createActiveSession(init: {
    id: string;
    goalId: string;
    startDate: Date;
    elapsedTime: number;
    target: number;
    isPaused: boolean;
  }): ActiveSession {
    const { onTick, onTargetReached } = this.options;
    return new ActiveSession({
      id: init.id,
      startDate: init.startDate,
      elapsedTime: init.elapsedTime,
      dailyTarget: init.target,
      isPaused: init.isPaused,
      onTick: onTick ? elapsed => onTick(init.id, elapsed) : undefined,
      onTargetReached: onTargetReached ? () => onTargetReached(init.id, init.goalId) : undefined
    });
  }

  private notifyListeners(): void {
    this.listeners.forEach(listener => {
      try {
        listener();
      } catch (error) {
        console.error('Timer listener error:', error);
      }
    });
  }
}

export const sessionTimerManager = new SessionTimerManager();
