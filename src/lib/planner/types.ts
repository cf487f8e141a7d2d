import type { RecommendationReason, TimeOfDay } from '../types';

export type PlanningHorizon = 'remainingDay' | 'fullDay' | 'nextDay';

export type FocusMode = 'deepWork' | 'balanced' | 'flexible';

export const FOCUS_MODE_DESCRIPTIONS: Record<FocusMode, string> = {
  deepWork: 'Fewer, longer sessions for goals that need sustained attention',
  balanced: 'A mix of session lengths spread across the day',
  flexible: 'Short sessions that fit around other commitments',
};

export interface PlannerPreferences {
  planningHorizon: PlanningHorizon;
  preferMorningSessions: boolean;
  avoidEveningSessions: boolean;
  maxSessionsPerDay: number;
  minimumBreakMinutes: number;
  focusMode: FocusMode;
}

export const DEFAULT_PLANNER_PREFERENCES: PlannerPreferences = {
  planningHorizon: 'remainingDay',
  preferMorningSessions: false,
  avoidEveningSessions: false,
  maxSessionsPerDay: 5,
  minimumBreakMinutes: 15,
  focusMode: 'balanced',
};

export interface PlannedSession {
  id: string; // goal id
  goalTitle: string;
  recommendedStartTime: string; // HH:mm
  suggestedDuration: number; // minutes
  priority: number; // 1 (highest) to 5
  reasoning: string;
}

export interface DailyPlan {
  sessions: PlannedSession[];
  overallStrategy: string;
  topThreeRecommendations: string[];
  recommendationReasoning: string;
}

export interface PlanCandidate {
  goalId: string;
  title: string;
  score: number;
  remainingSeconds: number;
  weeklyProgress: number; // 0..1
  reasons: RecommendationReason[];
  preferredTimes: TimeOfDay[];
}

export interface PlanRequest {
  now: Date;
  candidates: PlanCandidate[];
  preferences: PlannerPreferences;
  maxSessions: number;
  availableTimeMinutes: number;
}

export interface DailyPlanProvider {
  readonly name: string;
  generatePlan(request: PlanRequest): Promise<DailyPlan>;
}
