export type TimeOfDay = 'morning' | 'midday' | 'afternoon' | 'evening' | 'night';

export const TIMES_OF_DAY: readonly TimeOfDay[] = ['morning', 'midday', 'afternoon', 'evening', 'night'];

export type WeatherCondition = 'clear' | 'partlyCloudy' | 'cloudy' | 'rainy' | 'snowy' | 'stormy' | 'foggy';

export type LocationType = 'anywhere' | 'home' | 'outdoor' | 'gym' | 'office' | 'commute';

// 1 = Sunday ... 7 = Saturday
export type WeekdayId = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const WEEKDAY_IDS: readonly WeekdayId[] = [1, 2, 3, 4, 5, 6, 7];

export type DayTimeSchedule = Partial<Record<WeekdayId, TimeOfDay[]>>;

export interface Theme {
  id: string;
  title: string;
  light: string;
  dark: string;
  neon: string;
}

export interface GoalTag {
  id: string;
  title: string;
  themeId: string;
  weatherConditions?: WeatherCondition[];
  minTemperature?: number; // Celsius
  maxTemperature?: number;
  timeOfDayPreferences?: TimeOfDay[];
  locationTypes?: LocationType[];
  requiresDaylight: boolean;
}

export type GoalStatus = 'suggestion' | 'active' | 'archived';

export interface ChecklistItem {
  id: string;
  title: string;
  order: number;
  createdAt: Date;
}

export type IntervalKind = 'work' | 'breakTime';

export interface Interval {
  id: string;
  name: string;
  durationSeconds: number;
  kind: IntervalKind;
  orderIndex: number;
}

export interface IntervalList {
  id: string;
  name: string;
  intervals: Interval[];
}

export interface Goal {
  id: string;
  title: string;
  status: GoalStatus;
  primaryTagId: string | null;
  otherTagIds: string[];
  weeklyTarget: number; // seconds
  notificationsEnabled: boolean;
  scheduleNotificationsEnabled: boolean;
  completionNotificationsEnabled: boolean;
  dayTimeSchedule: DayTimeSchedule;
  checklistItems: ChecklistItem[];
  intervalLists: IntervalList[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ChecklistItemSession {
  id: string;
  checklistItemId: string;
  isCompleted: boolean;
}

export interface IntervalSession {
  id: string;
  intervalId: string;
  elapsedSeconds: number;
  isCompleted: boolean;
}

export interface IntervalListSession {
  id: string;
  listId: string;
  intervals: IntervalSession[];
}

export type SessionStatus = 'suggestion' | 'active' | 'skipped';

export type RecommendationReason =
  | 'weeklyProgress'
  | 'quickFinish'
  | 'preferredTime'
  | 'energyLevel'
  | 'plannedTheme'
  | 'usualTime';

export interface GoalSession {
  id: string;
  goalId: string;
  title: string;
  dayId: string;
  status: SessionStatus;
  checklist: ChecklistItemSession[];
  intervalLists: IntervalListSession[];
  plannedStartTime: Date | null;
  plannedDuration: number | null; // minutes
  plannedPriority: number | null;
  plannedReasoning: string | null;
  recommendationReasons: RecommendationReason[];
}

export interface HistoricalSession {
  id: string;
  title: string;
  goalIds: string[];
  startDate: Date;
  endDate: Date;
  duration: number; // seconds
}

export interface Day {
  id: string; // yyyy-MM-dd
  start: Date;
  end: Date;
  sessions: GoalSession[];
  historicalSessions: HistoricalSession[];
  createdAt: Date;
  updatedAt: Date;
}
