import smartTagData from '@/data/smart-tags.json';
import type { GoalTag, LocationType, TimeOfDay, WeatherCondition } from './types';
import { TIMES_OF_DAY } from './types';
import { getThemePreset } from './themes';

const WEATHER_CONDITIONS: readonly WeatherCondition[] = [
  'clear', 'partlyCloudy', 'cloudy', 'rainy', 'snowy', 'stormy', 'foggy'
];

const LOCATION_TYPES: readonly LocationType[] = [
  'anywhere', 'home', 'outdoor', 'gym', 'office', 'commute'
];

export const WEATHER_LABELS: Record<WeatherCondition, string> = {
  clear: 'Clear',
  partlyCloudy: 'Partly Cloudy',
  cloudy: 'Cloudy',
  rainy: 'Rainy',
  snowy: 'Snowy',
  stormy: 'Stormy',
  foggy: 'Foggy'
};

export const LOCATION_LABELS: Record<LocationType, string> = {
  anywhere: 'Anywhere',
  home: 'Home',
  outdoor: 'Outdoors',
  gym: 'Gym',
  office: 'Office',
  commute: 'Commute'
};

export const TIME_OF_DAY_LABELS: Record<TimeOfDay, string> = {
  morning: 'Morning',
  midday: 'Midday',
  afternoon: 'Afternoon',
  evening: 'Evening',
  night: 'Night'
};

function pickKnown<T extends string>(values: readonly string[] | undefined, known: readonly T[]): T[] | undefined {
  if (!values) return undefined;
  return known.filter(value => values.includes(value));
}

export function isSmartTag(tag: GoalTag): boolean {
  return (
    tag.weatherConditions !== undefined ||
    tag.minTemperature !== undefined ||
    tag.maxTemperature !== undefined ||
    tag.timeOfDayPreferences !== undefined ||
    tag.locationTypes !== undefined ||
    tag.requiresDaylight
  );
}

export function temperatureRange(tag: GoalTag): { min: number; max: number } | null {
  if (tag.minTemperature === undefined || tag.maxTemperature === undefined) return null;
  return { min: tag.minTemperature, max: tag.maxTemperature };
}

export function tagTheme(tag: GoalTag) {
  return getThemePreset(tag.themeId);
}

interface RawTag {
  id: string;
  title: string;
  themeId: string;
  weatherConditions?: string[];
  minTemperature?: number;
  maxTemperature?: number;
  timeOfDayPreferences?: string[];
  locationTypes?: string[];
  requiresDaylight?: boolean;
}

export function parseTag(raw: RawTag): GoalTag {
  return {
    id: raw.id,
    title: raw.title,
    themeId: raw.themeId,
    weatherConditions: pickKnown(raw.weatherConditions, WEATHER_CONDITIONS),
    minTemperature: raw.minTemperature,
    maxTemperature: raw.maxTemperature,
    timeOfDayPreferences: pickKnown(raw.timeOfDayPreferences, TIMES_OF_DAY),
    locationTypes: pickKnown(raw.locationTypes, LOCATION_TYPES),
    requiresDaylight: raw.requiresDaylight ?? false
  };
}

const rawSmartTags: RawTag[] = smartTagData;

export function predefinedSmartTags(): GoalTag[] {
  return rawSmartTags.map(parseTag);
}
