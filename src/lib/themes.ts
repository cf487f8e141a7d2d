import themeData from '@/data/themes.json';
import type { Theme } from './types';

export const themePresets: Theme[] = themeData;

export function getThemePreset(themeId: string): Theme {
  return themePresets.find(theme => theme.id === themeId) ?? themePresets[0];
}

export type ColorScheme = 'light' | 'dark' | 'neon';

export function themeColor(themeId: string, scheme: ColorScheme = 'light'): string {
  return getThemePreset(themeId)[scheme];
}
