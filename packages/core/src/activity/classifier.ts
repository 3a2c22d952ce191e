import type { Color, ThemePalette } from '../theme/colors.js';
import type { TimeActivity, TimeDisplayConfig } from './config.js';

/**
 * Glyph and color drawn for one timeline column.
 */
export interface HourDisplay {
  readonly glyph: string;
  readonly color: Color;
}

/**
 * Checks whether an hour lies in the half-open range [start, end),
 * wrapping past midnight when start > end. An empty range (start === end)
 * contains no hours.
 */
export function isHourInRange(hour: number, start: number, end: number): boolean {
  if (start <= end) {
    return hour >= start && hour < end;
  }
  return hour >= start || hour < end;
}

/**
 * Classifies an hour of the local day.
 * Work hours take precedence over night hours; anything else is awake time.
 *
 * @param hour - Local hour in range [0, 23]
 */
export function classifyHour(hour: number, config: TimeDisplayConfig): TimeActivity {
  if (isHourInRange(hour, config.workHoursStart, config.workHoursEnd)) {
    return 'work';
  }
  if (isHourInRange(hour, config.nightHoursStart, config.nightHoursEnd)) {
    return 'night';
  }
  return 'awake';
}

export function activityGlyph(activity: TimeActivity, config: TimeDisplayConfig): string {
  return config.glyphs[activity];
}

export function activityColor(activity: TimeActivity, palette: ThemePalette): Color {
  return palette[activity];
}

/**
 * Classifies an hour and returns what to draw for it.
 *
 * @example
 * hourDisplay(14, DEFAULT_TIME_DISPLAY_CONFIG, THEME_PALETTES.default)
 * // { glyph: '▓', color: 'green' }
 */
export function hourDisplay(
  hour: number,
  config: TimeDisplayConfig,
  palette: ThemePalette,
): HourDisplay {
  const activity = classifyHour(hour, config);
  return {
    glyph: activityGlyph(activity, config),
    color: activityColor(activity, palette),
  };
}
