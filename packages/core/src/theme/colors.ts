/**
 * Terminal color palettes.
 */

import { z } from 'zod';

/**
 * Named terminal colors (the 16-color ANSI set plus `reset`).
 */
export type Color =
  | 'reset'
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'gray'
  | 'darkGray'
  | 'lightRed'
  | 'lightGreen'
  | 'lightYellow'
  | 'lightBlue'
  | 'lightMagenta'
  | 'lightCyan'
  | 'white';

export const COLOR_THEME_NAMES = [
  'default',
  'ocean',
  'forest',
  'sunset',
  'cyberpunk',
  'monochrome',
] as const;

/**
 * Identifier of a built-in palette.
 */
export type ColorThemeName = (typeof COLOR_THEME_NAMES)[number];

/**
 * Schema for ColorThemeName.
 */
export const colorThemeNameSchema = z.enum(COLOR_THEME_NAMES);

/**
 * Colors a theme assigns to the parts of a timeline row.
 */
export interface ThemePalette {
  readonly selectedBorder: Color;
  /** Now marker */
  readonly currentTime: Color;
  /** Scrub marker */
  readonly timelinePosition: Color;
  readonly work: Color;
  readonly awake: Color;
  readonly night: Color;
}

export const THEME_PALETTES: Readonly<Record<ColorThemeName, ThemePalette>> = {
  default: {
    selectedBorder: 'yellow',
    currentTime: 'red',
    timelinePosition: 'white',
    work: 'green',
    awake: 'yellow',
    night: 'darkGray',
  },
  ocean: {
    selectedBorder: 'cyan',
    currentTime: 'lightRed',
    timelinePosition: 'lightCyan',
    work: 'blue',
    awake: 'cyan',
    night: 'darkGray',
  },
  forest: {
    selectedBorder: 'lightGreen',
    currentTime: 'lightYellow',
    timelinePosition: 'white',
    work: 'green',
    awake: 'lightGreen',
    night: 'darkGray',
  },
  sunset: {
    selectedBorder: 'lightMagenta',
    currentTime: 'lightYellow',
    timelinePosition: 'white',
    work: 'red',
    awake: 'yellow',
    night: 'magenta',
  },
  cyberpunk: {
    selectedBorder: 'magenta',
    currentTime: 'lightGreen',
    timelinePosition: 'lightCyan',
    work: 'magenta',
    awake: 'cyan',
    night: 'blue',
  },
  monochrome: {
    selectedBorder: 'white',
    currentTime: 'white',
    timelinePosition: 'gray',
    work: 'white',
    awake: 'gray',
    night: 'darkGray',
  },
};

/**
 * Looks up a palette by name, falling back to the default palette (with a
 * warning) when the name is not a built-in theme.
 */
export function resolveThemePalette(name: string): ThemePalette {
  const parsed = colorThemeNameSchema.safeParse(name);
  if (!parsed.success) {
    console.warn(`[theme] Unknown color theme "${name}", using "default"`);
    return THEME_PALETTES.default;
  }
  return THEME_PALETTES[parsed.data];
}
