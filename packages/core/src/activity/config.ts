/**
 * Activity classification rules and their validation schema.
 */

import { z } from 'zod';

/**
 * Category an hour of the day falls into.
 */
export type TimeActivity = 'work' | 'awake' | 'night';

/**
 * Thresholds and glyphs for classifying hours of the day.
 * Ranges are half-open `[start, end)` and may wrap past midnight.
 */
export interface TimeDisplayConfig {
  readonly workHoursStart: number;
  readonly workHoursEnd: number;
  readonly nightHoursStart: number;
  readonly nightHoursEnd: number;
  readonly glyphs: Readonly<Record<TimeActivity, string>>;
}

export const DEFAULT_TIME_DISPLAY_CONFIG: TimeDisplayConfig = {
  workHoursStart: 8,
  workHoursEnd: 18,
  nightHoursStart: 22,
  nightHoursEnd: 6,
  glyphs: {
    work: '▓',
    awake: '▒',
    night: '░',
  },
};

const hourSchema = z.number().int().min(0).max(23);

/**
 * A single displayed character (one code point).
 */
const glyphSchema = z.string().refine((value) => [...value].length === 1, {
  message: 'glyph must be exactly one character',
});

/**
 * Schema for TimeDisplayConfig.
 */
export const timeDisplayConfigSchema = z.object({
  workHoursStart: hourSchema,
  workHoursEnd: hourSchema,
  nightHoursStart: hourSchema,
  nightHoursEnd: hourSchema,
  glyphs: z.object({
    work: glyphSchema,
    awake: glyphSchema,
    night: glyphSchema,
  }),
});

/**
 * Overrides accepted by {@link createTimeDisplayConfig}.
 */
export type TimeDisplayConfigOverrides = Partial<Omit<TimeDisplayConfig, 'glyphs'>> & {
  readonly glyphs?: Partial<Record<TimeActivity, string>>;
};

/**
 * Validates unknown input as a TimeDisplayConfig.
 *
 * @throws ZodError if any field is missing or out of range
 */
export function parseTimeDisplayConfig(input: unknown): TimeDisplayConfig {
  return timeDisplayConfigSchema.parse(input);
}

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @example
 * createTimeDisplayConfig({ workHoursStart: 9, workHoursEnd: 17 })
 */
export function createTimeDisplayConfig(
  overrides: TimeDisplayConfigOverrides = {},
): TimeDisplayConfig {
  return parseTimeDisplayConfig({
    ...DEFAULT_TIME_DISPLAY_CONFIG,
    ...overrides,
    glyphs: { ...DEFAULT_TIME_DISPLAY_CONFIG.glyphs, ...overrides.glyphs },
  });
}
