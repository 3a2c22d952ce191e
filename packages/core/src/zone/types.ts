/**
 * Day of week representation: Monday = 0, Sunday = 6.
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * A calendar date with no timezone attached.
 */
export interface CalendarDate {
  readonly year: number;
  /** 1 = January, 12 = December */
  readonly month: number;
  /** Day of month, 1-31 */
  readonly day: number;
}

/**
 * A wall-clock reading with no timezone attached.
 */
export interface WallClock extends CalendarDate {
  /** 0-23 */
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Wall-clock reading of an instant in a specific timezone.
 */
export interface LocalDateTime extends WallClock {
  readonly weekday: Weekday;
}

/**
 * Result of resolving a wall-clock reading to an absolute instant.
 *
 * - `single`: the reading occurs exactly once
 * - `ambiguous`: the reading occurs twice (clocks were set back)
 * - `none`: the reading never occurs (clocks skipped over it)
 */
export type LocalResolution =
  | { readonly kind: 'single'; readonly instant: Date }
  | { readonly kind: 'ambiguous'; readonly earliest: Date; readonly latest: Date }
  | { readonly kind: 'none' };
