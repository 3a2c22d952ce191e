import { HALF_WINDOW_HOURS, HOUR_MS, MINUTE_MS, WINDOW_MINUTES } from './constants.js';

/**
 * The interval of absolute time drawn by one timeline row.
 */
export interface TimelineWindow {
  /** Inclusive start instant */
  readonly start: Date;
  /** End instant; instants at or after it saturate to the last column */
  readonly end: Date;
}

/**
 * Builds the 48-hour window centered on the scrub position.
 * The window depends only on the position, never on the current time.
 *
 * @example
 * timelineWindow(new Date('2024-06-15T12:00:00Z'))
 * // { start: 2024-06-14T12:00:00Z, end: 2024-06-16T12:00:00Z }
 */
export function timelineWindow(timelinePosition: Date): TimelineWindow {
  const positionMs = timelinePosition.getTime();
  return {
    start: new Date(positionMs - HALF_WINDOW_HOURS * HOUR_MS),
    end: new Date(positionMs + HALF_WINDOW_HOURS * HOUR_MS),
  };
}

/**
 * Maps an instant to a column on a track of the given width.
 *
 * The map is linear and saturating: instants before the window start land on
 * column 0, instants at or after the end land on `width - 1`.
 *
 * @param window - Window the track represents
 * @param time - Instant to place
 * @param width - Track width in columns
 * @returns Column in range [0, max(width - 1, 0)]
 *
 * @example
 * const w = timelineWindow(position);
 * timeToPosition(w, position, 100) // 50
 */
export function timeToPosition(
  window: TimelineWindow,
  time: Date,
  width: number,
): number {
  const totalMs = window.end.getTime() - window.start.getTime();
  if (totalMs === 0) {
    return 0;
  }

  const ratio = (time.getTime() - window.start.getTime()) / totalMs;
  const position = Math.round(ratio * width);
  return Math.max(0, Math.min(position, width - 1));
}

/**
 * Returns the instant a column starts at, the inverse companion of
 * {@link timeToPosition}. Offsets are whole minutes, floored.
 *
 * @param window - Window the track represents
 * @param column - Column index in [0, width)
 * @param width - Track width in columns, must be positive
 */
export function columnToInstant(
  window: TimelineWindow,
  column: number,
  width: number,
): Date {
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`width must be a positive integer, got ${width}`);
  }

  const minutes = Math.floor((column * WINDOW_MINUTES) / width);
  return new Date(window.start.getTime() + minutes * MINUTE_MS);
}
