/**
 * Timeline window constants.
 *
 * A timeline always spans 48 hours, centered on the scrub position:
 * - 24 hours before the position
 * - 24 hours after the position
 */

/**
 * Milliseconds per minute.
 */
export const MINUTE_MS = 60_000;

/**
 * Milliseconds per hour.
 */
export const HOUR_MS = 3_600_000;

/**
 * Hours shown on each side of the scrub position.
 */
export const HALF_WINDOW_HOURS = 24;

/**
 * Total hours covered by the timeline window.
 */
export const WINDOW_HOURS = 2 * HALF_WINDOW_HOURS;

/**
 * Total minutes covered by the timeline window (2880).
 */
export const WINDOW_MINUTES = WINDOW_HOURS * 60;
