import type { CalendarDate, LocalDateTime } from './types.js';

/**
 * Clock style used for the time caption.
 */
export type TimeFormat = 'twentyFourHour' | 'twelveHour';

const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

const WEEKDAY_ABBREVIATIONS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats a date as a short label, e.g. "05 Jul".
 */
export function formatDateLabel(date: CalendarDate): string {
  const month = MONTH_ABBREVIATIONS[date.month - 1];
  if (month === undefined) {
    throw new RangeError(`month must be in range [1, 12], got ${date.month}`);
  }
  return `${pad2(date.day)} ${month}`;
}

/**
 * Formats the caption shown under the scrub marker.
 *
 * @example
 * formatCaption(local, 'twentyFourHour') // "14:05 Sat"
 * formatCaption(local, 'twelveHour')     // "02:05 PM Sat"
 */
export function formatCaption(local: LocalDateTime, format: TimeFormat): string {
  const weekday = WEEKDAY_ABBREVIATIONS[local.weekday];
  const minute = pad2(local.minute);

  switch (format) {
    case 'twentyFourHour':
      return `${pad2(local.hour)}:${minute} ${weekday}`;
    case 'twelveHour': {
      const hour12 = local.hour % 12 === 0 ? 12 : local.hour % 12;
      const meridiem = local.hour < 12 ? 'AM' : 'PM';
      return `${pad2(hour12)}:${minute} ${meridiem} ${weekday}`;
    }
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown time format: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Formats a UTC offset in seconds, e.g. "UTC+0", "UTC-5", "UTC+5:30".
 */
export function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const totalMinutes = Math.floor(Math.abs(offsetSeconds) / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (minutes === 0) {
    return `UTC${sign}${hours}`;
  }
  return `UTC${sign}${hours}:${pad2(minutes)}`;
}

/**
 * Returns the calendar date following the given one.
 */
export function nextCalendarDate(date: CalendarDate): CalendarDate {
  const next = new Date(Date.UTC(date.year, date.month - 1, date.day + 1));
  return {
    year: next.getUTCFullYear(),
    month: next.getUTCMonth() + 1,
    day: next.getUTCDate(),
  };
}

/**
 * Compares two calendar dates chronologically.
 *
 * @returns Negative if `a` is earlier, positive if later, 0 if equal
 */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}
