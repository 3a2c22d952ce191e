import { formatOffset } from './format.js';
import type { LocalDateTime, LocalResolution, WallClock, Weekday } from './types.js';

const DAY_MS = 86_400_000;

// Convert weekday name to our weekday format (0=Monday, 6=Sunday)
const WEEKDAY_MAP: Record<string, Weekday> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6,
};

function wallClockAsUtcMs(wall: WallClock): number {
  return Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
}

function sameWallClock(a: WallClock, b: WallClock): boolean {
  return (
    a.year === b.year &&
    a.month === b.month &&
    a.day === b.day &&
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second
  );
}

/**
 * An IANA timezone with the conversions a timeline row needs.
 *
 * Local time components come from `Intl.DateTimeFormat`, so any zone known to
 * the runtime's ICU data is supported.
 */
export class TimeZone {
  private readonly formatter: Intl.DateTimeFormat;

  private constructor(
    /** IANA timezone string (e.g., "America/New_York") */
    readonly iana: string,
    private readonly label: string | undefined,
  ) {
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: iana,
      weekday: 'short',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
      hourCycle: 'h23',
    });
  }

  /**
   * Creates a timezone from its IANA identifier.
   *
   * @param iana - IANA timezone string
   * @param label - Optional name shown instead of the derived city name
   * @throws Error if the runtime does not know the zone
   */
  static fromIana(iana: string, label?: string): TimeZone {
    try {
      return new TimeZone(iana, label);
    } catch (error) {
      throw new Error(`Unknown timezone: ${iana}`, { cause: error });
    }
  }

  /**
   * Name shown in the short title: the label if one was given, otherwise the
   * last segment of the IANA identifier ("America/New_York" -> "New York").
   */
  get displayName(): string {
    if (this.label !== undefined) {
      return this.label;
    }
    const lastSegment = this.iana.split('/').pop() ?? this.iana;
    return lastSegment.replace(/_/g, ' ');
  }

  /**
   * Reads the wall clock of an instant in this zone.
   */
  localTime(instant: Date): LocalDateTime {
    const parts = this.formatter.formatToParts(instant);
    const numberPart = (type: Intl.DateTimeFormatPartTypes): number =>
      parseInt(parts.find((p) => p.type === type)?.value ?? '0', 10);
    const weekday = parts.find((p) => p.type === 'weekday')?.value;

    return {
      year: numberPart('year'),
      month: numberPart('month'),
      day: numberPart('day'),
      hour: numberPart('hour'),
      minute: numberPart('minute'),
      second: numberPart('second'),
      weekday: WEEKDAY_MAP[weekday ?? 'Mon'] ?? 0,
    };
  }

  /**
   * UTC offset in effect at an instant, in seconds (east of UTC is positive).
   */
  utcOffsetSeconds(instant: Date): number {
    const ms = instant.getTime();
    const wholeSecondMs = ms - (((ms % 1000) + 1000) % 1000);
    const local = this.localTime(instant);
    return (wallClockAsUtcMs(local) - wholeSecondMs) / 1000;
  }

  /**
   * Offset in effect at an instant, e.g. "UTC-4".
   */
  offsetString(at: Date): string {
    return formatOffset(this.utcOffsetSeconds(at));
  }

  /**
   * Long title form, e.g. "New York (America/New_York) UTC-4".
   */
  fullDisplayName(at: Date): string {
    return `${this.displayName} (${this.iana}) ${this.offsetString(at)}`;
  }

  /**
   * Finds the instants at which this zone's clocks read the given wall time.
   *
   * Offsets are probed a day either side of the reading; every candidate that
   * reads back as the same wall time is a solution.
   */
  resolveLocal(wall: WallClock): LocalResolution {
    const naiveMs = wallClockAsUtcMs(wall);
    const offsets = [
      this.utcOffsetSeconds(new Date(naiveMs - DAY_MS)),
      this.utcOffsetSeconds(new Date(naiveMs + DAY_MS)),
    ];

    const solutions = [...new Set(offsets.map((offset) => naiveMs - offset * 1000))]
      .filter((candidateMs) => sameWallClock(this.localTime(new Date(candidateMs)), wall))
      .sort((a, b) => a - b);

    const [earliest, latest] = solutions;
    if (earliest === undefined) {
      return { kind: 'none' };
    }
    if (latest === undefined) {
      return { kind: 'single', instant: new Date(earliest) };
    }
    return { kind: 'ambiguous', earliest: new Date(earliest), latest: new Date(latest) };
  }
}
