/**
 * Timeline row for one timezone: 48 hours of activity glyphs with markers,
 * date labels and a caption for the scrub position.
 */

import { hourDisplay, type HourDisplay } from '../activity/classifier.js';
import type { TimeDisplayConfig } from '../activity/config.js';
import { getDstTransitionsInRange, type DstTransition, type DstTransitionEvent } from '../dst/detector.js';
import { THEME_PALETTES, type Color, type ColorThemeName, type ThemePalette } from '../theme/colors.js';
import {
  columnToInstant,
  timelineWindow,
  timeToPosition,
  type TimelineWindow,
} from '../time/window.js';
import {
  compareCalendarDates,
  formatCaption,
  formatDateLabel,
  nextCalendarDate,
  type TimeFormat,
} from '../zone/format.js';
import type { TimeZone } from '../zone/timeZone.js';
import type { CalendarDate } from '../zone/types.js';
import { type CellBuffer, type CellStyle, innerRect, type Rect } from './buffer.js';
import { renderBlock } from './block.js';
import { renderCenteredLabel } from './labels.js';

/**
 * How the timezone is named in the frame title.
 */
export type TimezoneDisplayMode = 'short' | 'full';

export const NOW_MARKER = '│';
export const SCRUB_MARKER = '┃';

const DST_MARKERS: Readonly<Record<DstTransition, HourDisplay>> = {
  springForward: { glyph: '⇈', color: 'green' },
  fallBack: { glyph: '⇊', color: 'yellow' },
};

const DATE_LABEL_STYLE: CellStyle = { fg: 'white', bg: 'darkGray' };

/**
 * Everything a timeline row needs for one render.
 */
export interface TimelineWidgetProps {
  /** Scrub position; the window is centered on it */
  readonly timelinePosition: Date;
  readonly currentTime: Date;
  readonly timezone: TimeZone;
  readonly selected: boolean;
  readonly displayFormat: TimeFormat;
  readonly timezoneDisplayMode: TimezoneDisplayMode;
  readonly timeConfig: TimeDisplayConfig;
  readonly colorTheme: ColorThemeName;
  readonly showDate: boolean;
  readonly showDst: boolean;
}

/**
 * State shared by the paint passes of one render.
 */
interface PaintContext {
  readonly area: Rect;
  readonly inner: Rect;
  readonly buf: CellBuffer;
  readonly nowColumn: number;
  readonly scrubColumn: number;
}

type PaintPass = (ctx: PaintContext) => void;

export class TimelineWidget implements TimelineWidgetProps {
  readonly timelinePosition: Date;
  readonly currentTime: Date;
  readonly timezone: TimeZone;
  readonly selected: boolean;
  readonly displayFormat: TimeFormat;
  readonly timezoneDisplayMode: TimezoneDisplayMode;
  readonly timeConfig: TimeDisplayConfig;
  readonly colorTheme: ColorThemeName;
  readonly showDate: boolean;
  readonly showDst: boolean;

  /**
   * Paint passes in draw order; later passes overwrite earlier ones.
   */
  private readonly passes: readonly PaintPass[] = [
    (ctx) => this.paintFrame(ctx),
    (ctx) => this.paintBackground(ctx),
    (ctx) => this.paintNowMarker(ctx),
    (ctx) => this.paintScrubMarker(ctx),
    (ctx) => this.paintDstMarkers(ctx),
    (ctx) => this.paintDateLabels(ctx),
    (ctx) => this.paintCaption(ctx),
  ];

  constructor(props: TimelineWidgetProps) {
    this.timelinePosition = props.timelinePosition;
    this.currentTime = props.currentTime;
    this.timezone = props.timezone;
    this.selected = props.selected;
    this.displayFormat = props.displayFormat;
    this.timezoneDisplayMode = props.timezoneDisplayMode;
    this.timeConfig = props.timeConfig;
    this.colorTheme = props.colorTheme;
    this.showDate = props.showDate;
    this.showDst = props.showDst;
  }

  get window(): TimelineWindow {
    return timelineWindow(this.timelinePosition);
  }

  get palette(): ThemePalette {
    return THEME_PALETTES[this.colorTheme];
  }

  getTimelineStart(): Date {
    return this.window.start;
  }

  getTimelineEnd(): Date {
    return this.window.end;
  }

  timeToPosition(time: Date, width: number): number {
    return timeToPosition(this.window, time, width);
  }

  getHourDisplay(hour: number): HourDisplay {
    return hourDisplay(hour, this.timeConfig, this.palette);
  }

  getDstTransitionsInRange(): DstTransitionEvent[] {
    return getDstTransitionsInRange(this.timezone, this.window);
  }

  /**
   * Activity glyph and color for every column, read from the local hour at
   * the instant each column starts.
   */
  getTimelineDisplay(width: number): HourDisplay[] {
    const window = this.window;
    return Array.from({ length: width }, (_, column) => {
      const local = this.timezone.localTime(columnToInstant(window, column, width));
      return this.getHourDisplay(local.hour);
    });
  }

  /**
   * Frame title in the configured display mode.
   */
  title(): string {
    switch (this.timezoneDisplayMode) {
      case 'short':
        return `${this.timezone.displayName} ${this.timezone.offsetString(this.currentTime)}`;
      case 'full':
        return this.timezone.fullDisplayName(this.currentTime);
      default: {
        const _exhaustive: never = this.timezoneDisplayMode;
        throw new Error(`Unknown timezone display mode: ${String(_exhaustive)}`);
      }
    }
  }

  /**
   * Paints the row into the area. The content sits inside a one-cell border;
   * if that leaves fewer than 2 columns nothing is drawn.
   */
  render(area: Rect, buf: CellBuffer): void {
    const inner = innerRect(area, 1, 1);
    if (inner.width < 2 || inner.height < 1) {
      return;
    }

    const ctx: PaintContext = {
      area,
      inner,
      buf,
      nowColumn: this.timeToPosition(this.currentTime, inner.width),
      scrubColumn: this.timeToPosition(this.timelinePosition, inner.width),
    };
    for (const pass of this.passes) {
      pass(ctx);
    }
  }

  private paintFrame({ area, buf }: PaintContext): void {
    renderBlock(area, buf, {
      title: this.title(),
      style: this.selected ? { fg: this.palette.selectedBorder } : {},
    });
  }

  private paintBackground({ inner, buf }: PaintContext): void {
    this.getTimelineDisplay(inner.width).forEach(({ glyph, color }, column) => {
      buf.cell(inner.x + column, inner.y).setChar(glyph).setStyle({ fg: color });
    });
  }

  private paintNowMarker({ inner, buf, nowColumn }: PaintContext): void {
    this.paintMarker(inner, buf, nowColumn, NOW_MARKER, this.palette.currentTime);
  }

  private paintScrubMarker({ inner, buf, nowColumn, scrubColumn }: PaintContext): void {
    if (scrubColumn === nowColumn) {
      return;
    }
    this.paintMarker(inner, buf, scrubColumn, SCRUB_MARKER, this.palette.timelinePosition);
  }

  private paintDstMarkers({ inner, buf }: PaintContext): void {
    if (!this.showDst) {
      return;
    }
    for (const { instant, transition } of this.getDstTransitionsInRange()) {
      const { glyph, color } = DST_MARKERS[transition];
      this.paintMarker(inner, buf, this.timeToPosition(instant, inner.width), glyph, color);
    }
  }

  /**
   * Labels each local calendar date in the window at the middle of its work
   * hours. Dates whose anchor time is skipped or repeated by a clock change
   * get no label.
   */
  private paintDateLabels({ inner, buf }: PaintContext): void {
    if (!this.showDate) {
      return;
    }

    const { start, end } = this.window;
    const middleHour = Math.floor((this.timeConfig.workHoursStart + this.timeConfig.workHoursEnd) / 2);
    const lastDate = this.timezone.localTime(end);

    for (
      let date: CalendarDate = this.timezone.localTime(start);
      compareCalendarDates(date, lastDate) <= 0;
      date = nextCalendarDate(date)
    ) {
      const resolution = this.timezone.resolveLocal({
        year: date.year,
        month: date.month,
        day: date.day,
        hour: middleHour,
        minute: 0,
        second: 0,
      });
      if (resolution.kind !== 'single') {
        continue;
      }

      const anchor = this.timeToPosition(resolution.instant, inner.width);
      renderCenteredLabel(buf, inner, 0, anchor, formatDateLabel(date), DATE_LABEL_STYLE);
    }
  }

  private paintCaption({ inner, buf, scrubColumn }: PaintContext): void {
    if (inner.height < 2) {
      return;
    }
    const caption = formatCaption(this.timezone.localTime(this.timelinePosition), this.displayFormat);
    renderCenteredLabel(buf, inner, 1, scrubColumn, caption);
  }

  private paintMarker(inner: Rect, buf: CellBuffer, column: number, glyph: string, color: Color): void {
    if (column >= inner.width) {
      return;
    }
    buf.cell(inner.x + column, inner.y).setChar(glyph).setStyle({ fg: color });
  }
}
