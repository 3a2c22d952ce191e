/**
 * A caller-owned grid of character cells that widgets paint into.
 */

import type { Color } from '../theme/colors.js';

/**
 * Rectangle in buffer coordinates.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Optional color overrides applied to a cell.
 */
export interface CellStyle {
  readonly fg?: Color;
  readonly bg?: Color;
}

/**
 * Shrinks a rectangle by a margin on every side, saturating at zero size.
 */
export function innerRect(area: Rect, horizontal: number, vertical: number): Rect {
  if (area.width < 2 * horizontal || area.height < 2 * vertical) {
    return { x: area.x, y: area.y, width: 0, height: 0 };
  }
  return {
    x: area.x + horizontal,
    y: area.y + vertical,
    width: area.width - 2 * horizontal,
    height: area.height - 2 * vertical,
  };
}

export class Cell {
  symbol = ' ';
  fg: Color | undefined = undefined;
  bg: Color | undefined = undefined;

  setChar(symbol: string): this {
    this.symbol = symbol;
    return this;
  }

  /**
   * Applies the colors the style defines; colors it leaves out are kept.
   */
  setStyle(style: CellStyle): this {
    if (style.fg !== undefined) {
      this.fg = style.fg;
    }
    if (style.bg !== undefined) {
      this.bg = style.bg;
    }
    return this;
  }
}

export class CellBuffer {
  private readonly cells: Cell[];

  private constructor(readonly area: Rect) {
    this.cells = Array.from({ length: area.width * area.height }, () => new Cell());
  }

  /**
   * Creates a buffer of blank cells covering the area.
   */
  static empty(area: Rect): CellBuffer {
    return new CellBuffer(area);
  }

  /**
   * Returns the cell at absolute coordinates.
   *
   * @throws RangeError if the position lies outside the buffer's area
   */
  cell(x: number, y: number): Cell {
    const { area } = this;
    const col = x - area.x;
    const row = y - area.y;
    const found =
      col >= 0 && col < area.width && row >= 0 && row < area.height
        ? this.cells[row * area.width + col]
        : undefined;
    if (found === undefined) {
      throw new RangeError(
        `position (${x}, ${y}) is outside buffer area ${area.width}x${area.height} at (${area.x}, ${area.y})`,
      );
    }
    return found;
  }

  /**
   * Applies a style to every cell of a rectangle within the buffer.
   */
  setStyle(rect: Rect, style: CellStyle): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.cell(x, y).setStyle(style);
      }
    }
  }

  /**
   * Renders the symbols as plain text, one string per row.
   */
  toLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.area.height; row++) {
      const start = row * this.area.width;
      lines.push(
        this.cells
          .slice(start, start + this.area.width)
          .map((c) => c.symbol)
          .join(''),
      );
    }
    return lines;
  }
}
