import type { CellBuffer, CellStyle, Rect } from './buffer.js';

const BORDER = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
} as const;

/**
 * Options for a bordered frame.
 */
export interface BlockOptions {
  /** Drawn on the top border, after the corner, truncated to fit */
  readonly title: string;
  /** Applied to the whole area before the border is drawn */
  readonly style: CellStyle;
}

/**
 * Paints a frame with single-line borders on all four sides.
 * Areas smaller than 2x2 are left untouched.
 */
export function renderBlock(area: Rect, buf: CellBuffer, options: BlockOptions): void {
  if (area.width < 2 || area.height < 2) {
    return;
  }

  buf.setStyle(area, options.style);

  const right = area.x + area.width - 1;
  const bottom = area.y + area.height - 1;

  for (let x = area.x + 1; x < right; x++) {
    buf.cell(x, area.y).setChar(BORDER.horizontal);
    buf.cell(x, bottom).setChar(BORDER.horizontal);
  }
  for (let y = area.y + 1; y < bottom; y++) {
    buf.cell(area.x, y).setChar(BORDER.vertical);
    buf.cell(right, y).setChar(BORDER.vertical);
  }
  buf.cell(area.x, area.y).setChar(BORDER.topLeft);
  buf.cell(right, area.y).setChar(BORDER.topRight);
  buf.cell(area.x, bottom).setChar(BORDER.bottomLeft);
  buf.cell(right, bottom).setChar(BORDER.bottomRight);

  const titleChars = [...options.title].slice(0, area.width - 2);
  titleChars.forEach((ch, i) => {
    buf.cell(area.x + 1 + i, area.y).setChar(ch);
  });
}
