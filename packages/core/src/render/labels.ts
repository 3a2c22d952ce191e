import type { CellBuffer, CellStyle, Rect } from './buffer.js';

/**
 * Computes where a label starts so that it is centered on an anchor column.
 *
 * The start is pulled back to 0 when the label would begin left of the track,
 * and pulled left when it would run past the right edge. A label wider than
 * the track starts at 0 and is cut off by {@link paintLabel}.
 *
 * @param anchor - Column the label is centered on
 * @param length - Label length in characters
 * @param trackWidth - Width of the track in columns
 * @returns Start column, never negative
 *
 * @example
 * placeLabel(50, 9, 100) // 46
 * placeLabel(2, 6, 100)  // 0
 * placeLabel(99, 6, 100) // 94
 */
export function placeLabel(anchor: number, length: number, trackWidth: number): number {
  const half = Math.floor(length / 2);
  const centered = anchor >= half ? anchor - half : 0;
  return Math.min(centered, Math.max(0, trackWidth - length));
}

/**
 * Writes a label into one row of a track, dropping characters that fall past
 * the track's right edge.
 *
 * @param style - Colors applied to written cells; when omitted only symbols change
 */
export function paintLabel(
  buf: CellBuffer,
  track: Rect,
  row: number,
  start: number,
  text: string,
  style?: CellStyle,
): void {
  const y = track.y + row;
  [...text].forEach((ch, i) => {
    const column = start + i;
    if (column >= track.width) {
      return;
    }
    const cell = buf.cell(track.x + column, y).setChar(ch);
    if (style !== undefined) {
      cell.setStyle(style);
    }
  });
}

/**
 * Centers a label on an anchor column and paints it.
 */
export function renderCenteredLabel(
  buf: CellBuffer,
  track: Rect,
  row: number,
  anchor: number,
  text: string,
  style?: CellStyle,
): void {
  const start = placeLabel(anchor, [...text].length, track.width);
  paintLabel(buf, track, row, start, text, style);
}
