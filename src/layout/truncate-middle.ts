/**
 * Middle truncation for table cells.
 *
 * Keeps both ends of a string and elides the centre, since the start and
 * the end of hostnames, connection strings and process paths are what
 * identify them.
 */

import { displayWidth, takeHead, takeTail } from '../utils/display-width.js';

/** Marker inserted where characters were removed */
export const TRUNCATION_MARKER = '[..]';

/**
 * Smallest width that still leaves a one-character head and tail around
 * the marker.
 */
export const MIN_TRUNCATE_WIDTH = 6;

/**
 * Normalize a requested width to a non-negative integer.
 *
 * @returns 0 for negative or non-finite input, the floored value otherwise
 */
export function clampWidth(width: number): number {
  if (!Number.isFinite(width) || width < 0) {
    return 0;
  }
  return Math.floor(width);
}

/**
 * Shorten text to fit a column, preserving its head and tail.
 *
 * Widths are terminal columns (CJK and emoji count as two), and slicing
 * never splits a code point. Text that already fits is returned unchanged.
 * Otherwise the result is `head + "[..]" + tail`, with head and tail each
 * at most `floor(maxWidth / 2) - 2` columns wide. Below
 * {@link MIN_TRUNCATE_WIDTH} there is no room for both ends: the bare
 * marker is returned when it fits, and a plain prefix when it does not.
 *
 * @param text - Cell text
 * @param maxWidth - Column width in terminal columns
 * @returns Text no wider than `maxWidth` and no wider than the original
 *
 * @example
 * truncateMiddle('1234567890abcdef', 10); // '123[..]def'
 */
export function truncateMiddle(text: string, maxWidth: number): string {
  const width = clampWidth(maxWidth);

  if (displayWidth(text) <= width) {
    return text;
  }

  if (width < MIN_TRUNCATE_WIDTH) {
    if (width >= TRUNCATION_MARKER.length) {
      return TRUNCATION_MARKER;
    }
    return takeHead(text, width);
  }

  const keep = Math.floor(width / 2) - 2;
  return `${takeHead(text, keep)}${TRUNCATION_MARKER}${takeTail(text, keep)}`;
}
