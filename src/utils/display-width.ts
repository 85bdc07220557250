/**
 * Terminal display-width helpers.
 *
 * Widths are terminal columns as string-width counts them: colour codes
 * take none, CJK and emoji take two.
 */

import sliceAnsi from 'slice-ansi';
import stringWidth from 'string-width';

export function displayWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Pad with spaces up to a display width. Longer text is left as is.
 */
export function padDisplay(text: string, width: number): string {
  const missing = width - stringWidth(text);
  return missing > 0 ? text + ' '.repeat(missing) : text;
}

/**
 * Cut text to at most `width` columns, keeping colour codes intact.
 *
 * A wide character that would straddle the edge is dropped and the gap
 * padded, so a clipped result is always exactly `width` columns.
 */
export function clipDisplay(text: string, width: number): string {
  if (stringWidth(text) <= width) {
    return text;
  }
  return padDisplay(sliceAnsi(text, 0, width), width);
}

/**
 * Everything from display column `start` onwards.
 */
export function sliceDisplayFrom(text: string, start: number): string {
  // slice-ansi defaults `end` to the code point count, short of wide text
  return sliceAnsi(text, start, stringWidth(text));
}

/**
 * Longest run of leading code points that fits in `width` columns.
 */
export function takeHead(text: string, width: number): string {
  let head = '';
  let used = 0;
  for (const char of text) {
    const charWidth = stringWidth(char);
    if (used + charWidth > width) {
      break;
    }
    head += char;
    used += charWidth;
  }
  return head;
}

/**
 * Longest run of trailing code points that fits in `width` columns.
 */
export function takeTail(text: string, width: number): string {
  const chars = Array.from(text);
  let start = chars.length;
  let used = 0;
  while (start > 0) {
    const charWidth = stringWidth(chars[start - 1]);
    if (used + charWidth > width) {
      break;
    }
    used += charWidth;
    start--;
  }
  return chars.slice(start).join('');
}
