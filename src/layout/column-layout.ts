/**
 * Breakpoint-driven column layout.
 *
 * Each table registers a small set of layouts keyed by minimum terminal
 * width. On every draw the resolver picks the widest layout whose key is
 * strictly below the current width and spreads any leftover width between
 * the columns.
 */

import { clampWidth } from './truncate-middle.js';

/**
 * Number of columns a layout displays.
 */
export type ColumnCount = 'two' | 'three' | 'four';

/**
 * Numeric arity of a column count.
 */
export function columnCountValue(count: ColumnCount): number {
  switch (count) {
    case 'two': {
      return 2;
    }
    case 'three': {
      return 3;
    }
    case 'four': {
      return 4;
    }
  }
}

/**
 * One breakpoint entry.
 */
export interface ColumnLayout {
  readonly columnCount: ColumnCount;

  /** One width per displayed column, left to right */
  readonly columnWidths: readonly number[];
}

/**
 * Output of {@link resolveLayout}.
 */
export interface ResolvedLayout {
  readonly columnCount: ColumnCount;
  readonly columnWidths: readonly number[];

  /** Blank cells between adjacent columns */
  readonly columnSpacing: number;
}

function assertLayout(minWidth: number, layout: ColumnLayout): void {
  if (!Number.isInteger(minWidth) || minWidth < 0) {
    throw new Error(
      `Breakpoint width must be a non-negative integer. Got: ${minWidth}`
    );
  }
  const expected = columnCountValue(layout.columnCount);
  if (layout.columnWidths.length !== expected) {
    throw new Error(
      `Breakpoint ${minWidth} declares ${expected} columns but ` +
        `${layout.columnWidths.length} widths`
    );
  }
  for (const width of layout.columnWidths) {
    if (!Number.isInteger(width) || width < 0) {
      throw new Error(
        `Column widths must be non-negative integers. Got: ${width} at breakpoint ${minWidth}`
      );
    }
  }
}

/**
 * Breakpoints of one table, kept in ascending key order.
 *
 * The 0-width layout is taken by the constructor so that every table has a
 * layout for arbitrarily narrow terminals.
 */
export class BreakpointTable {
  private readonly layouts = new Map<number, ColumnLayout>();

  constructor(baseLayout: ColumnLayout) {
    this.set(0, baseLayout);
  }

  /**
   * Register (or replace) the layout used above `minWidth` columns.
   *
   * @throws Error if the width count does not match the column count
   */
  set(minWidth: number, layout: ColumnLayout): this {
    assertLayout(minWidth, layout);
    this.layouts.set(minWidth, layout);
    return this;
  }

  /**
   * Breakpoints sorted by minimum width, ascending.
   */
  entries(): Array<[number, ColumnLayout]> {
    return [...this.layouts.entries()].toSorted(([a], [b]) => a - b);
  }

  /**
   * Largest column count any breakpoint displays.
   */
  maxColumnCount(): number {
    let max = 0;
    for (const layout of this.layouts.values()) {
      max = Math.max(max, columnCountValue(layout.columnCount));
    }
    return max;
  }
}

/**
 * Pick the active layout for a terminal width.
 *
 * The last breakpoint (in ascending order) whose key is strictly less than
 * the width wins. Leftover width is divided evenly between columns; when
 * the columns do not fit even without gaps the spacing is 0 and the
 * drawing layer clips.
 *
 * @param breakpoints - Table breakpoints
 * @param terminalWidth - Available width; negative or non-finite counts as 0
 */
export function resolveLayout(
  breakpoints: BreakpointTable,
  terminalWidth: number
): ResolvedLayout {
  const width = clampWidth(terminalWidth);
  const sorted = breakpoints.entries();

  // Lowest entry is always the 0 breakpoint
  let [, active] = sorted[0];
  for (const [minWidth, layout] of sorted) {
    if (minWidth < width) {
      active = layout;
    }
  }

  const count = columnCountValue(active.columnCount);
  const totalWidth = active.columnWidths.reduce((sum, w) => sum + w, 0);

  let columnSpacing = 0;
  if (width >= totalWidth - count) {
    columnSpacing = Math.max(0, Math.floor((width - totalWidth) / count));
  }

  return {
    columnCount: active.columnCount,
    columnWidths: active.columnWidths,
    columnSpacing,
  };
}

/**
 * Select the logical columns shown for a column count.
 *
 * With two columns the middle of the three logical columns is dropped,
 * leaving columns 0 and 2.
 */
export function projectColumns<T>(
  cells: readonly T[],
  count: ColumnCount
): T[] {
  switch (count) {
    case 'two': {
      return [cells[0], cells[2]];
    }
    case 'three': {
      return cells.slice(0, 3);
    }
    case 'four': {
      return cells.slice(0, 4);
    }
  }
}
