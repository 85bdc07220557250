/**
 * Drawing surface interface.
 *
 * Table models describe what to draw; a surface decides how. Tests inject
 * a recording surface, the CLI uses TerminalFrame.
 */

import type { Rect } from '../types/monitoring.js';

/**
 * A titled, bordered grid of text cells.
 */
export interface TableDrawRequest {
  title: string;

  /** Column names, already projected to the displayed columns */
  header: readonly string[];

  /** Body rows, one cell per displayed column, already truncated */
  rows: ReadonlyArray<readonly string[]>;

  columnWidths: readonly number[];

  /** Blank cells between adjacent columns */
  columnSpacing: number;
}

export interface IDrawingSurface {
  /**
   * Draw a table block into a region of the surface.
   *
   * Content that does not fit the region is clipped.
   *
   * @param request - Table content and geometry
   * @param rect - Target region
   */
  drawTable(request: TableDrawRequest, rect: Rect): void;
}
