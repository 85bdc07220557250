/**
 * Table model: the data for one dashboard view plus its breakpoints.
 *
 * A model is rebuilt from the monitoring snapshot on every redraw and
 * rendered into whatever region the dashboard assigns it.
 */

import {
  type BreakpointTable,
  projectColumns,
  resolveLayout,
} from '../layout/column-layout.js';
import { truncateMiddle } from '../layout/truncate-middle.js';
import type { Rect } from '../types/monitoring.js';
import type { IDrawingSurface, TableDrawRequest } from './i-drawing-surface.js';

export class TableModel {
  /**
   * @param title - Block title
   * @param columnNames - Every logical column, including ones narrow layouts hide
   * @param rows - One cell per logical column
   * @param breakpoints - Layouts keyed by minimum terminal width
   * @throws Error if rows are ragged or a breakpoint needs more columns than exist
   */
  constructor(
    readonly title: string,
    readonly columnNames: readonly string[],
    readonly rows: ReadonlyArray<readonly string[]>,
    readonly breakpoints: BreakpointTable
  ) {
    const columns = columnNames.length;

    if (breakpoints.maxColumnCount() > columns) {
      throw new Error(
        `Table "${title}" has ${columns} columns but a breakpoint displays ${breakpoints.maxColumnCount()}`
      );
    }
    const needsMiddleColumn = breakpoints
      .entries()
      .some(([, layout]) => layout.columnCount === 'two');
    if (needsMiddleColumn && columns < 3) {
      throw new Error(
        `Table "${title}" needs at least 3 columns for its two-column layout`
      );
    }

    for (const [index, row] of rows.entries()) {
      if (row.length !== columns) {
        throw new Error(
          `Row ${index} of table "${title}" has ${row.length} cells, expected ${columns}`
        );
      }
    }
  }

  /**
   * Compute what this table looks like at a given width.
   *
   * Picks the layout, drops hidden columns from the header and every row,
   * and middle-truncates each cell to its column width.
   */
  layout(width: number): TableDrawRequest {
    const { columnCount, columnWidths, columnSpacing } = resolveLayout(
      this.breakpoints,
      width
    );

    const rows = this.rows.map((row) =>
      projectColumns(row, columnCount).map((cell, column) =>
        truncateMiddle(cell, columnWidths[column])
      )
    );

    return {
      title: this.title,
      header: projectColumns(this.columnNames, columnCount),
      rows,
      columnWidths,
      columnSpacing,
    };
  }

  /**
   * Draw the table into a region of the surface.
   */
  render(surface: IDrawingSurface, rect: Rect): void {
    surface.drawTable(this.layout(rect.width), rect);
  }
}
