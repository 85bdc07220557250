/**
 * Unit tests for TableModel layout and rendering.
 */

import { TableModel } from '../../display/table-model.js';
import { BreakpointTable } from '../../layout/column-layout.js';
import { RecordingSurface } from '../test-helpers.js';

function sampleBreakpoints(): BreakpointTable {
  return new BreakpointTable({
    columnCount: 'two',
    columnWidths: [10, 23],
  }).set(50, { columnCount: 'three', columnWidths: [12, 5, 23] });
}

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

describe('TableModel', () => {
  describe('constructor', () => {
    it('should reject rows with the wrong number of cells', () => {
      expect(
        () =>
          new TableModel(
            'T',
            ['Name', 'Count', 'Rate'],
            [['a', 'b', 'c'], ['only', 'two']],
            sampleBreakpoints()
          )
      ).toThrow('Row 1 of table "T" has 2 cells, expected 3');
    });

    it('should reject breakpoints wider than the table', () => {
      const breakpoints = sampleBreakpoints().set(140, {
        columnCount: 'four',
        columnWidths: [10, 10, 10, 10],
      });

      expect(
        () => new TableModel('T', ['Name', 'Count', 'Rate'], [], breakpoints)
      ).toThrow('Table "T" has 3 columns but a breakpoint displays 4');
    });

    it('should reject a two-column layout on a two-column table', () => {
      const breakpoints = new BreakpointTable({
        columnCount: 'two',
        columnWidths: [10, 10],
      });

      expect(() => new TableModel('T', ['A', 'B'], [], breakpoints)).toThrow(
        'Table "T" needs at least 3 columns for its two-column layout'
      );
    });
  });

  describe('render', () => {
    it('should draw the two-column projection on narrow regions', () => {
      const table = new TableModel(
        'Sample',
        ['Name', 'Count', 'Rate'],
        [[ALPHABET, '3', '1.00KBps / 2Bps']],
        sampleBreakpoints()
      );
      const surface = new RecordingSurface();
      const rect = { x: 0, y: 0, width: 40, height: 10 };

      table.render(surface, rect);

      expect(surface.calls).toEqual([
        {
          request: {
            title: 'Sample',
            header: ['Name', 'Rate'],
            rows: [['abc[..]xyz', '1.00KBps / 2Bps']],
            columnWidths: [10, 23],
            columnSpacing: 3,
          },
          rect,
        },
      ]);
    });

    it('should draw all three columns on wide regions', () => {
      const table = new TableModel(
        'Sample',
        ['Name', 'Count', 'Rate'],
        [[ALPHABET, '3', '1.00KBps / 2Bps']],
        sampleBreakpoints()
      );
      const surface = new RecordingSurface();

      table.render(surface, { x: 0, y: 0, width: 60, height: 10 });

      expect(surface.calls[0].request).toEqual({
        title: 'Sample',
        header: ['Name', 'Count', 'Rate'],
        rows: [['abcd[..]wxyz', '3', '1.00KBps / 2Bps']],
        columnWidths: [12, 5, 23],
        columnSpacing: 6,
      });
    });

    it('should drop the middle cell of every row in two-column mode', () => {
      const table = new TableModel(
        'Sample',
        ['Name', 'Count', 'Rate'],
        [
          ['one', 'hidden-1', 'r1'],
          ['two', 'hidden-2', 'r2'],
          ['three', 'hidden-3', 'r3'],
        ],
        sampleBreakpoints()
      );

      const { header, rows } = table.layout(30);

      expect(header).toEqual(['Name', 'Rate']);
      expect(rows).toEqual([
        ['one', 'r1'],
        ['two', 'r2'],
        ['three', 'r3'],
      ]);
    });

    it('should keep the stored rows intact', () => {
      const rows = [[ALPHABET, '3', 'rate']];
      const table = new TableModel(
        'Sample',
        ['Name', 'Count', 'Rate'],
        rows,
        sampleBreakpoints()
      );

      table.layout(20);

      expect(table.rows).toEqual([[ALPHABET, '3', 'rate']]);
    });

    it('should render an empty table', () => {
      const table = new TableModel(
        'Empty',
        ['Name', 'Count', 'Rate'],
        [],
        sampleBreakpoints()
      );

      expect(table.layout(80).rows).toEqual([]);
      expect(table.layout(80).header).toEqual(['Name', 'Count', 'Rate']);
    });
  });
});
