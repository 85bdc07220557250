/**
 * Text-buffer drawing surface backed by cli-table3.
 *
 * A frame is a fixed grid of `width x height` cells held as one string per
 * row. Tables are rendered with cli-table3 and copied into their region,
 * clipped to it.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { HeaderColor } from '../config/i-config.js';
import type { Rect } from '../types/monitoring.js';
import {
  clipDisplay,
  displayWidth,
  padDisplay,
  sliceDisplayFrom,
  takeHead,
} from '../utils/display-width.js';
import type { IDrawingSurface, TableDrawRequest } from './i-drawing-surface.js';

/**
 * Options for {@link TerminalFrame}.
 */
export interface TerminalFrameOptions {
  /** Header row colour (default: yellow) */
  headerColor?: HeaderColor;

  /** Emit ANSI colours; `undefined` follows chalk's terminal detection */
  colors?: boolean;
}

export class TerminalFrame implements IDrawingSurface {
  private readonly lines: string[];
  private readonly chalk: chalk.Chalk;
  private readonly headerColor: HeaderColor;

  constructor(
    readonly width: number,
    readonly height: number,
    options: TerminalFrameOptions = {}
  ) {
    this.lines = Array.from({ length: Math.max(0, height) }, () => '');
    this.headerColor = options.headerColor ?? 'yellow';
    this.chalk =
      options.colors === undefined
        ? chalk
        : new chalk.Instance({ level: options.colors ? 1 : 0 });
  }

  /**
   * Render a table block and write it into the region.
   */
  public drawTable(request: TableDrawRequest, rect: Rect): void {
    const block = this.renderBlock(request).split('\n');
    const rows = Math.min(block.length, rect.height);

    for (let row = 0; row < rows; row++) {
      this.writeLine(rect.y + row, rect.x, rect.width, block[row]);
    }
  }

  /**
   * Buffer contents as lines, trailing rows included.
   */
  public getLines(): string[] {
    return [...this.lines];
  }

  public toString(): string {
    return this.lines.join('\n');
  }

  /**
   * Draw the bordered block with cli-table3.
   *
   * Only the outer border and the rule under the header are drawn; column
   * gaps are `columnSpacing` blanks wide.
   */
  private renderBlock(request: TableDrawRequest): string {
    const gap = (char: string): string => char.repeat(request.columnSpacing);
    const colorize = this.chalk[this.headerColor];

    const table = new Table({
      head: request.header.map((name) => colorize(name)),
      colWidths: [...request.columnWidths],
      wordWrap: false,
      chars: {
        'top': '─',
        'top-mid': gap('─'),
        'top-left': '┌',
        'top-right': '┐',
        'bottom': '─',
        'bottom-mid': gap('─'),
        'bottom-left': '└',
        'bottom-right': '┘',
        'left': '│',
        'left-mid': '├',
        'mid': '─',
        'mid-mid': gap('─'),
        'right': '│',
        'right-mid': '┤',
        'middle': gap(' '),
      },
      style: {
        'head': [],
        'border': [],
        'padding-left': 0,
        'padding-right': 0,
        'compact': true,
      },
    });

    for (const row of request.rows) {
      table.push([...row]);
    }

    return this.withTitle(table.toString(), request.title);
  }

  /**
   * Splice the title into the top border, after the corner.
   */
  private withTitle(block: string, title: string): string {
    const newline = block.indexOf('\n');
    const top = newline === -1 ? block : block.slice(0, newline);
    const rest = newline === -1 ? '' : block.slice(newline);

    const chars = Array.from(top);
    const inner = chars.slice(1, -1);
    if (inner.length === 0) {
      return block;
    }
    // Border characters are one column each
    const label = takeHead(title, inner.length);
    const border = inner.slice(displayWidth(label)).join('');
    return `${chars[0]}${label}${border}${chars.at(-1) ?? ''}${rest}`;
  }

  /**
   * Overwrite `width` columns of a buffer row starting at column `x`.
   */
  private writeLine(y: number, x: number, width: number, content: string): void {
    if (y < 0 || y >= this.lines.length || width <= 0) {
      return;
    }
    const left = Math.max(0, Math.min(x, this.width));
    const right = Math.min(left + width, this.width);
    if (right <= left) {
      return;
    }

    const existing = this.lines[y];
    const existingWidth = displayWidth(existing);
    const before = padDisplay(clipDisplay(existing, left), left);
    const region = clipDisplay(content, right - left);
    const tail = existingWidth > right ? sliceDisplayFrom(existing, right) : '';
    const padded = tail === '' ? region : padDisplay(region, right - left);

    this.lines[y] = before + padded + tail;
  }
}
