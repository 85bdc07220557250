/**
 * Configuration interface for netgauge.
 *
 * Configuration is read from `netgauge.config.json` in the working
 * directory, or from the file given with `--config`. Every key is optional;
 * missing keys fall back to {@link defaultConfig}.
 */

import type { ViewName } from '../types/monitoring.js';

/**
 * Colours accepted for the table header row.
 */
export const HEADER_COLORS = [
  'yellow',
  'cyan',
  'green',
  'magenta',
  'blue',
  'red',
  'white',
  'gray',
] as const;

export type HeaderColor = (typeof HEADER_COLORS)[number];

/**
 * Views the dashboard knows how to build.
 */
export const VIEW_NAMES: readonly ViewName[] = [
  'processes',
  'connections',
  'remote-addresses',
];

/**
 * Main configuration interface.
 */
export interface IConfig {
  /**
   * Width used when stdout is not a terminal (pipes, files).
   */
  defaultWidth: number;

  /**
   * Height used when stdout is not a terminal.
   */
  defaultHeight: number;

  /**
   * Colour of the header row in every table.
   */
  headerColor: HeaderColor;

  /**
   * Milliseconds between redraws in watch mode. Minimum 100.
   */
  refreshInterval: number;

  /**
   * Views to show, top to bottom.
   */
  views: ViewName[];
}

/**
 * Default configuration values.
 */
export const defaultConfig: IConfig = {
  defaultWidth: 120,
  defaultHeight: 40,
  headerColor: 'yellow',
  refreshInterval: 1000,
  views: ['processes', 'connections', 'remote-addresses'],
};
