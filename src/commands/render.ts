/**
 * Render command implementation.
 *
 * This command loads a monitoring snapshot and prints one dashboard frame
 * sized to the terminal (or to explicit --width/--height).
 */

import type { IConfigLoader } from '../config/i-config-loader.js';
import type { IConfig } from '../config/i-config.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import { renderDashboard } from '../display/dashboard.js';
import type { IDisplay } from '../display/i-display.js';
import { TerminalFrame } from '../display/terminal-frame.js';
import type { LoadedSnapshot } from '../snapshot/snapshot-loader.js';
import { loadSnapshot } from '../snapshot/snapshot-loader.js';
import type { ViewName } from '../types/monitoring.js';
import { resolveTerminalSize } from '../utils/terminal-size.js';

/**
 * Options shared by the render and watch commands.
 */
export interface RenderOptions {
  width?: number;
  height?: number;
  view?: ViewName[];
  config?: string;
  verbose?: boolean;
  plain?: boolean;
}

/**
 * Draw one frame of the dashboard.
 *
 * @returns Frame text, one line per terminal row
 */
export function renderFrame(
  loaded: LoadedSnapshot,
  config: IConfig,
  options: RenderOptions
): string {
  const size = resolveTerminalSize(
    { width: config.defaultWidth, height: config.defaultHeight },
    { width: options.width, height: options.height }
  );
  const views =
    options.view && options.view.length > 0 ? options.view : config.views;

  const frame = new TerminalFrame(size.width, size.height, {
    headerColor: config.headerColor,
    colors: options.plain ? false : undefined,
  });
  renderDashboard(loaded.snapshot, loaded.hostnames, frame, size, views);
  return frame.toString();
}

/**
 * Core render logic (extracted for testability).
 *
 * @param snapshotPath - Path to the snapshot JSON file
 * @param options - Command options
 * @param display - Display instance (dependency injection)
 * @param configLoader - Config loader instance (dependency injection)
 */
export async function renderCore(
  snapshotPath: string,
  options: RenderOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<void> {
  const config = await configLoader.load(options.config);
  if (options.verbose) {
    display.showConfig(config);
  }

  const loaded = loadSnapshot(snapshotPath);
  display.showFrame(renderFrame(loaded, config, options));
}

/**
 * Execute the render command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function renderCommand(
  snapshotPath: string,
  options: RenderOptions,
  display: IDisplay,
  configLoader: IConfigLoader
): Promise<ExitCode> {
  try {
    await renderCore(snapshotPath, options, display, configLoader);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    display.showError(error instanceof Error ? error.message : String(error));
    return EXIT_CODE.ERROR;
  }
}
