/**
 * Watch command implementation.
 *
 * Re-reads the snapshot and redraws the dashboard on a fixed interval and
 * whenever the terminal is resized, until interrupted.
 */

import type { EventEmitter } from 'node:events';
import type { IConfigLoader } from '../config/i-config-loader.js';
import type { IConfig } from '../config/i-config.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import { loadSnapshot } from '../snapshot/snapshot-loader.js';
import { renderFrame, type RenderOptions } from './render.js';

/**
 * Handle for a running redraw loop.
 */
export interface WatchHandle {
  /** Stop redrawing and detach the resize listener */
  stop(): void;
}

/**
 * Start the redraw loop. Draws once immediately.
 *
 * A frame that fails (e.g. the snapshot is mid-write) is reported and the
 * loop carries on with the next tick.
 *
 * @param terminal - Emits 'resize' when the terminal size changes
 */
export function startWatch(
  snapshotPath: string,
  options: RenderOptions,
  config: IConfig,
  display: IDisplay,
  terminal: EventEmitter = process.stdout
): WatchHandle {
  const draw = (): void => {
    try {
      const loaded = loadSnapshot(snapshotPath);
      display.showFrame(renderFrame(loaded, config, options), true);
    } catch (error) {
      display.showError(error instanceof Error ? error.message : String(error));
    }
  };

  draw();
  const timer = setInterval(draw, config.refreshInterval);
  terminal.on('resize', draw);

  return {
    stop: () => {
      clearInterval(timer);
      terminal.off('resize', draw);
    },
  };
}

/**
 * Resolve on the first SIGINT (Ctrl+C).
 */
export function waitForInterrupt(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
  });
}

/**
 * Execute the watch command.
 * This is the entry point called by Commander.js.
 *
 * @param until - Resolves when the loop should end (default: Ctrl+C)
 * @returns EXIT_CODE.SUCCESS once interrupted, EXIT_CODE.ERROR if the config fails
 */
export async function watchCommand(
  snapshotPath: string,
  options: RenderOptions,
  display: IDisplay,
  configLoader: IConfigLoader,
  until: () => Promise<void> = waitForInterrupt
): Promise<ExitCode> {
  let config: IConfig;
  try {
    config = await configLoader.load(options.config);
  } catch (error) {
    display.showError(error instanceof Error ? error.message : String(error));
    return EXIT_CODE.ERROR;
  }

  if (options.verbose) {
    display.showConfig(config);
  }

  const handle = startWatch(snapshotPath, options, config, display);
  try {
    await until();
  } finally {
    handle.stop();
  }
  return EXIT_CODE.SUCCESS;
}
