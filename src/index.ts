#!/usr/bin/env node
/**
 * Main entry point for the netgauge CLI.
 *
 * This module sets up Commander.js with subcommands for rendering a
 * bandwidth dashboard from a monitoring snapshot, once or continuously.
 */

/* eslint-disable unicorn/no-process-exit, n/no-process-exit */
// This is a CLI entry point - process.exit() is appropriate here

import { Command } from 'commander';
import { renderCommand, type RenderOptions } from './commands/render.js';
import { watchCommand } from './commands/watch.js';
import { ConfigLoader } from './config/config-loader.js';
import { VIEW_NAMES } from './config/i-config.js';
import { EXIT_CODE } from './constants/exit-codes.js';
import { TerminalDisplay } from './display/terminal-display.js';
import { collectView, parsePositiveInteger } from './utils/cli-options.js';

function addRenderOptions(command: Command): Command {
  return command
    .argument('<snapshot>', 'Path to a monitoring snapshot JSON file')
    .option('--width <columns>', 'Frame width (default: terminal width)', parsePositiveInteger)
    .option('--height <rows>', 'Frame height (default: terminal height)', parsePositiveInteger)
    .option(
      '--view <name>',
      `View to show, repeatable (${VIEW_NAMES.join(', ')})`,
      collectView
    )
    .option('--config <path>', 'Path to configuration file')
    .option('--plain', 'Disable colors')
    .option('--verbose', 'Show the effective configuration');
}

const program = new Command();

program
  .name('netgauge')
  .description('Responsive bandwidth tables by process, connection and remote address')
  .version('0.1.0');

// Render command
addRenderOptions(
  program.command('render').description('Print one dashboard frame')
).action(async (snapshot: string, options: RenderOptions) => {
  try {
    // Instantiate dependencies (ONLY place with 'new')
    const display = new TerminalDisplay();
    const configLoader = new ConfigLoader();

    const exitCode = await renderCommand(snapshot, options, display, configLoader);
    if (exitCode !== EXIT_CODE.SUCCESS) {
      process.exit(exitCode);
    }
  } catch (error) {
    // Unexpected error (commands should return exit codes, not throw)
    new TerminalDisplay().showError(
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(EXIT_CODE.ERROR);
  }
});

// Watch command
addRenderOptions(
  program
    .command('watch')
    .description('Redraw the dashboard until interrupted')
).action(async (snapshot: string, options: RenderOptions) => {
  try {
    const display = new TerminalDisplay();
    const configLoader = new ConfigLoader();

    const exitCode = await watchCommand(snapshot, options, display, configLoader);
    if (exitCode !== EXIT_CODE.SUCCESS) {
      process.exit(exitCode);
    }
  } catch (error) {
    new TerminalDisplay().showError(
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(EXIT_CODE.ERROR);
  }
});

program.parse(process.argv);
