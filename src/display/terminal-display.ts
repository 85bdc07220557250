/**
 * Terminal display implementation with formatted output.
 *
 * This class provides terminal output using chalk for colors. Tables are
 * drawn by TerminalFrame; this class only prints what it is handed.
 */

import chalk from 'chalk';
import type { IConfig } from '../config/i-config.js';
import type { IDisplay } from './i-display.js';

/** Clear screen, then move the cursor to the top-left corner */
const CLEAR_SCREEN = '\u001B[2J\u001B[H';

/**
 * Terminal display implementation with rich formatting.
 */
export class TerminalDisplay implements IDisplay {
  /**
   * Print a rendered frame.
   */
  public showFrame(frame: string, clear: boolean = false): void {
    if (clear) {
      process.stdout.write(CLEAR_SCREEN + frame);
      return;
    }
    console.log(frame);
  }

  /**
   * Display configuration information.
   */
  public showConfig(config: IConfig): void {
    console.log(chalk.bold('Configuration:'));
    console.log(`  Default size: ${chalk.cyan(`${config.defaultWidth}x${config.defaultHeight}`)}`);
    console.log(`  Header color: ${chalk.cyan(config.headerColor)}`);
    console.log(`  Refresh interval: ${chalk.cyan(`${config.refreshInterval}ms`)}`);
    console.log(`  Views: ${chalk.cyan(config.views.join(', '))}`);
    console.log('');
  }

  /**
   * Display an error message.
   */
  public showError(message: string): void {
    console.error(chalk.red('Error: ') + message);
  }
}
