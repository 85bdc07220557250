/**
 * Display interface for terminal output.
 *
 * Commands should inject an IDisplay implementation (typically
 * TerminalDisplay) rather than using console.log directly.
 */

import type { IConfig } from '../config/i-config.js';

/**
 * Display interface for terminal output with dependency injection support.
 */
export interface IDisplay {
  /**
   * Print a rendered frame.
   *
   * @param frame - Frame text, one line per terminal row
   * @param clear - Clear the screen and home the cursor first (watch mode)
   */
  showFrame(frame: string, clear?: boolean): void;

  /**
   * Display configuration information (verbose mode).
   *
   * @param config - Configuration object to display
   */
  showConfig(config: IConfig): void;

  /**
   * Display an error message.
   */
  showError(message: string): void;
}
