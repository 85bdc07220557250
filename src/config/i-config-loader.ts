/**
 * Interface for configuration loading.
 */

import type { IConfig } from './i-config.js';

export interface IConfigLoader {
  /**
   * Load configuration, falling back to defaults when no file exists.
   *
   * @param configPath - Optional explicit path to a configuration file
   * @returns Validated configuration
   */
  load(configPath?: string): Promise<IConfig>;
}
