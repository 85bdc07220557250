/**
 * Configuration loader for netgauge.
 *
 * Loads and validates user configuration from JSON files.
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { ConfigErrorClassifier } from './config-error-classifier.js';
import { validateAndMerge } from './config-validator.js';
import type { IConfigLoader } from './i-config-loader.js';
import type { IConfig } from './i-config.js';
import { defaultConfig } from './i-config.js';

/** File name looked up in the working directory */
export const CONFIG_FILE_NAME = 'netgauge.config.json';

/**
 * Configuration loader class.
 */
export class ConfigLoader implements IConfigLoader {
  /**
   * @param cwd - Directory searched for the default config file
   */
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * Load configuration from a file path.
   *
   * Searches for configuration in the following order:
   * 1. Provided configPath parameter
   * 2. netgauge.config.json in the working directory
   * 3. Default configuration
   *
   * @param configPath - Optional path to configuration file
   * @returns Validated configuration object
   * @throws Error if the file cannot be read or parsed, or validation fails
   */
  async load(configPath?: string): Promise<IConfig> {
    let resolvedPath: string | null = null;

    if (configPath === undefined) {
      const defaultPath = path.resolve(this.cwd, CONFIG_FILE_NAME);
      if (existsSync(defaultPath)) {
        resolvedPath = defaultPath;
      }
    } else {
      if (configPath === '') {
        throw new Error(
          'Config file path cannot be empty.\n' +
            'Please provide a valid config file path.'
        );
      }
      resolvedPath = path.resolve(this.cwd, configPath);
    }

    if (!resolvedPath) {
      return { ...defaultConfig, views: [...defaultConfig.views] };
    }

    let userConfig: unknown;
    try {
      userConfig = JSON.parse(readFileSync(resolvedPath, 'utf8'));
    } catch (error) {
      const details = ConfigErrorClassifier.classify(error, resolvedPath);
      throw new Error(ConfigErrorClassifier.format(details, resolvedPath));
    }

    if (
      typeof userConfig !== 'object' ||
      userConfig === null ||
      Array.isArray(userConfig)
    ) {
      throw new Error(
        `Configuration must be a JSON object. Config file: ${resolvedPath}`
      );
    }

    return validateAndMerge({ ...userConfig });
  }
}
