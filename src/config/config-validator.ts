/**
 * Configuration validation functions.
 *
 * Pure functions for validating and merging user configuration with defaults.
 * Separated from ConfigLoader to enable testing without file I/O.
 */

import type { ViewName } from '../types/monitoring.js';
import type { HeaderColor, IConfig } from './i-config.js';
import { defaultConfig, HEADER_COLORS, VIEW_NAMES } from './i-config.js';

function isHeaderColor(value: unknown): value is HeaderColor {
  return HEADER_COLORS.some((color) => color === value);
}

function isViewName(value: unknown): value is ViewName {
  return VIEW_NAMES.some((view) => view === value);
}

function validateDimension(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TypeError(
      `${name} must be a finite number (not Infinity or NaN). Got: ${String(value)}`
    );
  }
  if (!Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer (not a decimal)`);
  }
  if (value <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return value;
}

/**
 * Validate user configuration and merge with defaults.
 *
 * @param userConfig - Parsed configuration file contents
 * @returns Validated and merged configuration
 * @throws Error if validation fails
 */
export function validateAndMerge(userConfig: Record<string, unknown>): IConfig {
  const config: IConfig = {
    ...defaultConfig,
    views: [...defaultConfig.views],
  };

  const knownKeys = new Set<string>(Object.keys(defaultConfig));
  for (const key of Object.keys(userConfig)) {
    if (!knownKeys.has(key)) {
      console.warn(`Warning: unknown configuration key "${key}" is ignored`);
    }
  }

  if (userConfig.defaultWidth !== undefined) {
    config.defaultWidth = validateDimension(
      'defaultWidth',
      userConfig.defaultWidth
    );
  }

  if (userConfig.defaultHeight !== undefined) {
    config.defaultHeight = validateDimension(
      'defaultHeight',
      userConfig.defaultHeight
    );
  }

  // Validate headerColor
  if (userConfig.headerColor !== undefined) {
    if (!isHeaderColor(userConfig.headerColor)) {
      throw new Error(
        `Invalid headerColor: ${String(userConfig.headerColor)}. Must be one of: ${HEADER_COLORS.join(', ')}`
      );
    }
    config.headerColor = userConfig.headerColor;
  }

  // Validate refreshInterval
  if (userConfig.refreshInterval !== undefined) {
    const interval = validateDimension(
      'refreshInterval',
      userConfig.refreshInterval
    );
    if (interval < 100) {
      throw new Error(
        `refreshInterval must be at least 100 milliseconds. Got: ${interval}`
      );
    }
    if (interval > 60_000) {
      console.warn(
        `Warning: refreshInterval (${interval}ms) is very high. ` +
          `Did you mean ${interval / 1000} seconds? ` +
          `Recommended range: 250-5000 milliseconds.`
      );
    }
    config.refreshInterval = interval;
  }

  // Validate views array
  if (userConfig.views !== undefined) {
    if (!Array.isArray(userConfig.views)) {
      throw new TypeError('views must be an array of view names');
    }
    if (userConfig.views.length === 0) {
      throw new Error('views must name at least one view');
    }
    const views: ViewName[] = [];
    for (const view of userConfig.views) {
      if (!isViewName(view)) {
        throw new Error(
          `Invalid view: ${String(view)}. Must be one of: ${VIEW_NAMES.join(', ')}`
        );
      }
      if (views.includes(view)) {
        throw new Error(`Duplicate view: ${view}`);
      }
      views.push(view);
    }
    config.views = views;
  }

  return config;
}
