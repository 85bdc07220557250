/**
 * Unit tests for terminal size detection.
 */

import {
  getTerminalHeight,
  getTerminalWidth,
  resolveTerminalSize,
} from '../../utils/terminal-size.js';

describe('terminal size', () => {
  let originalColumns: number | undefined;
  let originalRows: number | undefined;

  beforeEach(() => {
    originalColumns = process.stdout.columns;
    originalRows = process.stdout.rows;
  });

  afterEach(() => {
    if (originalColumns !== undefined) {
      process.stdout.columns = originalColumns;
    } else {
      // @ts-expect-error: Allow setting to undefined for restoration
      process.stdout.columns = undefined;
    }
    if (originalRows !== undefined) {
      process.stdout.rows = originalRows;
    } else {
      // @ts-expect-error: Allow setting to undefined for restoration
      process.stdout.rows = undefined;
    }
  });

  describe('getTerminalWidth', () => {
    it('should return actual terminal width when columns is set', () => {
      process.stdout.columns = 96;
      expect(getTerminalWidth()).toBe(96);
    });

    it('should return 120 as default when columns is undefined', () => {
      // @ts-expect-error: Allow setting to undefined for testing
      process.stdout.columns = undefined;
      expect(getTerminalWidth()).toBe(120);
    });

    it('should use the given fallback', () => {
      // @ts-expect-error: Allow setting to undefined for testing
      process.stdout.columns = undefined;
      expect(getTerminalWidth(80)).toBe(80);
    });

    it('should handle edge case of 0 columns', () => {
      process.stdout.columns = 0;
      // 0 is falsy, so should default
      expect(getTerminalWidth()).toBe(120);
    });
  });

  describe('getTerminalHeight', () => {
    it('should return actual terminal height when rows is set', () => {
      process.stdout.rows = 50;
      expect(getTerminalHeight()).toBe(50);
    });

    it('should return 40 as default when rows is undefined', () => {
      // @ts-expect-error: Allow setting to undefined for testing
      process.stdout.rows = undefined;
      expect(getTerminalHeight()).toBe(40);
    });
  });

  describe('resolveTerminalSize', () => {
    it('should prefer explicit overrides', () => {
      process.stdout.columns = 200;
      process.stdout.rows = 60;

      expect(
        resolveTerminalSize({ width: 120, height: 40 }, { width: 70, height: 12 })
      ).toEqual({ width: 70, height: 12 });
    });

    it('should use the terminal size when no override is given', () => {
      process.stdout.columns = 200;
      process.stdout.rows = 60;

      expect(resolveTerminalSize({ width: 120, height: 40 }, { height: 12 })).toEqual({
        width: 200,
        height: 12,
      });
    });

    it('should fall back to defaults when output is not a terminal', () => {
      // @ts-expect-error: Allow setting to undefined for testing
      process.stdout.columns = undefined;
      // @ts-expect-error: Allow setting to undefined for testing
      process.stdout.rows = undefined;

      expect(resolveTerminalSize({ width: 100, height: 30 })).toEqual({
        width: 100,
        height: 30,
      });
    });
  });
});
