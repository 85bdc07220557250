/**
 * Terminal size detection.
 *
 * For TTY output the real size is used. Pipes and files have no size, so
 * the configured defaults apply and output stays readable in logs.
 */

/**
 * Width and height in character cells.
 */
export interface TerminalSize {
  width: number;
  height: number;
}

/**
 * Gets the current terminal width in columns.
 *
 * @param fallback - Width for non-TTY output (default: 120)
 */
export function getTerminalWidth(fallback: number = 120): number {
  return process.stdout.columns || fallback;
}

/**
 * Gets the current terminal height in rows.
 *
 * @param fallback - Height for non-TTY output (default: 40)
 */
export function getTerminalHeight(fallback: number = 40): number {
  return process.stdout.rows || fallback;
}

/**
 * Resolve the drawing size, preferring explicit overrides.
 */
export function resolveTerminalSize(
  defaults: TerminalSize,
  overrides: Partial<TerminalSize> = {}
): TerminalSize {
  return {
    width: overrides.width ?? getTerminalWidth(defaults.width),
    height: overrides.height ?? getTerminalHeight(defaults.height),
  };
}
