/**
 * Process exit codes returned by the CLI commands.
 *
 * Stopping `watch` with Ctrl+C is a normal end, so it exits with SUCCESS.
 */

export const EXIT_CODE = {
  SUCCESS: 0,

  /** Config, snapshot or unexpected failure */
  ERROR: 1,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];
