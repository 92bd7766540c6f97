/**
 * Process exit codes for non-interactive commands
 *
 * @module cli/lib/exit-codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  NOT_FOUND: 1,
  INVALID_INPUT: 2,
  CONFIG_ERROR: 3,
  PERSISTENCE_ERROR: 4,
  UNEXPECTED_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
