/**
 * Standardized exit codes
 */

export const ExitCode = {
  /** Successful execution, including an explicit help request */
  SUCCESS: 0,
  /** Unexpected/unhandled error, including misdeclared arguments */
  UNEXPECTED_ERROR: 1,
  /** Invalid command-line usage */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

