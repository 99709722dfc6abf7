/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  DEPLOY_FAILED: 1,
  VALIDATION_FAILED: 1,
  INVALID_ARGS: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
