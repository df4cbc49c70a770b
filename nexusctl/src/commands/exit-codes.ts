/**
 * CLI exit codes. A user declining the confirmation prompt is a clean exit.
 */
export const EXIT = {
  SUCCESS: 0,
  STAGE_FAILED: 1,
  PRECONDITION: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
