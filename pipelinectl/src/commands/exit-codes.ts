/**
 * CLI exit codes. Failing child processes propagate their own code instead.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;
