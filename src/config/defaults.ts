/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const TIMING = {
  POLL_TICK_MS: 50,
  WATCH_INTERVAL_MS: 1_000,
  NAVIGATION_TIMEOUT_MS: 15_000,
  RUN_TIMEOUT_MS: 60_000,
} as const;

export const EXIT_CODES = {
  OK: 0,
  ACTION_FAILED: 1,
  CANCELLED: 3,
  USAGE: 4,
} as const;
