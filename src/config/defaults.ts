/**
 * Default configuration values.
 * Browser and timeout values are overridable via config file.
 */

export const DEFAULTS = {
  URL: 'https://tagmanager.google.com/',
  WAIT_SECONDS: 10,
  CONFIG_FILE: '.datalayer-watch.yaml',
} as const;

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  CALL_TIMEOUT: 5_000,
  POLL_INTERVAL: 1_000,
} as const;

export const BROWSER_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--no-sandbox',
  '--disable-dev-shm-usage',
] as const;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  LAUNCH_FAILED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
