/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  IMPLICIT_WAIT: 10_000,
  EXPLICIT_WAIT: 20_000,
  PAGE_LOAD: 30_000,
  ERROR_DETECTION: 3_000,
  SOCIAL_LOGIN: 2_000,
  FALLBACK_STRATEGY: 3_000,
  POLL_INTERVAL: 250,
  STALE_RETRY_PAUSE: 500,
} as const;

export const LIMITS = {
  STALE_RETRY_ATTEMPTS: 3,
  MAX_CONSOLE_ENTRIES: 200,
  MAX_ARTIFACT_NAME_CHARS: 80,
} as const;

/** Case-insensitive words that mark visible text as a likely failure message. */
export const ERROR_KEYWORDS = [
  'incorrect',
  'invalid',
  'wrong',
  'error',
  'failed',
  'not found',
  'does not exist',
  'try again',
  'password',
] as const;

/** Cookie-name fragments that indicate an authenticated session. */
export const AUTH_COOKIE_MARKERS = ['auth', 'session', 'token', 'user'] as const;

export const DEFAULT_CONFIG_PATH = 'config/authprobe.yaml';
export const DEFAULT_TEST_DATA_PATH = 'config/test-data.yaml';
