/**
 * Configuration module.
 * Loads and validates runtime config and test data from YAML files,
 * applies environment overrides, and resolves the settings object
 * the core receives. Zod-validated.
 */

export {
  TIMEOUTS,
  LIMITS,
  ERROR_KEYWORDS,
  AUTH_COOKIE_MARKERS,
  DEFAULT_CONFIG_PATH,
  DEFAULT_TEST_DATA_PATH,
} from './defaults.js';
export { loadConfigFile, loadTestData, resolveSettings, joinUrl } from './loader.js';
