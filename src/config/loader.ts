import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { browserKindSchema, fileConfigSchema, testDataSchema } from '../schema/index.js';
import type { FileConfig, Settings, TestData } from '../schema/index.js';

// ── Raw file parsing ────────────────────────────────────────

async function readStructured(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');

  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate an `authprobe.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  return fileConfigSchema.parse(await readStructured(configPath));
}

/**
 * Load the scenario test data file, then apply credential overrides
 * from the environment so real secrets never live in the repo.
 */
export async function loadTestData(
  dataPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TestData> {
  const data = testDataSchema.parse(await readStructured(dataPath));

  const valid = { ...data.valid_credentials };
  if (env['TEST_EMAIL']) valid.email = env['TEST_EMAIL'];
  if (env['TEST_PASSWORD']) valid.password = env['TEST_PASSWORD'];
  if (env['TEST_DISPLAY_NAME']) valid.display_name = env['TEST_DISPLAY_NAME'];

  return { ...data, valid_credentials: valid };
}

/**
 * Turn a validated file config plus environment overrides into the
 * settings object handed to the core. Seconds become milliseconds here;
 * nothing downstream reads the environment.
 */
export function resolveSettings(
  file: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const kind = env['BROWSER']
    ? browserKindSchema.parse(env['BROWSER'].toLowerCase())
    : file.browser.name;

  const headless =
    env['HEADLESS'] !== undefined
      ? env['HEADLESS'].toLowerCase() === 'true'
      : file.browser.headless;

  const baseUrl = env['BASE_URL'] ?? file.urls.base_url;
  const loginUrl =
    env['LOGIN_URL'] ?? file.urls.login_url ?? joinUrl(baseUrl, file.paths.login_path);

  return {
    browser: {
      kind,
      headless,
      windowSize: { ...file.browser.window_size },
    },
    baseUrl,
    loginUrl,
    paths: {
      login: file.paths.login_path,
      resetPassword: file.paths.reset_password_path,
      signup: file.paths.signup_path,
      dashboard: file.paths.dashboard_path,
    },
    timeouts: {
      implicitWait: seconds(file.timeouts.implicit_wait),
      explicitWait: seconds(file.timeouts.explicit_wait),
      pageLoad: seconds(file.timeouts.page_load_timeout),
      errorDetection: seconds(file.timeouts.error_detection),
      socialLogin: seconds(file.timeouts.social_login),
      fallbackStrategy: seconds(file.timeouts.fallback_strategy),
      pollInterval: seconds(file.timeouts.poll_interval),
    },
    reporting: {
      reportsDir: env['REPORTS_DIR'] ?? file.reporting.reports_dir,
      screenshotOnFailure: file.reporting.screenshot_on_failure,
      pageSourceOnFailure: file.reporting.save_page_source_on_failure,
      consoleLogsOnFailure: file.reporting.save_console_logs_on_failure,
    },
    verbose: file.logging.verbose,
    workers: file.workers,
  };
}

// ── Helpers ─────────────────────────────────────────────────

/** Join a base URL and an absolute path without doubling the slash. */
export function joinUrl(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}

function seconds(value: number): number {
  return Math.round(value * 1000);
}
