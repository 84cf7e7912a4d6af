import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';

// ── Browser block ───────────────────────────────────────────

export const browserKindSchema = z.enum(['chrome', 'edge', 'firefox', 'safari']);

export type BrowserKind = z.infer<typeof browserKindSchema>;

export const windowSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type WindowSize = z.infer<typeof windowSizeSchema>;

export const browserConfigSchema = z.object({
  name: browserKindSchema.optional().default('chrome'),
  headless: z.boolean().optional().default(false),
  window_size: windowSizeSchema.optional().default({ width: 1920, height: 1080 }),
});

// ── Timeouts block (seconds, as written in the file) ────────

const seconds = (ms: number): number => ms / 1000;

export const timeoutsConfigSchema = z.object({
  implicit_wait: z.number().positive().optional().default(seconds(TIMEOUTS.IMPLICIT_WAIT)),
  explicit_wait: z.number().positive().optional().default(seconds(TIMEOUTS.EXPLICIT_WAIT)),
  page_load_timeout: z.number().positive().optional().default(seconds(TIMEOUTS.PAGE_LOAD)),
  error_detection: z.number().positive().optional().default(seconds(TIMEOUTS.ERROR_DETECTION)),
  social_login: z.number().positive().optional().default(seconds(TIMEOUTS.SOCIAL_LOGIN)),
  fallback_strategy: z.number().positive().optional().default(seconds(TIMEOUTS.FALLBACK_STRATEGY)),
  poll_interval: z.number().positive().max(1).optional().default(seconds(TIMEOUTS.POLL_INTERVAL)),
});

// ── URLs and paths ──────────────────────────────────────────

export const urlsConfigSchema = z.object({
  base_url: z.string().url(),
  login_url: z.string().url().optional(),
});

export const pathsConfigSchema = z.object({
  login_path: z.string().optional().default('/login'),
  reset_password_path: z.string().optional().default('/u/login/password-reset-start'),
  signup_path: z.string().optional().default('/register'),
  dashboard_path: z.string().optional().default('/home'),
});

// ── Reporting / logging ─────────────────────────────────────

export const reportingConfigSchema = z.object({
  reports_dir: z.string().min(1).optional().default('reports'),
  screenshot_on_failure: z.boolean().optional().default(true),
  save_page_source_on_failure: z.boolean().optional().default(true),
  save_console_logs_on_failure: z.boolean().optional().default(true),
});

export const loggingConfigSchema = z.object({
  verbose: z.boolean().optional().default(false),
});

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  browser: browserConfigSchema.optional().default({}),
  timeouts: timeoutsConfigSchema.optional().default({}),
  urls: urlsConfigSchema,
  paths: pathsConfigSchema.optional().default({}),
  reporting: reportingConfigSchema.optional().default({}),
  logging: loggingConfigSchema.optional().default({}),
  workers: z.number().int().positive().optional().default(1),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved settings (what the core receives) ──────────────

/** All durations in milliseconds. */
export interface TimeoutSettings {
  implicitWait: number;
  explicitWait: number;
  pageLoad: number;
  errorDetection: number;
  socialLogin: number;
  fallbackStrategy: number;
  pollInterval: number;
}

export interface Settings {
  browser: {
    kind: BrowserKind;
    headless: boolean;
    windowSize: WindowSize;
  };
  baseUrl: string;
  loginUrl: string;
  paths: {
    login: string;
    resetPassword: string;
    signup: string;
    dashboard: string;
  };
  timeouts: TimeoutSettings;
  reporting: {
    reportsDir: string;
    screenshotOnFailure: boolean;
    pageSourceOnFailure: boolean;
    consoleLogsOnFailure: boolean;
  };
  verbose: boolean;
  workers: number;
}
