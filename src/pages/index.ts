/**
 * Page models. Each one holds the session's PageToolkit and declares only
 * its own locators and operations.
 */

import type { Settings } from '../schema/index.js';
import type { RemoteBrowserSession } from '../browser/session.js';
import type { StaleRetryPolicy } from '../core/interactions.js';
import { DashboardPage } from './dashboard.js';
import { HomePage } from './home.js';
import { LoginPage } from './login.js';
import { PasswordResetPage } from './password-reset.js';
import { RegistrationPage } from './registration.js';
import { createToolkit } from './toolkit.js';
import type { PageToolkit } from './toolkit.js';

export interface PageModels {
  readonly toolkit: PageToolkit;
  readonly login: LoginPage;
  readonly dashboard: DashboardPage;
  readonly home: HomePage;
  readonly registration: RegistrationPage;
  readonly passwordReset: PasswordResetPage;
}

export function createPageModels(
  session: RemoteBrowserSession,
  settings: Settings,
  retry?: StaleRetryPolicy,
): PageModels {
  const toolkit = createToolkit(session, settings, retry);
  return {
    toolkit,
    login: new LoginPage(toolkit),
    dashboard: new DashboardPage(toolkit),
    home: new HomePage(toolkit),
    registration: new RegistrationPage(toolkit),
    passwordReset: new PasswordResetPage(toolkit),
  };
}

export { createToolkit } from './toolkit.js';
export type { PageToolkit } from './toolkit.js';
export { LoginPage, LOGIN_LOCATORS, SOCIAL_PROVIDERS, parseSocialProvider } from './login.js';
export type {
  LoginState,
  LoginOutcome,
  ErrorMessage,
  ErrorSource,
  SocialProvider,
  LoginField,
  LoginPageInfo,
} from './login.js';
export { DashboardPage, DASHBOARD_LOCATORS, FEATURE_LOCATORS, ROLE_FEATURES } from './dashboard.js';
export type {
  DashboardFeature,
  LoginValidation,
  RoleVerification,
  DashboardErrors,
} from './dashboard.js';
export { HomePage, HOME_LOCATORS } from './home.js';
export type { HomePageInfo } from './home.js';
export { RegistrationPage, REGISTRATION_LOCATORS } from './registration.js';
export type { RequiredFieldsReport, FormElementsReport } from './registration.js';
export { PasswordResetPage, RESET_LOCATORS, RESET_URL_PATTERNS } from './password-reset.js';
export {
  pathOf,
  pathContains,
  normalizeHost,
  hostMatches,
  assertPathContains,
  assertProviderHost,
  verifyRedirect,
  verifyProviderRedirect,
} from './url-checks.js';
export { findAuthCookies, navigateTo, waitForPageLoad } from './common.js';
