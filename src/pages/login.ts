import { by, defineLocator } from '../schema/index.js';
import type { ElementLocator } from '../schema/index.js';
import { ERROR_KEYWORDS } from '../config/defaults.js';
import { AssertionFailure, ResolutionTimeoutError } from '../core/errors.js';
import { poll } from '../core/wait.js';
import * as log from '../utils/logger.js';
import {
  clickControl,
  enterField,
  firstVisibleText,
  isPresent,
  navigateTo,
  pollWithin,
  visibleText,
} from './common.js';
import type { PageToolkit } from './toolkit.js';
import { pathContains, verifyProviderRedirect, verifyRedirect } from './url-checks.js';

// ── Locators ─────────────────────────────────────────────────

export const LOGIN_LOCATORS = {
  email: defineLocator(
    'email field',
    by.name('username'),
    by.id('username'),
    by.css("input[type='email']"),
    by.css("input[name*='email' i]"),
    by.css("input[placeholder*='email' i]"),
  ),
  password: defineLocator(
    'password field',
    by.name('password'),
    by.id('password'),
    by.css("input[type='password']"),
    by.css("input[name*='password' i]"),
    by.css("input[placeholder*='password' i]"),
  ),
  continueButton: defineLocator('continue button', by.css("button[type='submit']"), by.name('action')),
  passwordToggle: defineLocator('show/hide password button', by.css("button[data-action='toggle']")),
  forgotPassword: defineLocator(
    'forgot password link',
    by.css("a[href*='/u/login/password-reset-start']"),
  ),
  signUp: defineLocator('sign up link', by.css('.ulp-alternate-action a')),
  displayName: defineLocator('display name', by.css('.hui-globaluseritem__display-name span')),

  emailError: defineLocator('email error', by.id('error-element-username')),
  passwordError: defineLocator('password error', by.id('error-element-password')),
  inputError: defineLocator('input error', by.css('.ulp-input-error-message')),
  genericError: defineLocator('login error banner', by.css("[data-qa-id='login-error']")),
  credentialsError: defineLocator('invalid credentials banner', by.css('.ulp-error-message')),

  social: {
    google: defineLocator('Google login button', by.css("button[data-provider='google']")),
    facebook: defineLocator('Facebook login button', by.css("button[data-provider='facebook']")),
    apple: defineLocator('Apple login button', by.css("button[data-provider='apple']")),
  },
} as const;

/** Errors tied to one input. Authoritative. */
const FIELD_ERRORS: readonly ElementLocator[] = [
  LOGIN_LOCATORS.emailError,
  LOGIN_LOCATORS.passwordError,
  LOGIN_LOCATORS.inputError,
];

const BANNER_ERRORS: readonly ElementLocator[] = [
  LOGIN_LOCATORS.genericError,
  LOGIN_LOCATORS.credentialsError,
];

// ── Types ────────────────────────────────────────────────────

export type LoginState =
  | 'NotLoaded'
  | 'Loaded'
  | 'CredentialsEntered'
  | 'Submitted'
  | 'Authenticated'
  | 'RejectedWithError';

export type LoginOutcome = Extract<LoginState, 'Authenticated' | 'RejectedWithError'>;

const TRANSITIONS: Record<LoginState, readonly LoginState[]> = {
  NotLoaded: ['Loaded'],
  Loaded: ['Loaded', 'CredentialsEntered'],
  CredentialsEntered: ['Loaded', 'CredentialsEntered', 'Submitted'],
  Submitted: ['Loaded', 'CredentialsEntered', 'Submitted', 'Authenticated', 'RejectedWithError'],
  Authenticated: ['Loaded'],
  RejectedWithError: ['Loaded', 'CredentialsEntered', 'RejectedWithError'],
};

export type ErrorSource = 'field' | 'banner' | 'keyword-scan';

export interface ErrorMessage {
  text: string;
  source: ErrorSource;
}

export const SOCIAL_PROVIDERS = ['google', 'facebook', 'apple'] as const;
export type SocialProvider = (typeof SOCIAL_PROVIDERS)[number];

export type LoginField = 'email' | 'password';

export interface LoginPageInfo {
  url: string;
  title: string;
  passwordValue: string;
  loginButtonEnabled: boolean;
  hasErrors: boolean;
  errorMessage: string;
}

/** Lower-cases and strips quotes; throws on providers the page has no button for. */
export function parseSocialProvider(raw: string): SocialProvider {
  const value = raw.trim().replace(/^["']+|["']+$/g, '').toLowerCase();
  const provider = SOCIAL_PROVIDERS.find((p) => p === value);
  if (!provider) {
    throw new Error(`Unsupported social login provider: ${raw}`);
  }
  return provider;
}

// ── Page model ───────────────────────────────────────────────

export class LoginPage {
  private current: LoginState = 'NotLoaded';

  constructor(private readonly kit: PageToolkit) {}

  get state(): LoginState {
    return this.current;
  }

  async open(): Promise<void> {
    await navigateTo(this.kit, this.kit.settings.loginUrl);
    this.advance('Loaded');
  }

  async isLoaded(): Promise<boolean> {
    return (await this.kit.session.currentUrl()).toLowerCase().includes('login');
  }

  // ── Credentials ─────────────────────────────────────────

  async enterEmail(email: string): Promise<void> {
    await enterField(this.kit, LOGIN_LOCATORS.email, email);
    this.advance('CredentialsEntered');
  }

  async enterPassword(password: string): Promise<void> {
    await enterField(this.kit, LOGIN_LOCATORS.password, password);
    this.advance('CredentialsEntered');
  }

  async clearEmail(): Promise<void> {
    await this.kit.interactions.clear(LOGIN_LOCATORS.email);
    this.advance('CredentialsEntered');
  }

  async clearPassword(): Promise<void> {
    await this.kit.interactions.clear(LOGIN_LOCATORS.password);
    this.advance('CredentialsEntered');
  }

  async clickContinue(): Promise<void> {
    await clickControl(this.kit, LOGIN_LOCATORS.continueButton, { navigates: true });
    this.advance('Submitted');
  }

  /** Identifier-first flow: email, continue, password, continue. */
  async login(email: string, password: string): Promise<LoginOutcome> {
    await this.enterEmail(email);
    await this.clickContinue();
    await this.enterPassword(password);
    await this.clickContinue();
    return this.awaitOutcome();
  }

  /**
   * Wait for the submission to land: the dashboard path or display name
   * means Authenticated, a visible field or banner error means
   * RejectedWithError. Neither within the explicit wait aborts the step.
   */
  async awaitOutcome(): Promise<LoginOutcome> {
    const { session, settings } = this.kit;
    const outcome = await poll<LoginOutcome>(
      'login to succeed or show an error',
      async () => {
        if (pathContains(await session.currentUrl(), settings.paths.dashboard)) {
          return 'Authenticated';
        }
        if (await visibleText(session, LOGIN_LOCATORS.displayName)) {
          return 'Authenticated';
        }
        for (const locator of [...FIELD_ERRORS, ...BANNER_ERRORS]) {
          if (await visibleText(session, locator)) return 'RejectedWithError';
        }
        return null;
      },
      { timeout: settings.timeouts.explicitWait, pollInterval: settings.timeouts.pollInterval },
    );
    this.advance(outcome);
    return outcome;
  }

  // ── Controls ────────────────────────────────────────────

  async togglePasswordVisibility(): Promise<void> {
    await clickControl(this.kit, LOGIN_LOCATORS.passwordToggle);
  }

  async clickForgotPassword(): Promise<void> {
    await clickControl(this.kit, LOGIN_LOCATORS.forgotPassword, { navigates: true });
  }

  async clickSignUp(): Promise<void> {
    await clickControl(this.kit, LOGIN_LOCATORS.signUp, { navigates: true });
  }

  async clickSocialProvider(provider: string): Promise<void> {
    const parsed = parseSocialProvider(provider);
    await clickControl(this.kit, LOGIN_LOCATORS.social[parsed], { navigates: true });
  }

  async hasSocialLoginOptions(): Promise<boolean> {
    const timeout = this.kit.settings.timeouts.socialLogin;
    return (
      (await isPresent(this.kit, LOGIN_LOCATORS.social.google, timeout)) ||
      (await isPresent(this.kit, LOGIN_LOCATORS.social.facebook, timeout))
    );
  }

  async isLoginButtonEnabled(): Promise<boolean> {
    try {
      return await this.kit.interactions.isEnabled(LOGIN_LOCATORS.continueButton);
    } catch (err) {
      if (err instanceof ResolutionTimeoutError) return false;
      throw err;
    }
  }

  // ── Password field state ────────────────────────────────

  /** Reads the live `type` attribute: `text` is visible, anything else masked. */
  async isPasswordVisible(): Promise<boolean> {
    const type = await this.kit.interactions.readAttribute(LOGIN_LOCATORS.password, 'type');
    log.debug(`password field type: "${type}"`);
    return type === 'text';
  }

  async getPasswordValue(): Promise<string> {
    return this.kit.interactions.readProperty(LOGIN_LOCATORS.password, 'value', { optional: true });
  }

  // ── Errors ──────────────────────────────────────────────

  async getFieldError(field: LoginField): Promise<string> {
    const locator = field === 'email' ? LOGIN_LOCATORS.emailError : LOGIN_LOCATORS.passwordError;
    return this.kit.interactions.readText(locator, {
      optional: true,
      timeout: this.kit.settings.timeouts.errorDetection,
    });
  }

  /** HTML5 constraint-validation message of a field, `''` when valid. */
  async getValidationMessage(field: LoginField): Promise<string> {
    const locator = field === 'email' ? LOGIN_LOCATORS.email : LOGIN_LOCATORS.password;
    return this.kit.interactions.readProperty(locator, 'validationMessage', { optional: true });
  }

  /**
   * Field-scoped errors first, banners second, both polled together for
   * the error-detection budget. Only when neither shows up is visible
   * text scanned for failure keywords, and that result is tagged so
   * callers can tell it apart.
   */
  async findErrorMessage(options: { scan?: boolean } = {}): Promise<ErrorMessage | null> {
    const { session, settings } = this.kit;

    const located = await pollWithin<ErrorMessage>(
      this.kit,
      'login error message',
      async () => {
        for (const locator of FIELD_ERRORS) {
          const text = await visibleText(session, locator);
          if (text) return { text, source: 'field' };
        }
        for (const locator of BANNER_ERRORS) {
          const text = await visibleText(session, locator);
          if (text) return { text, source: 'banner' };
        }
        return null;
      },
      settings.timeouts.errorDetection,
    );
    if (located) {
      log.debug(`error message (${located.source}): "${located.text}"`);
      return located;
    }

    if (options.scan === false) return null;

    const scanned = await this.scanForErrorText();
    if (scanned) {
      log.debug(`error-like text found by keyword scan: "${scanned}"`);
      return { text: scanned, source: 'keyword-scan' };
    }
    return null;
  }

  async getErrorMessage(): Promise<string> {
    return (await this.findErrorMessage())?.text ?? '';
  }

  async hasErrorMessage(): Promise<boolean> {
    return (await this.findErrorMessage({ scan: false })) !== null;
  }

  /**
   * Assert a field or banner error is showing, optionally containing
   * `expected` (case-insensitive). Keyword-scan hits are reported in the
   * failure but never satisfy the assertion.
   */
  async verifyErrorMessage(expected?: string): Promise<string> {
    const found = await this.findErrorMessage();

    if (!found || found.source === 'keyword-scan') {
      const hint = found ? ` (page text mentions: "${found.text}")` : '';
      throw new AssertionFailure(
        `Expected an error message but none was displayed${hint}`,
        found?.text ?? '',
        expected ?? 'an error message',
      );
    }

    if (expected !== undefined && !found.text.toLowerCase().includes(expected.toLowerCase())) {
      throw new AssertionFailure(
        `Expected error message to contain "${expected}" but got "${found.text}"`,
        found.text,
        expected,
      );
    }

    this.advance('RejectedWithError');
    return found.text;
  }

  // ── Post-login ──────────────────────────────────────────

  async getDisplayName(): Promise<string> {
    return this.kit.interactions.readText(LOGIN_LOCATORS.displayName, { optional: true });
  }

  async isDisplayNameVisible(): Promise<boolean> {
    return this.kit.resolver.isResolvable(LOGIN_LOCATORS.displayName, 'visible');
  }

  async verifyRedirect(fragment: string): Promise<void> {
    await verifyRedirect(this.kit, fragment);
  }

  async verifyProviderRedirect(expectedProvider: string): Promise<void> {
    await verifyProviderRedirect(this.kit, expectedProvider);
  }

  async getPageInfo(): Promise<LoginPageInfo> {
    const { session } = this.kit;
    return {
      url: await session.currentUrl(),
      title: await session.title(),
      passwordValue: await this.getPasswordValue(),
      loginButtonEnabled: await this.isLoginButtonEnabled(),
      hasErrors: await this.hasErrorMessage(),
      errorMessage: await this.getErrorMessage(),
    };
  }

  // ── Internals ───────────────────────────────────────────

  private async scanForErrorText(): Promise<string | null> {
    const { session } = this.kit;
    for (const keyword of ERROR_KEYWORDS) {
      const text = await firstVisibleText(session, by.text(keyword));
      if (text) return text;
    }
    return null;
  }

  private advance(next: LoginState): void {
    if (TRANSITIONS[this.current].includes(next)) {
      this.current = next;
    } else {
      log.debug(`login state stays ${this.current}; ${next} not reachable from it`);
    }
  }
}
