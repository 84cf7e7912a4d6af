import { by, defineLocator } from '../schema/index.js';
import type { ElementLocator } from '../schema/index.js';
import { joinUrl } from '../config/loader.js';
import { clickControl, enterField, isPresent, navigateTo, pollWithin, visibleText } from './common.js';
import type { PageToolkit } from './toolkit.js';

export const RESET_URL_PATTERNS = [
  '/u/login/password-reset-start',
  '/password-reset',
  '/reset-password',
  '/forgot-password',
] as const;

export const RESET_LOCATORS = {
  email: defineLocator(
    'reset email field',
    by.name('email'),
    by.id('email'),
    by.css("input[type='email']"),
    by.css("input[name*='email' i]"),
    by.css("input[placeholder*='email' i]"),
  ),
  submit: defineLocator(
    'reset submit button',
    by.css("button[type='submit']"),
    by.css("input[type='submit']"),
    by.xpath("//button[contains(text(), 'Reset') or contains(text(), 'Send')]"),
  ),
  success: defineLocator('reset success message', by.css(".success, .alert-success, [class*='success']")),
  error: defineLocator('reset error message', by.css(".error, .alert-error, .alert-danger, [class*='error']")),
  backToLogin: defineLocator('back to login link', by.css("a[href*='login']")),
  anyEmailInput: defineLocator(
    'any email input',
    by.css("input[type='email'], input[name*='email'], input[placeholder*='email']"),
  ),
  form: defineLocator('any form', by.css('form')),
  anySubmit: defineLocator('any submit control', by.css("button, input[type='submit']")),
} as const;

export class PasswordResetPage {
  constructor(private readonly kit: PageToolkit) {}

  async open(): Promise<void> {
    await navigateTo(this.kit, joinUrl(this.kit.settings.baseUrl, this.kit.settings.paths.resetPassword));
  }

  async isOnPage(): Promise<boolean> {
    const url = await this.kit.session.currentUrl();
    return RESET_URL_PATTERNS.some((pattern) => url.includes(pattern));
  }

  async enterEmail(email: string): Promise<void> {
    await enterField(this.kit, RESET_LOCATORS.email, email);
  }

  async submit(): Promise<void> {
    await clickControl(this.kit, RESET_LOCATORS.submit, { navigates: true });
  }

  async clickBackToLogin(): Promise<void> {
    await clickControl(this.kit, RESET_LOCATORS.backToLogin, { navigates: true });
  }

  /**
   * Email field and submit button. When neither is found, any email input,
   * or a form with some submit control, still counts.
   */
  async hasResetFunctionality(): Promise<boolean> {
    const email = await isPresent(this.kit, RESET_LOCATORS.email);
    const submit = await isPresent(this.kit, RESET_LOCATORS.submit);
    if (email || submit) {
      return email && submit;
    }

    if (await isPresent(this.kit, RESET_LOCATORS.anyEmailInput)) return true;
    return (
      (await isPresent(this.kit, RESET_LOCATORS.form)) &&
      (await isPresent(this.kit, RESET_LOCATORS.anySubmit))
    );
  }

  async getSuccessMessage(): Promise<string | null> {
    return this.messageWithin(RESET_LOCATORS.success);
  }

  async getErrorMessage(): Promise<string | null> {
    return this.messageWithin(RESET_LOCATORS.error);
  }

  private async messageWithin(locator: ElementLocator): Promise<string | null> {
    return pollWithin(
      this.kit,
      locator.description,
      () => visibleText(this.kit.session, locator),
      this.kit.settings.timeouts.errorDetection,
    );
  }
}
