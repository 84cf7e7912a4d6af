import { by, defineLocator } from '../schema/index.js';
import type { RegistrationData } from '../schema/index.js';
import { joinUrl } from '../config/loader.js';
import * as log from '../utils/logger.js';
import { clickControl, enterField, isVisible, navigateTo } from './common.js';
import type { PageToolkit } from './toolkit.js';

export const REGISTRATION_LOCATORS = {
  firstName: defineLocator(
    'first name field',
    by.name('ulp-first-name'),
    by.id('first-name'),
    by.css("input[name*='first' i]"),
  ),
  lastName: defineLocator(
    'last name field',
    by.name('ulp-last-name'),
    by.id('last-name'),
    by.css("input[name*='last' i]"),
  ),
  email: defineLocator(
    'registration email field',
    by.name('email'),
    by.id('email'),
    by.css("input[type='email']"),
    by.css("input[name*='email' i]"),
    by.css("input[placeholder*='email' i]"),
  ),
  password: defineLocator(
    'registration password field',
    by.name('password'),
    by.id('password'),
    by.css("input[type='password']"),
  ),
  confirmPassword: defineLocator(
    'confirm password field',
    by.name('confirm-password'),
    by.id('confirm-password'),
    by.css("input[name*='confirm' i]"),
  ),
  createAccount: defineLocator(
    'create account button',
    by.css("button[type='submit']"),
    by.name('action'),
    by.xpath("//button[contains(text(), 'Create') or contains(text(), 'Sign up')]"),
  ),
  loginLink: defineLocator('login link', by.css("a[href*='/login']")),
  termsLink: defineLocator('terms link', by.css("a[href*='/terms']")),
  privacyLink: defineLocator('privacy link', by.css("a[href*='/privacy']")),
} as const;

export interface RequiredFieldsReport {
  allPresent: boolean;
  fields: {
    firstName: boolean;
    lastName: boolean;
    email: boolean;
  };
}

export interface FormElementsReport {
  firstName: boolean;
  lastName: boolean;
  email: boolean;
  password: boolean;
  createAccount: boolean;
}

export class RegistrationPage {
  constructor(private readonly kit: PageToolkit) {}

  async open(): Promise<void> {
    await navigateTo(this.kit, joinUrl(this.kit.settings.baseUrl, this.kit.settings.paths.signup));
  }

  async enterFirstName(value: string): Promise<void> {
    await enterField(this.kit, REGISTRATION_LOCATORS.firstName, value);
  }

  async enterLastName(value: string): Promise<void> {
    await enterField(this.kit, REGISTRATION_LOCATORS.lastName, value);
  }

  /** Everything before the first space is the first name. */
  async enterFullName(fullName: string): Promise<void> {
    const [first = '', ...rest] = fullName.trim().split(/\s+/);
    await this.enterFirstName(first);
    await this.enterLastName(rest.join(' '));
  }

  async enterEmail(value: string): Promise<void> {
    await enterField(this.kit, REGISTRATION_LOCATORS.email, value);
  }

  async enterPassword(value: string): Promise<void> {
    await enterField(this.kit, REGISTRATION_LOCATORS.password, value);
  }

  async enterConfirmPassword(value: string): Promise<void> {
    await enterField(this.kit, REGISTRATION_LOCATORS.confirmPassword, value);
  }

  async fillForm(data: RegistrationData): Promise<void> {
    await this.enterFirstName(data.first_name);
    await this.enterLastName(data.last_name);
    await this.enterEmail(data.email);
    await this.enterPassword(data.password);
    await this.enterConfirmPassword(data.confirm_password);
  }

  async clickCreateAccount(): Promise<void> {
    await clickControl(this.kit, REGISTRATION_LOCATORS.createAccount, { navigates: true });
  }

  async clickLoginLink(): Promise<void> {
    await clickControl(this.kit, REGISTRATION_LOCATORS.loginLink, { navigates: true });
  }

  async verifyRequiredFieldsPresent(): Promise<RequiredFieldsReport> {
    const fields = {
      firstName: await isVisible(this.kit, REGISTRATION_LOCATORS.firstName),
      lastName: await isVisible(this.kit, REGISTRATION_LOCATORS.lastName),
      email: await isVisible(this.kit, REGISTRATION_LOCATORS.email),
    };
    const missing = Object.entries(fields)
      .filter(([, present]) => !present)
      .map(([name]) => name);

    if (missing.length > 0) {
      log.detail(`Missing required fields: ${missing.join(', ')}`);
    }
    return { allPresent: missing.length === 0, fields };
  }

  async verifyFormElementsVisible(): Promise<FormElementsReport> {
    return {
      firstName: await isVisible(this.kit, REGISTRATION_LOCATORS.firstName),
      lastName: await isVisible(this.kit, REGISTRATION_LOCATORS.lastName),
      email: await isVisible(this.kit, REGISTRATION_LOCATORS.email),
      password: await isVisible(this.kit, REGISTRATION_LOCATORS.password),
      createAccount: await isVisible(this.kit, REGISTRATION_LOCATORS.createAccount),
    };
  }
}
