import { by, defineLocator } from '../schema/index.js';
import { AssertionFailure } from '../core/errors.js';
import { clickControl, isPresent, isVisible, navigateTo } from './common.js';
import type { PageToolkit } from './toolkit.js';
import { pathOf } from './url-checks.js';

export const HOME_LOCATORS = {
  loginButton: defineLocator('home login button', by.css("[data-qa-id='login-select']")),
} as const;

export interface HomePageInfo {
  url: string;
  title: string;
  loginButtonVisible: boolean;
  loginButtonText: string;
  onHomePage: boolean;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export class HomePage {
  constructor(private readonly kit: PageToolkit) {}

  async open(): Promise<void> {
    await navigateTo(this.kit, this.kit.settings.baseUrl);
  }

  async clickLogin(): Promise<void> {
    await clickControl(this.kit, HOME_LOCATORS.loginButton, { navigates: true });
  }

  async isLoginButtonVisible(): Promise<boolean> {
    return isVisible(this.kit, HOME_LOCATORS.loginButton);
  }

  async getLoginButtonText(): Promise<string> {
    return this.kit.interactions.readText(HOME_LOCATORS.loginButton, { optional: true });
  }

  /** Root path, the base URL itself, or a visible login control. */
  async isOnHomePage(): Promise<boolean> {
    const url = await this.kit.session.currentUrl();
    if (trimSlash(url) === trimSlash(this.kit.settings.baseUrl) || pathOf(url) === '/') {
      return true;
    }
    return isPresent(this.kit, HOME_LOCATORS.loginButton);
  }

  /** Trailing slashes aside, the current URL must be the base URL. */
  async verifyAtBaseUrl(): Promise<void> {
    const url = await this.kit.session.currentUrl();
    const expected = trimSlash(this.kit.settings.baseUrl);
    if (trimSlash(url) !== expected) {
      throw new AssertionFailure(
        `Expected to be on the base website (${expected}) but the URL is ${url}`,
        url,
        expected,
      );
    }
  }

  async getPageInfo(): Promise<HomePageInfo> {
    return {
      url: await this.kit.session.currentUrl(),
      title: await this.kit.session.title(),
      loginButtonVisible: await this.isLoginButtonVisible(),
      loginButtonText: await this.getLoginButtonText(),
      onHomePage: await this.isOnHomePage(),
    };
  }
}
