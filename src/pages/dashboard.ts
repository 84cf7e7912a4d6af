import { by, defineLocator } from '../schema/index.js';
import type { ElementLocator } from '../schema/index.js';
import { WaitTimeoutError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { clickControl, isPresent, isVisible, pollWithin, visibleText } from './common.js';
import type { PageToolkit } from './toolkit.js';
import { pathContains, verifyRedirect } from './url-checks.js';

export const DASHBOARD_LOCATORS = {
  userMenu: defineLocator('user menu', by.css('.hui-globalusermenu'), by.css('.user-dropdown')),
  logout: defineLocator(
    'logout button',
    by.css("[data-qa-id='webnav-usermenu-logout']"),
    by.xpath("//a[contains(text(), 'Log Out') or contains(text(), 'Sign Out')]"),
  ),
  displayName: defineLocator(
    'display name',
    by.css('.hui-globaluseritem__display-name'),
    by.css('.user-display-name'),
  ),
  settings: defineLocator('settings link', by.css("[data-qa-id='settings-link']")),
  mainNav: defineLocator('main navigation', by.css('.main-nav')),
  content: defineLocator('dashboard content', by.css('.dashboard-content')),
  welcome: defineLocator('welcome message', by.css("[data-qa-id='welcome-message']")),
  teamInfo: defineLocator('team info', by.css("[data-qa-id='team-info']")),
  recentHighlights: defineLocator('recent highlights', by.css("[data-qa-id='recent-highlights']")),
  loading: defineLocator(
    'loading indicator',
    by.css('.dashboard-loading'),
    by.css('.content-loading'),
  ),
  errors: defineLocator(
    'dashboard error',
    by.css('.error-message'),
    by.css('.alert-error'),
    by.css("[data-qa-id='error']"),
  ),
} as const;

/** Controls whose presence reveals what the signed-in role may do. */
export const FEATURE_LOCATORS = {
  upload_video: defineLocator('upload video button', by.css("[data-qa-id='upload-video-btn']")),
  create_highlight: defineLocator(
    'create highlight button',
    by.css("[data-qa-id='create-highlight-btn']"),
  ),
  view_roster: defineLocator('view roster button', by.css("[data-qa-id='view-roster-btn']")),
  highlights: defineLocator('highlights tab', by.css("[data-qa-id='highlights-tab']")),
  tools: defineLocator('tools tab', by.css("[data-qa-id='tools-tab']")),
  library: defineLocator('library tab', by.css("[data-qa-id='library-tab']")),
} as const satisfies Record<string, ElementLocator>;

export type DashboardFeature = keyof typeof FEATURE_LOCATORS;

const FEATURE_ORDER: readonly DashboardFeature[] = [
  'upload_video',
  'create_highlight',
  'view_roster',
  'highlights',
  'tools',
  'library',
];

export const ROLE_FEATURES: Record<string, readonly DashboardFeature[]> = {
  coach: FEATURE_ORDER,
  admin: FEATURE_ORDER,
  player: ['highlights', 'library'],
  parent: ['highlights', 'library'],
};

export interface LoginValidation {
  onDashboardPage: boolean;
  userLoggedIn: boolean;
  dashboardContentPresent: boolean;
  navigationPresent: boolean;
  logoutAvailable: boolean;
}

export interface RoleVerification {
  role: string;
  roleMatch: boolean;
  expected: readonly DashboardFeature[];
  available: DashboardFeature[];
  missing: DashboardFeature[];
}

export interface DashboardErrors {
  hasErrors: boolean;
  messages: string[];
}

export class DashboardPage {
  constructor(private readonly kit: PageToolkit) {}

  async isOnDashboard(): Promise<boolean> {
    const url = await this.kit.session.currentUrl();
    if (pathContains(url, this.kit.settings.paths.dashboard) || pathContains(url, '/dashboard')) {
      return true;
    }
    return isPresent(this.kit, DASHBOARD_LOCATORS.content);
  }

  /**
   * Content or the user menu must appear within the explicit wait, then
   * loading indicators must clear. `false` when either does not happen.
   */
  async waitUntilLoaded(): Promise<boolean> {
    const { session, settings } = this.kit;
    const anchor = await pollWithin(
      this.kit,
      'dashboard content or user menu',
      async () => {
        for (const locator of [DASHBOARD_LOCATORS.content, DASHBOARD_LOCATORS.userMenu]) {
          for (const strategy of locator.strategies) {
            if ((await session.findElements(strategy)).length > 0) return true;
          }
        }
        return null;
      },
      settings.timeouts.explicitWait,
    );
    if (!anchor) return false;

    for (const strategy of DASHBOARD_LOCATORS.loading.strategies) {
      try {
        await this.kit.wait.untilState({ kind: 'hidden', strategy });
      } catch (err) {
        if (err instanceof WaitTimeoutError) {
          log.warn(`Dashboard still loading: ${err.message}`);
          return false;
        }
        throw err;
      }
    }
    return true;
  }

  async isUserLoggedIn(): Promise<boolean> {
    return isPresent(this.kit, DASHBOARD_LOCATORS.userMenu);
  }

  async getDisplayName(): Promise<string> {
    return this.kit.interactions.readText(DASHBOARD_LOCATORS.displayName, { optional: true });
  }

  async getWelcomeMessage(): Promise<string> {
    return this.kit.interactions.readText(DASHBOARD_LOCATORS.welcome, { optional: true });
  }

  async getTeamInfo(): Promise<string> {
    return this.kit.interactions.readText(DASHBOARD_LOCATORS.teamInfo, { optional: true });
  }

  async hasRecentHighlights(): Promise<boolean> {
    return isVisible(this.kit, DASHBOARD_LOCATORS.recentHighlights);
  }

  async openUserMenu(): Promise<void> {
    await clickControl(this.kit, DASHBOARD_LOCATORS.userMenu);
  }

  async clickSettings(): Promise<void> {
    await clickControl(this.kit, DASHBOARD_LOCATORS.settings, { navigates: true });
  }

  async openFeature(feature: DashboardFeature): Promise<void> {
    await clickControl(this.kit, FEATURE_LOCATORS[feature], { navigates: true });
  }

  /**
   * Open the user menu unless the logout control is already showing, click
   * it, then wait for the login page. `false` when the redirect never comes.
   */
  async logout(): Promise<boolean> {
    if (!(await isVisible(this.kit, DASHBOARD_LOCATORS.logout))) {
      await this.openUserMenu();
    }
    await clickControl(this.kit, DASHBOARD_LOCATORS.logout, { navigates: true });
    return this.kit.wait.checkState({ kind: 'urlContains', fragment: this.kit.settings.paths.login });
  }

  async getAvailableFeatures(): Promise<DashboardFeature[]> {
    const available: DashboardFeature[] = [];
    for (const feature of FEATURE_ORDER) {
      if (await isPresent(this.kit, FEATURE_LOCATORS[feature])) {
        available.push(feature);
      }
    }
    return available;
  }

  /** Unknown roles expect nothing and therefore always match. */
  async verifyRoleFeatures(role: string): Promise<RoleVerification> {
    const expected = ROLE_FEATURES[role.toLowerCase()] ?? [];
    const available = await this.getAvailableFeatures();
    const missing = expected.filter((f) => !available.includes(f));
    return { role, roleMatch: missing.length === 0, expected, available, missing };
  }

  async validateSuccessfulLogin(): Promise<LoginValidation> {
    return {
      onDashboardPage: await this.isOnDashboard(),
      userLoggedIn: await this.isUserLoggedIn(),
      dashboardContentPresent: await isPresent(this.kit, DASHBOARD_LOCATORS.content),
      navigationPresent: await isPresent(this.kit, DASHBOARD_LOCATORS.mainNav),
      logoutAvailable: await isPresent(this.kit, DASHBOARD_LOCATORS.logout),
    };
  }

  async checkForErrors(): Promise<DashboardErrors> {
    const messages: string[] = [];
    for (const strategy of DASHBOARD_LOCATORS.errors.strategies) {
      const text = await visibleText(this.kit.session, defineLocator('dashboard error', strategy));
      if (text) messages.push(text);
    }
    return { hasErrors: messages.length > 0, messages };
  }

  async verifyRedirect(fragment: string): Promise<void> {
    await verifyRedirect(this.kit, fragment);
  }
}
