import type { TestData } from '../schema/index.js';
import { AssertionFailure } from '../core/errors.js';
import { findAuthCookies } from '../pages/index.js';
import * as log from '../utils/logger.js';
import type { ScenarioContext } from '../lifecycle/context.js';
import type { ScenarioDefinition, ScenarioStep } from './types.js';

// ── Assertion helper ─────────────────────────────────────────

function expect(condition: boolean, message: string, actual: string, expected: string): void {
  if (!condition) {
    throw new AssertionFailure(message, actual, expected);
  }
}

// ── Reusable steps ───────────────────────────────────────────

const step = (text: string, run: (ctx: ScenarioContext) => Promise<void>): ScenarioStep => ({
  text,
  run,
});

const openLogin = step('I am on the login page', async (ctx) => {
  await ctx.pages.login.open();
});

const enterValidEmail = step('I enter a valid email address', async (ctx) => {
  await ctx.pages.login.enterEmail(ctx.testData.valid_credentials.email);
  await ctx.pages.login.clickContinue();
});

const enterValidPassword = step('I enter a valid password', async (ctx) => {
  await ctx.pages.login.enterPassword(ctx.testData.valid_credentials.password);
  await ctx.pages.login.clickContinue();
});

const enterInvalidEmail = step('I enter an invalid email address', async (ctx) => {
  await ctx.pages.login.enterEmail(ctx.testData.invalid_credentials.email);
  await ctx.pages.login.clickContinue();
});

const enterInvalidPassword = step('I enter an invalid password', async (ctx) => {
  await ctx.pages.login.enterPassword(ctx.testData.invalid_credentials.password);
  await ctx.pages.login.clickContinue();
});

const seeLoginError = step('I should see an error message', async (ctx) => {
  const expected = ctx.testData.expected_error_messages['invalid_credentials'];
  const text = await ctx.pages.login.verifyErrorMessage(expected);
  log.detail(`Error shown: "${text}"`);
});

const remainOnLogin = step('I should remain on the login page', async (ctx) => {
  await ctx.pages.login.verifyRedirect('login');
});

const reachDashboard = step('I should be redirected to the dashboard page', async (ctx) => {
  const outcome = await ctx.pages.login.awaitOutcome();
  expect(outcome === 'Authenticated', 'Login did not reach the dashboard', outcome, 'Authenticated');
  await ctx.pages.login.verifyRedirect(ctx.settings.paths.dashboard);
});

const seeDisplayName = step('I should see my display name', async (ctx) => {
  const actual = await ctx.pages.login.getDisplayName();
  const expected = ctx.testData.valid_credentials.display_name;
  if (expected === undefined) {
    expect(actual !== '', 'No display name is shown', actual, 'a display name');
    return;
  }
  expect(actual === expected, `Expected display name "${expected}" but got "${actual}"`, actual, expected);
});

function emptyFieldRejected(field: 'email' | 'password'): ScenarioStep {
  return step(`I should see a validation message for the ${field} field`, async (ctx) => {
    const message =
      (await ctx.pages.login.getValidationMessage(field)) ||
      (await ctx.pages.login.getFieldError(field));
    expect(message !== '', `No validation message for the empty ${field} field`, '', 'a validation message');
    log.detail(`Validation: "${message}"`);
  });
}

function passwordShown(visible: boolean): ScenarioStep {
  const label = visible ? 'visible as plain text' : 'masked';
  return step(`the password should be ${label}`, async (ctx) => {
    const actual = await ctx.pages.login.isPasswordVisible();
    expect(actual === visible, `Password is not ${label}`, String(actual), String(visible));
  });
}

const logIn = step('I am logged in with valid credentials', async (ctx) => {
  const { email, password } = ctx.testData.valid_credentials;
  await ctx.pages.login.open();
  const outcome = await ctx.pages.login.login(email, password);
  expect(outcome === 'Authenticated', 'Login with valid credentials was rejected', outcome, 'Authenticated');
});

// ── Suite ────────────────────────────────────────────────────

/** The built-in authentication scenarios, parameterised by test data. */
export function buildAuthScenarios(data: TestData): ScenarioDefinition[] {
  const scenarios: ScenarioDefinition[] = [
    {
      name: 'Successful login with valid credentials',
      tags: ['login', 'smoke', 'positive'],
      steps: [openLogin, enterValidEmail, enterValidPassword, reachDashboard, seeDisplayName],
    },
    {
      name: 'Login rejected with invalid password',
      tags: ['login', 'negative'],
      steps: [openLogin, enterValidEmail, enterInvalidPassword, seeLoginError, remainOnLogin],
    },
    {
      name: 'Login rejected with unknown email',
      tags: ['login', 'negative'],
      steps: [openLogin, enterInvalidEmail, enterInvalidPassword, seeLoginError, remainOnLogin],
    },
    {
      name: 'Empty email is rejected',
      tags: ['login', 'negative', 'validation'],
      steps: [
        openLogin,
        step('I leave the email field empty', async (ctx) => {
          await ctx.pages.login.clearEmail();
          await ctx.pages.login.clickContinue();
        }),
        emptyFieldRejected('email'),
        remainOnLogin,
      ],
    },
    {
      name: 'Empty password is rejected',
      tags: ['login', 'negative', 'validation'],
      steps: [
        openLogin,
        enterValidEmail,
        step('I leave the password field empty', async (ctx) => {
          await ctx.pages.login.clearPassword();
          await ctx.pages.login.clickContinue();
        }),
        emptyFieldRejected('password'),
        remainOnLogin,
      ],
    },
    {
      name: 'Password can be shown and hidden',
      tags: ['login', 'ui'],
      steps: [
        openLogin,
        enterValidEmail,
        step('I enter a masked password', async (ctx) => {
          await ctx.pages.login.enterPassword(ctx.testData.valid_credentials.password);
        }),
        passwordShown(false),
        step('I click the show/hide password button', async (ctx) => {
          await ctx.pages.login.togglePasswordVisibility();
        }),
        passwordShown(true),
        step('I click the hide password button', async (ctx) => {
          await ctx.pages.login.togglePasswordVisibility();
        }),
        passwordShown(false),
      ],
    },
    {
      name: 'Forgot password opens the reset page',
      tags: ['navigation', 'password-reset'],
      steps: [
        openLogin,
        enterValidEmail,
        step('I click the "Forgot password?" link', async (ctx) => {
          await ctx.pages.login.clickForgotPassword();
        }),
        step('I should be redirected to the password reset page', async (ctx) => {
          const url = await ctx.session.currentUrl();
          expect(await ctx.pages.passwordReset.isOnPage(), 'Not on the password reset page', url, 'a password reset URL');
        }),
        step('the page should have password reset functionality', async (ctx) => {
          const present = await ctx.pages.passwordReset.hasResetFunctionality();
          expect(present, 'Password reset form not found', 'missing', 'email field and submit button');
        }),
      ],
    },
    {
      name: 'Sign up opens the registration page',
      tags: ['navigation', 'registration'],
      steps: [
        openLogin,
        step('I click the "Sign up" link', async (ctx) => {
          await ctx.pages.login.clickSignUp();
        }),
        step('I should be redirected to the registration page', async (ctx) => {
          await ctx.pages.login.verifyRedirect('signup');
        }),
        step('the page should have account creation functionality', async (ctx) => {
          const report = await ctx.pages.registration.verifyRequiredFieldsPresent();
          const missing = Object.entries(report.fields)
            .filter(([, present]) => !present)
            .map(([name]) => name);
          expect(
            report.allPresent,
            `Missing required fields: ${missing.join(', ')}`,
            missing.join(', '),
            'firstName, lastName, email',
          );
        }),
      ],
    },
    {
      name: 'Logout clears the session',
      tags: ['logout', 'smoke'],
      steps: [
        logIn,
        step('I click the logout button', async (ctx) => {
          const redirected = await ctx.pages.dashboard.logout();
          const url = await ctx.session.currentUrl();
          expect(redirected, 'Logout did not return to the login page', url, ctx.settings.paths.login);
        }),
        step('my session should be cleared', async (ctx) => {
          const remaining = await findAuthCookies(ctx.session);
          ctx.remember('authCookiesAfterLogout', remaining);
          log.detail(`${String(remaining.length)} auth-related cookies remain: ${remaining.join(', ') || 'none'}`);
        }),
      ],
    },
  ];

  scenarios.push({
    name: 'Home page leads to the login page',
    tags: ['navigation', 'home'],
    steps: [
      step('I am on the home page', async (ctx) => {
        await ctx.pages.home.open();
        await ctx.pages.home.verifyAtBaseUrl();
      }),
      step('I click the home page login button', async (ctx) => {
        const visible = await ctx.pages.home.isLoginButtonVisible();
        expect(visible, 'Login button is not visible on the home page', 'hidden', 'visible');
        await ctx.pages.home.clickLogin();
      }),
      step('I should be on the login page', async (ctx) => {
        const url = await ctx.session.currentUrl();
        expect(await ctx.pages.login.isLoaded(), 'Login page did not open', url, 'a login URL');
      }),
    ],
  });

  const registration = data.registration?.valid;
  if (registration) {
    scenarios.push({
      name: 'Registration form accepts new account details',
      tags: ['registration'],
      steps: [
        step('I am on the registration page', async (ctx) => {
          await ctx.pages.registration.open();
        }),
        step('I fill in the registration form', async (ctx) => {
          await ctx.pages.registration.fillForm(registration);
        }),
        step('every registration form element should be visible', async (ctx) => {
          const report = await ctx.pages.registration.verifyFormElementsVisible();
          const hidden = Object.entries(report)
            .filter(([, visible]) => !visible)
            .map(([name]) => name);
          expect(hidden.length === 0, `Hidden form elements: ${hidden.join(', ')}`, hidden.join(', '), 'none');
        }),
      ],
    });
  }

  for (const [provider, url] of Object.entries(data.social_providers)) {
    scenarios.push({
      name: `Social login redirects to ${provider}`,
      tags: ['social', provider],
      steps: [
        openLogin,
        step(`I click the "${provider}" login button`, async (ctx) => {
          await ctx.pages.login.clickSocialProvider(provider);
        }),
        step(`I should get redirected to ${url}`, async (ctx) => {
          await ctx.pages.login.verifyProviderRedirect(url);
        }),
      ],
    });
  }

  return scenarios;
}
