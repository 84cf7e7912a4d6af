import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { by } from '../src/schema/index.js';
import { ScenarioLifecycleManager } from '../src/lifecycle/manager.js';
import { buildAuthScenarios, selectScenarios } from '../src/scenarios/index.js';
import type { ScenarioDefinition } from '../src/scenarios/index.js';
import { FakeSessionFactory } from './support/fake-session.js';
import type { FakeBrowserSession } from './support/fake-session.js';
import { TEST_DATA, testSettings } from './support/settings.js';

let reportsDir: string;

beforeEach(async () => {
  reportsDir = await mkdtemp(path.join(tmpdir(), 'authprobe-scenarios-'));
});

afterEach(async () => {
  await rm(reportsDir, { recursive: true, force: true });
});

function scenarioNamed(name: string): ScenarioDefinition {
  const found = buildAuthScenarios(TEST_DATA).find((s) => s.name === name);
  if (!found) throw new Error(`no scenario named ${name}`);
  return found;
}

function run(scenario: ScenarioDefinition, prepare: (session: FakeBrowserSession) => void) {
  const manager = new ScenarioLifecycleManager({
    settings: testSettings(reportsDir),
    testData: TEST_DATA,
    sessionFactory: new FakeSessionFactory(prepare),
    retry: { attempts: 3, pause: 1 },
  });
  return manager.runScenario(scenario);
}

describe('buildAuthScenarios', () => {
  it('adds one social scenario per configured provider and skips registration without data', () => {
    const names = buildAuthScenarios(TEST_DATA).map((s) => s.name);

    expect(names).toEqual([
      'Successful login with valid credentials',
      'Login rejected with invalid password',
      'Login rejected with unknown email',
      'Empty email is rejected',
      'Empty password is rejected',
      'Password can be shown and hidden',
      'Forgot password opens the reset page',
      'Sign up opens the registration page',
      'Logout clears the session',
      'Home page leads to the login page',
      'Social login redirects to google',
    ]);
  });

  it('includes the registration scenario when registration data exists', () => {
    const names = buildAuthScenarios({
      ...TEST_DATA,
      registration: {
        valid: {
          first_name: 'Test',
          last_name: 'User',
          email: 'new.user@example.com',
          password: 'test-secret-123',
          confirm_password: 'test-secret-123',
        },
      },
    }).map((s) => s.name);

    expect(names).toContain('Registration form accepts new account details');
  });
});

describe('selectScenarios', () => {
  const scenarios = buildAuthScenarios(TEST_DATA);

  it('keeps everything without filters', () => {
    expect(selectScenarios(scenarios)).toHaveLength(scenarios.length);
  });

  it('matches any of the given tags, ignoring case', () => {
    const names = selectScenarios(scenarios, { tags: ['SMOKE'] }).map((s) => s.name);

    expect(names).toEqual(['Successful login with valid credentials', 'Logout clears the session']);
  });

  it('requires both tag and name filters to match when both are given', () => {
    const names = selectScenarios(scenarios, { tags: ['negative'], names: ['unknown'] }).map((s) => s.name);

    expect(names).toEqual(['Login rejected with unknown email']);
  });
});

describe('scenarios against a fake site', () => {
  it('passes the invalid password scenario when the banner shows', async () => {
    const result = await run(scenarioNamed('Login rejected with invalid password'), (session) => {
      session.add(by.name('username'));
      session.add(by.name('password'), { attributes: { type: 'password' } });
      let submits = 0;
      session.add(by.css("button[type='submit']"), {
        onClick: () => {
          submits += 1;
          if (submits === 2) {
            session.add(by.css('.ulp-error-message'), { text: 'Incorrect username or password.' });
          }
        },
      });
    });

    expect(result.steps.map((s) => s.status)).toEqual(['passed', 'passed', 'passed', 'passed', 'passed']);
    expect(result.status).toBe('passed');
  });

  it('fails the invalid password scenario when no error appears', async () => {
    const result = await run(scenarioNamed('Login rejected with invalid password'), (session) => {
      session.add(by.name('username'));
      session.add(by.name('password'));
      session.add(by.css("button[type='submit']"));
    });

    expect(result.status).toBe('failed');
    expect(result.steps.map((s) => s.status)).toEqual(['passed', 'passed', 'passed', 'failed', 'skipped']);
    expect(result.error).toBe('Expected an error message but none was displayed');
  });

  it('follows a social login button to the provider', async () => {
    const result = await run(scenarioNamed('Social login redirects to google'), (session) => {
      session.add(by.css("button[data-provider='google']"), {
        onClick: () => {
          session.url = 'https://accounts.google.com/o/oauth2/v2/auth?client_id=test';
        },
      });
    });

    expect(result.status).toBe('passed');
  });

  it('records the auth cookies left after logout', async () => {
    const result = await run(scenarioNamed('Logout clears the session'), (session) => {
      session.add(by.name('username'));
      session.add(by.name('password'));
      let submits = 0;
      session.add(by.css("button[type='submit']"), {
        onClick: () => {
          submits += 1;
          if (submits === 2) session.url = 'https://app.example.com/home';
        },
      });
      session.add(by.css("[data-qa-id='webnav-usermenu-logout']"), {
        onClick: () => {
          session.url = 'https://app.example.com/login';
          session.cookieJar = [{ name: 'did', value: 'x', domain: 'app.example.com', path: '/' }];
        },
      });
    });

    expect(result.status).toBe('passed');
  });
});
