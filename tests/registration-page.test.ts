import { describe, expect, it } from 'vitest';

import { by } from '../src/schema/index.js';
import { RegistrationPage } from '../src/pages/registration.js';
import { createToolkit } from '../src/pages/toolkit.js';
import { FakeBrowserSession } from './support/fake-session.js';
import { testSettings } from './support/settings.js';

function registrationFor(session: FakeBrowserSession): RegistrationPage {
  return new RegistrationPage(createToolkit(session, testSettings()));
}

describe('RegistrationPage', () => {
  it('opens the signup path under the base URL', async () => {
    const session = new FakeBrowserSession();

    await registrationFor(session).open();

    expect(session.navigations).toEqual(['https://app.example.com/register']);
  });

  it('fills every field of the form', async () => {
    const session = new FakeBrowserSession();
    const first = session.add(by.name('ulp-first-name'));
    const last = session.add(by.id('last-name'));
    const email = session.add(by.name('email'));
    const password = session.add(by.name('password'));
    const confirm = session.add(by.name('confirm-password'));

    await registrationFor(session).fillForm({
      first_name: 'Test',
      last_name: 'User',
      email: 'new.user@example.com',
      password: 'test-secret-123',
      confirm_password: 'test-secret-123',
    });

    expect([first.value, last.value, email.value, password.value, confirm.value]).toEqual([
      'Test',
      'User',
      'new.user@example.com',
      'test-secret-123',
      'test-secret-123',
    ]);
  });

  it('splits a full name at the first run of whitespace', async () => {
    const session = new FakeBrowserSession();
    const first = session.add(by.name('ulp-first-name'));
    const last = session.add(by.name('ulp-last-name'));

    await registrationFor(session).enterFullName('  Grace   Brewster Hopper ');

    expect(first.value).toBe('Grace');
    expect(last.value).toBe('Brewster Hopper');
  });

  it('reports which required fields are missing', async () => {
    const session = new FakeBrowserSession();
    session.add(by.name('ulp-first-name'));
    session.add(by.css("input[type='email']"));

    await expect(registrationFor(session).verifyRequiredFieldsPresent()).resolves.toEqual({
      allPresent: false,
      fields: { firstName: true, lastName: false, email: true },
    });
  });

  it('counts hidden controls as not visible', async () => {
    const session = new FakeBrowserSession();
    session.add(by.name('ulp-first-name'));
    session.add(by.name('ulp-last-name'));
    session.add(by.name('email'));
    session.add(by.name('password'), { visible: false });
    session.add(by.css("button[type='submit']"));

    await expect(registrationFor(session).verifyFormElementsVisible()).resolves.toEqual({
      firstName: true,
      lastName: true,
      email: true,
      password: false,
      createAccount: true,
    });
  });
});
