import { describe, expect, it } from 'vitest';

import { by, defineLocator } from '../src/schema/index.js';
import { ResolutionTimeoutError } from '../src/core/errors.js';
import { ElementResolver } from '../src/core/resolver.js';
import { WaitEngine } from '../src/core/wait.js';
import { FakeBrowserSession } from './support/fake-session.js';

const EMAIL = defineLocator(
  'email field',
  by.name('username'),
  by.id('username'),
  by.css("input[type='email']"),
);

function resolverFor(session: FakeBrowserSession, strategyTimeout = 20): ElementResolver {
  return new ElementResolver(new WaitEngine(session, { timeout: 5_000, pollInterval: 5 }), strategyTimeout);
}

describe('ElementResolver', () => {
  it('falls back to a later strategy and reports which one won', async () => {
    const session = new FakeBrowserSession();
    const field = session.add(by.css("input[type='email']"));

    const resolved = await resolverFor(session).resolve(EMAIL, 'visible');

    expect(resolved.element).toBe(field);
    expect(resolved.strategyIndex).toBe(2);
    expect(resolved.strategy).toEqual({ strategy: 'css', value: "input[type='email']" });
  });

  it('stops at the first strategy that resolves', async () => {
    const session = new FakeBrowserSession();
    const byName = session.add(by.name('username'));
    session.add(by.css("input[type='email']"));

    const resolved = await resolverFor(session).resolve(EMAIL, 'present');

    expect(resolved.element).toBe(byName);
    expect(resolved.strategyIndex).toBe(0);
    expect(session.lookups).toEqual(['name:username']);
  });

  it('skips a strategy whose match is not visible in visible mode', async () => {
    const session = new FakeBrowserSession();
    session.add(by.name('username'), { visible: false });
    const byId = session.add(by.id('username'));

    const resolved = await resolverFor(session).resolve(EMAIL, 'visible');

    expect(resolved.element).toBe(byId);
    expect(resolved.strategyIndex).toBe(1);
  });

  it('lists every attempted strategy when nothing resolves', async () => {
    const session = new FakeBrowserSession();
    const started = Date.now();

    const error = await resolverFor(session).resolve(EMAIL, 'visible').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResolutionTimeoutError);
    if (!(error instanceof ResolutionTimeoutError)) return;
    expect(error.target).toBe('email field');
    expect(error.attempts.map((a) => a.index)).toEqual([0, 1, 2]);
    expect(error.attempts.map((a) => a.strategy.strategy)).toEqual(['name', 'id', 'css']);
    expect(error.message.split('\n')[0]).toBe('Could not resolve "email field" with any of 3 strategies:');
    expect(error.message.split('\n')[1]).toMatch(
      /^ {2}1\. \[name="username"\]: Timed out after \d+ms waiting for \[name="username"\] to be visible$/,
    );
    // Three budgets of 20ms each, nowhere near the engine default.
    expect(Date.now() - started).toBeLessThan(2_000);
  });

  it('returns a not-found outcome from attempt instead of throwing', async () => {
    const session = new FakeBrowserSession();

    const outcome = await resolverFor(session).attempt(EMAIL, 'present');

    expect(outcome.found).toBe(false);
    expect(outcome.found ? 0 : outcome.attempts.length).toBe(3);
    await expect(resolverFor(session).isResolvable(EMAIL, 'present')).resolves.toBe(false);
  });

  it('honours a per-call strategy timeout', async () => {
    const session = new FakeBrowserSession();
    const late = defineLocator('late banner', by.id('late'));
    session.add(by.id('late'), { appearsAfter: 150 });

    await expect(resolverFor(session, 5).isResolvable(late, 'present')).resolves.toBe(false);
    await expect(
      resolverFor(session, 5).isResolvable(late, 'present', { timeout: 2_000 }),
    ).resolves.toBe(true);
  });

  it('propagates errors other than timeouts', async () => {
    const session = new FakeBrowserSession();
    session.failingLookups.set('name:username', new Error('browser disconnected'));

    await expect(resolverFor(session).resolve(EMAIL, 'present')).rejects.toThrow('browser disconnected');
  });
});
