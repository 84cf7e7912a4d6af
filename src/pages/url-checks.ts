import { AssertionFailure, WaitTimeoutError } from '../core/errors.js';
import { poll } from '../core/wait.js';
import type { PageToolkit } from './toolkit.js';

// ── Pure checks ──────────────────────────────────────────────

/** Path component of `url`, or the raw input when it does not parse. */
export function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

/** Case-insensitive: does the path of `url` contain `fragment`? */
export function pathContains(url: string, fragment: string): boolean {
  return pathOf(url).toLowerCase().includes(fragment.toLowerCase());
}

/**
 * Normalise an expected provider to a bare host. Accepts a full URL or a
 * host, with or without surrounding quotes.
 */
export function normalizeHost(expected: string): string {
  const trimmed = expected.trim().replace(/^["']+|["']+$/g, '').toLowerCase();
  let host = trimmed;
  if (trimmed.includes('://')) {
    try {
      host = new URL(trimmed).hostname;
    } catch {
      host = trimmed;
    }
  }
  return stripWww(host.split('/', 1)[0] ?? host);
}

/** Host of `url` equals the provider host or is a subdomain of it. */
export function hostMatches(url: string, expectedProvider: string): boolean {
  const expected = normalizeHost(expectedProvider);
  let actual: string;
  try {
    actual = stripWww(new URL(url).hostname.toLowerCase());
  } catch {
    return false;
  }
  return actual === expected || actual.endsWith(`.${expected}`);
}

export function assertPathContains(url: string, fragment: string): void {
  if (!pathContains(url, fragment)) {
    const actual = pathOf(url);
    throw new AssertionFailure(
      `Expected URL path to contain "${fragment}" but was "${actual}"`,
      actual,
      fragment,
    );
  }
}

export function assertProviderHost(url: string, expectedProvider: string): void {
  if (!hostMatches(url, expectedProvider)) {
    const expected = normalizeHost(expectedProvider);
    let actual = url;
    try {
      actual = new URL(url).hostname;
    } catch {
      // keep the raw value for the report
    }
    throw new AssertionFailure(
      `Expected redirect to provider "${expected}" but landed on "${actual}"`,
      actual,
      expected,
    );
  }
}

function stripWww(host: string): string {
  return host.startsWith('www.') ? host.slice(4) : host;
}

// ── Session-bound verifications ──────────────────────────────

/**
 * Give a pending redirect up to the explicit-wait budget to settle, then
 * assert against whatever URL the browser ended on.
 */
async function settleUrl(
  kit: PageToolkit,
  description: string,
  matches: (url: string) => boolean,
): Promise<string> {
  try {
    return await poll(
      description,
      async () => {
        const url = await kit.session.currentUrl();
        return matches(url) ? url : null;
      },
      { timeout: kit.settings.timeouts.explicitWait, pollInterval: kit.settings.timeouts.pollInterval },
    );
  } catch (err) {
    if (err instanceof WaitTimeoutError) {
      return kit.session.currentUrl();
    }
    throw err;
  }
}

export async function verifyRedirect(kit: PageToolkit, fragment: string): Promise<void> {
  const url = await settleUrl(kit, `URL path to contain "${fragment}"`, (u) =>
    pathContains(u, fragment),
  );
  assertPathContains(url, fragment);
}

export async function verifyProviderRedirect(kit: PageToolkit, expectedProvider: string): Promise<void> {
  const url = await settleUrl(kit, `redirect to ${normalizeHost(expectedProvider)}`, (u) =>
    hostMatches(u, expectedProvider),
  );
  assertProviderHost(url, expectedProvider);
}
