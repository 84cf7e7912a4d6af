import type { ElementLocator, LocatorStrategy } from '../schema/index.js';
import type { ElementHandle, RemoteBrowserSession } from '../browser/session.js';
import { describeStrategy } from '../browser/selectors.js';
import { AUTH_COOKIE_MARKERS } from '../config/defaults.js';
import { StaleReferenceError, WaitTimeoutError } from '../core/errors.js';
import type { TypeOptions } from '../core/interactions.js';
import type { ResolvedElement } from '../core/resolver.js';
import { poll } from '../core/wait.js';
import * as log from '../utils/logger.js';
import type { PageToolkit } from './toolkit.js';

// ── Navigation ───────────────────────────────────────────────

export async function waitForPageLoad(kit: PageToolkit): Promise<void> {
  await kit.wait.untilState({ kind: 'documentReady', timeout: kit.settings.timeouts.pageLoad });
}

export async function navigateTo(kit: PageToolkit, url: string): Promise<void> {
  log.session(`Navigating to ${url}`);
  await kit.session.navigate(url);
  await waitForPageLoad(kit);
}

// ── Interaction helpers ──────────────────────────────────────

/** Type into a field through its fallback chain and log the strategy that won. */
export async function enterField(
  kit: PageToolkit,
  locator: ElementLocator,
  value: string,
  options?: TypeOptions,
): Promise<ResolvedElement> {
  const resolved = await kit.interactions.typeText(locator, value, options);
  log.detail(
    `${locator.description} filled via strategy ${String(resolved.strategyIndex + 1)} (${describeStrategy(resolved.strategy)})`,
  );
  return resolved;
}

/**
 * Click a control. When the click starts a page transition, wait for the
 * new document before returning so the next lookup cannot race it.
 */
export async function clickControl(
  kit: PageToolkit,
  locator: ElementLocator,
  options: { navigates?: boolean } = {},
): Promise<void> {
  await kit.interactions.click(locator);
  if (options.navigates) {
    await waitForPageLoad(kit);
  }
}

export async function isPresent(
  kit: PageToolkit,
  locator: ElementLocator,
  timeout?: number,
): Promise<boolean> {
  return kit.resolver.isResolvable(locator, 'present', timeout === undefined ? {} : { timeout });
}

export async function isVisible(
  kit: PageToolkit,
  locator: ElementLocator,
  timeout?: number,
): Promise<boolean> {
  return kit.resolver.isResolvable(locator, 'visible', timeout === undefined ? {} : { timeout });
}

// ── Probing ──────────────────────────────────────────────────

/**
 * Text of the first visible, non-empty match across every strategy of
 * `locator`, looked up once without waiting.
 */
export async function visibleText(
  session: RemoteBrowserSession,
  locator: ElementLocator,
): Promise<string | null> {
  for (const strategy of locator.strategies) {
    const text = await firstVisibleText(session, strategy);
    if (text) return text;
  }
  return null;
}

/**
 * Text of the first visible, non-empty element `strategy` matches. Nodes
 * that go stale between lookup and read are skipped.
 */
export async function firstVisibleText(
  session: RemoteBrowserSession,
  strategy: LocatorStrategy,
): Promise<string | null> {
  let elements: ElementHandle[];
  try {
    elements = await session.findElements(strategy);
  } catch (err) {
    if (err instanceof StaleReferenceError) return null;
    throw err;
  }
  for (const element of elements) {
    try {
      if (!(await element.isVisible())) continue;
      const text = (await element.text()).trim();
      if (text) return text;
    } catch (err) {
      if (!(err instanceof StaleReferenceError)) throw err;
      log.debug(`Skipped stale match for ${describeStrategy(strategy)}`);
    }
  }
  return null;
}

/** Poll `probe` for up to `timeout` ms; `null` when it never yields. */
export async function pollWithin<T>(
  kit: PageToolkit,
  description: string,
  probe: () => Promise<T | null>,
  timeout: number,
): Promise<T | null> {
  try {
    return await poll(description, probe, {
      timeout,
      pollInterval: kit.settings.timeouts.pollInterval,
    });
  } catch (err) {
    if (err instanceof WaitTimeoutError) return null;
    throw err;
  }
}

// ── Session state ────────────────────────────────────────────

/** Lower-cased names of cookies that look like they carry authentication. */
export async function findAuthCookies(session: RemoteBrowserSession): Promise<string[]> {
  const cookies = await session.cookies();
  return cookies
    .map((c) => c.name.toLowerCase())
    .filter((name) => AUTH_COOKIE_MARKERS.some((marker) => name.includes(marker)));
}
