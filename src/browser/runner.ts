import { randomUUID } from 'node:crypto';

import { chromium, errors, firefox, webkit } from 'playwright-core';
import type {
  Browser,
  BrowserContext,
  BrowserType,
  ElementHandle as PlaywrightElementHandle,
  LaunchOptions,
  Page,
} from 'playwright-core';

import type { BrowserKind, LocatorStrategy, Settings } from '../schema/index.js';
import {
  NotInteractableError,
  SessionError,
  StaleReferenceError,
  WaitTimeoutError,
  errorMessage,
} from '../core/errors.js';
import * as log from '../utils/logger.js';
import { attachConsoleCapture } from './capture.js';
import { describeStrategy, toPlaywrightSelector } from './selectors.js';
import type {
  ElementHandle,
  RemoteBrowserSession,
  SessionFactory,
  SessionTimeouts,
} from './session.js';

// ── Browser selection ────────────────────────────────────────

function browserFor(kind: BrowserKind): { type: BrowserType; channel?: string } {
  switch (kind) {
    case 'chrome':
      return { type: chromium, channel: 'chrome' };
    case 'edge':
      return { type: chromium, channel: 'msedge' };
    case 'firefox':
      return { type: firefox };
    case 'safari':
      return { type: webkit };
  }
}

// ── Timeouts ─────────────────────────────────────────────────

/** Playwright reads a timeout of 0 as "wait forever", so only positive budgets pass. */
function checkTimeouts(timeouts: SessionTimeouts): SessionTimeouts {
  const budgets: [string, number][] = [
    ['implicitWait', timeouts.implicitWait],
    ['pageLoad', timeouts.pageLoad],
  ];
  for (const [name, ms] of budgets) {
    if (!(ms > 0)) {
      throw new SessionError(`${name} must be a positive number of milliseconds, got ${String(ms)}`);
    }
  }
  return { ...timeouts };
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(settings: Settings): Promise<RemoteBrowserSession> {
  const timeouts = checkTimeouts({
    implicitWait: settings.timeouts.implicitWait,
    pageLoad: settings.timeouts.pageLoad,
  });
  const { type, channel } = browserFor(settings.browser.kind);
  const options: LaunchOptions = { headless: settings.browser.headless };
  if (channel) {
    options.channel = channel;
  }

  let browser: Browser;
  try {
    browser = await type.launch(options);
  } catch (err) {
    throw new SessionError(
      `Could not launch ${settings.browser.kind}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  let context: BrowserContext;
  let page: Page;
  try {
    context = await browser.newContext({ viewport: settings.browser.windowSize });
    page = await context.newPage();
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => {
      log.warn(`Could not close ${settings.browser.kind} after a failed start: ${errorMessage(closeErr)}`);
    });
    throw new SessionError(
      `Could not open a ${settings.browser.kind} page: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  const capture = attachConsoleCapture(page);

  context.setDefaultTimeout(timeouts.implicitWait);
  context.setDefaultNavigationTimeout(timeouts.pageLoad);

  const actionTimeout = (): number => timeouts.implicitWait;

  return {
    id: randomUUID(),

    async navigate(url: string): Promise<void> {
      const startedAt = Date.now();
      try {
        await page.goto(url, { waitUntil: 'load', timeout: timeouts.pageLoad });
      } catch (err) {
        if (err instanceof errors.TimeoutError) {
          throw new WaitTimeoutError(
            `page load of ${url}`,
            timeouts.pageLoad,
            Date.now() - startedAt,
            err,
          );
        }
        throw err;
      }
    },

    async findElements(strategy: LocatorStrategy): Promise<ElementHandle[]> {
      try {
        const handles = await page.$$(toPlaywrightSelector(strategy));
        return handles.map((h) => wrapHandle(h, strategy, actionTimeout));
      } catch (err) {
        throw mapActionError(err, strategy, 'find');
      }
    },

    async executeScript(expression: string): Promise<unknown> {
      return page.evaluate<unknown>(expression);
    },

    async currentUrl(): Promise<string> {
      return page.url();
    },

    async title(): Promise<string> {
      return page.title();
    },

    async pageSource(): Promise<string> {
      return page.content();
    },

    async readyState() {
      return page.evaluate(() => document.readyState);
    },

    async cookies() {
      const cookies = await context.cookies();
      return cookies.map((c) => ({
        name: c.name,
        value: c.value,
        domain: c.domain,
        path: c.path,
      }));
    },

    async consoleLogs() {
      return capture.entries();
    },

    async screenshot(filePath: string): Promise<void> {
      await page.screenshot({ path: filePath, fullPage: true });
    },

    async windowSize() {
      return page.viewportSize() ?? { ...settings.browser.windowSize };
    },

    async setWindowSize(size) {
      await page.setViewportSize(size);
    },

    configureTimeouts(requested: SessionTimeouts): void {
      const next = checkTimeouts(requested);
      timeouts.implicitWait = next.implicitWait;
      timeouts.pageLoad = next.pageLoad;
      context.setDefaultTimeout(next.implicitWait);
      context.setDefaultNavigationTimeout(next.pageLoad);
    },

    async close(): Promise<void> {
      try {
        await browser.close();
      } catch (err) {
        throw new SessionError(`Could not close browser: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    },
  };
}

export const playwrightSessionFactory: SessionFactory = {
  create: launchSession,
};

// ── Element handle adapter ───────────────────────────────────

function wrapHandle(
  handle: PlaywrightElementHandle<SVGElement | HTMLElement>,
  origin: LocatorStrategy,
  actionTimeout: () => number,
): ElementHandle {
  async function guarded<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw mapActionError(err, origin, action);
    }
  }

  return {
    origin,

    isVisible: () => guarded('check visibility of', () => handle.isVisible()),
    isEnabled: () => guarded('check enabled state of', () => handle.isEnabled()),

    click: () => guarded('click', () => handle.click({ timeout: actionTimeout() })),

    scriptClick: () =>
      guarded('script-click', () =>
        handle.evaluate((el) => {
          if (el instanceof HTMLElement) {
            el.click();
          } else {
            el.dispatchEvent(new MouseEvent('click', { bubbles: true, cancelable: true }));
          }
        }),
      ),

    type: (text: string) =>
      guarded('type into', () => handle.type(text, { timeout: actionTimeout() })),

    clear: () => guarded('clear', () => handle.fill('', { timeout: actionTimeout() })),

    text: () =>
      guarded('read text of', () =>
        handle.evaluate((el) =>
          (el instanceof HTMLElement ? el.innerText : el.textContent ?? '').trim(),
        ),
      ),

    attribute: (name: string) =>
      guarded('read attribute of', () => handle.getAttribute(name)),

    property: (name: string) =>
      guarded('read property of', async () => {
        const js = await handle.getProperty(name);
        try {
          const value: unknown = await js.jsonValue();
          return value;
        } finally {
          await js.dispose();
        }
      }),
  };
}

// ── Error mapping ────────────────────────────────────────────

const STALE_PATTERN =
  /not attached to the DOM|element is detached|Execution context was destroyed|Cannot find context/i;

const BLOCKED_PATTERN =
  /not visible|not enabled|not editable|not stable|intercepts pointer events|outside of the viewport/i;

export function mapActionError(
  err: unknown,
  origin: LocatorStrategy,
  action: string,
): unknown {
  const message = errorMessage(err);
  const target = describeStrategy(origin);

  if (STALE_PATTERN.test(message)) {
    return new StaleReferenceError(`Element ${target} went stale during ${action}`, {
      cause: err,
    });
  }

  if (err instanceof errors.TimeoutError || BLOCKED_PATTERN.test(message)) {
    return new NotInteractableError(`Could not ${action} ${target}: ${firstLine(message)}`, {
      cause: err,
    });
  }

  return err;
}

function firstLine(text: string): string {
  return text.split('\n', 1)[0] ?? text;
}
