import { setTimeout as sleep } from 'node:timers/promises';

import type { ElementLocator } from '../schema/index.js';
import type { ElementHandle } from '../browser/session.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import {
  NotInteractableError,
  ResolutionTimeoutError,
  StaleReferenceError,
} from './errors.js';
import type { ElementResolver, ResolveOptions, ResolvedElement } from './resolver.js';

export interface StaleRetryPolicy {
  attempts: number;
  /** Pause between attempts, ms. */
  pause: number;
}

export interface TypeOptions extends ResolveOptions {
  /** Defaults to true. */
  clearFirst?: boolean;
}

export interface ReadOptions extends ResolveOptions {
  /** Absence yields `''` instead of a ResolutionTimeoutError. */
  optional?: boolean;
}

const DEFAULT_RETRY: StaleRetryPolicy = {
  attempts: LIMITS.STALE_RETRY_ATTEMPTS,
  pause: TIMEOUTS.STALE_RETRY_PAUSE,
};

export class InteractionExecutor {
  constructor(
    private readonly resolver: ElementResolver,
    private readonly retry: StaleRetryPolicy = DEFAULT_RETRY,
  ) {}

  /**
   * Resolve in clickable mode and click. A stale handle triggers a fresh
   * resolution and another try, up to `retry.attempts` in total. A click
   * the page refuses natively is replayed once from script.
   */
  async click(locator: ElementLocator, options: ResolveOptions = {}): Promise<ResolvedElement> {
    let lastStale: StaleReferenceError | undefined;

    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      const resolved = await this.resolver.resolve(locator, 'clickable', options);
      try {
        await clickWithFallback(locator, resolved.element);
        return resolved;
      } catch (err) {
        if (!(err instanceof StaleReferenceError)) {
          throw err;
        }
        lastStale = err;
        log.debug(
          `${locator.description}: stale on click attempt ${String(attempt)}/${String(this.retry.attempts)}`,
        );
        if (attempt < this.retry.attempts) {
          await sleep(this.retry.pause);
        }
      }
    }

    throw new StaleReferenceError(
      `${locator.description} stayed stale after ${String(this.retry.attempts)} click attempts`,
      { cause: lastStale },
    );
  }

  /** Typing is never retried: a stale field may already hold partial input. */
  async typeText(
    locator: ElementLocator,
    text: string,
    options: TypeOptions = {},
  ): Promise<ResolvedElement> {
    const resolved = await this.resolver.resolve(locator, 'visible', options);
    if (options.clearFirst ?? true) {
      await resolved.element.clear();
    }
    await resolved.element.type(text);
    return resolved;
  }

  async clear(locator: ElementLocator, options: ResolveOptions = {}): Promise<ResolvedElement> {
    const resolved = await this.resolver.resolve(locator, 'visible', options);
    await resolved.element.clear();
    return resolved;
  }

  async readText(locator: ElementLocator, options: ReadOptions = {}): Promise<string> {
    return this.read(locator, 'visible', options, (el) => el.text());
  }

  async readAttribute(
    locator: ElementLocator,
    name: string,
    options: ReadOptions = {},
  ): Promise<string> {
    return this.read(locator, 'present', options, async (el) => (await el.attribute(name)) ?? '');
  }

  /** Live DOM property, stringified; `null`/`undefined` read as `''`. */
  async readProperty(
    locator: ElementLocator,
    name: string,
    options: ReadOptions = {},
  ): Promise<string> {
    return this.read(locator, 'present', options, async (el) => {
      const value = await el.property(name);
      return value === null || value === undefined ? '' : String(value);
    });
  }

  async isEnabled(locator: ElementLocator, options: ResolveOptions = {}): Promise<boolean> {
    const { element } = await this.resolver.resolve(locator, 'present', options);
    return element.isEnabled();
  }

  private async read(
    locator: ElementLocator,
    mode: 'present' | 'visible',
    options: ReadOptions,
    extract: (element: ElementHandle) => Promise<string>,
  ): Promise<string> {
    let resolved: ResolvedElement;
    try {
      resolved = await this.resolver.resolve(locator, mode, options);
    } catch (err) {
      if (options.optional && err instanceof ResolutionTimeoutError) {
        return '';
      }
      throw err;
    }
    return extract(resolved.element);
  }
}

async function clickWithFallback(locator: ElementLocator, element: ElementHandle): Promise<void> {
  try {
    await element.click();
  } catch (err) {
    if (!(err instanceof NotInteractableError)) {
      throw err;
    }
    log.debug(`${locator.description}: native click blocked, dispatching from script`);
    await element.scriptClick();
  }
}
