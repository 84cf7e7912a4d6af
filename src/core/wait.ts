import { setTimeout as sleep } from 'node:timers/promises';

import type { LocatorStrategy } from '../schema/index.js';
import type { ElementHandle, RemoteBrowserSession } from '../browser/session.js';
import { describeStrategy } from '../browser/selectors.js';
import { StaleReferenceError, WaitTimeoutError } from './errors.js';

// ── Conditions ───────────────────────────────────────────────

interface ConditionBudget {
  /** Overrides the engine default for this call. */
  timeout?: number;
  pollInterval?: number;
}

export interface PresentCondition extends ConditionBudget {
  kind: 'present';
  strategy: LocatorStrategy;
}

export interface VisibleCondition extends ConditionBudget {
  kind: 'visible';
  strategy: LocatorStrategy;
}

export interface ClickableCondition extends ConditionBudget {
  kind: 'clickable';
  strategy: LocatorStrategy;
}

export interface TextContainsCondition extends ConditionBudget {
  kind: 'textContains';
  strategy: LocatorStrategy;
  text: string;
}

export interface HiddenCondition extends ConditionBudget {
  kind: 'hidden';
  strategy: LocatorStrategy;
}

export interface UrlContainsCondition extends ConditionBudget {
  kind: 'urlContains';
  fragment: string;
}

export interface ScriptCondition extends ConditionBudget {
  kind: 'script';
  /** Evaluated in the page; the condition holds when it yields `true`. */
  expression: string;
  description?: string;
}

export interface DocumentReadyCondition extends ConditionBudget {
  kind: 'documentReady';
}

/** Conditions satisfied by a concrete element. */
export type ElementCondition =
  | PresentCondition
  | VisibleCondition
  | ClickableCondition
  | TextContainsCondition;

/** Conditions over page state with no element to hand back. */
export type StateCondition =
  | HiddenCondition
  | UrlContainsCondition
  | ScriptCondition
  | DocumentReadyCondition;

export type WaitCondition = ElementCondition | StateCondition;

export interface WaitDefaults {
  timeout: number;
  pollInterval: number;
}

// ── Polling primitive ────────────────────────────────────────

/**
 * Re-run `probe` every `pollInterval` ms until it returns a non-null
 * value or `timeout` elapses. The probe always runs at least once.
 *
 * A stale element during probing means the page is mid re-render and
 * counts as "not yet". Any other error from the probe propagates as is,
 * so callers can tell a timeout from a broken predicate.
 */
export async function poll<T>(
  description: string,
  probe: () => Promise<T | null>,
  budget: WaitDefaults,
): Promise<T> {
  const startedAt = Date.now();
  const deadline = startedAt + budget.timeout;
  let lastError: unknown;

  for (;;) {
    try {
      const result = await probe();
      if (result !== null) {
        return result;
      }
    } catch (err) {
      if (!(err instanceof StaleReferenceError)) {
        throw err;
      }
      lastError = err;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new WaitTimeoutError(description, budget.timeout, Date.now() - startedAt, lastError);
    }
    await sleep(Math.min(budget.pollInterval, remaining));
  }
}

// ── Engine ───────────────────────────────────────────────────

export class WaitEngine {
  constructor(
    private readonly session: RemoteBrowserSession,
    private readonly defaults: WaitDefaults,
  ) {}

  /** Wait for any condition; elements resolve to their handle. */
  async until(condition: WaitCondition): Promise<ElementHandle | true> {
    switch (condition.kind) {
      case 'present':
      case 'visible':
      case 'clickable':
      case 'textContains':
        return this.untilElement(condition);
      default:
        return this.untilState(condition);
    }
  }

  async untilElement(condition: ElementCondition): Promise<ElementHandle> {
    return poll(describeCondition(condition), () => this.probeElement(condition), this.budget(condition));
  }

  async untilState(condition: StateCondition): Promise<true> {
    return poll(
      describeCondition(condition),
      async () => ((await this.probeState(condition)) ? true : null),
      this.budget(condition),
    );
  }

  /** Optional-returning `until`: a timeout yields `null` or `false`. */
  async check(condition: WaitCondition): Promise<ElementHandle | boolean | null> {
    switch (condition.kind) {
      case 'present':
      case 'visible':
      case 'clickable':
      case 'textContains':
        return this.checkElement(condition);
      default:
        return this.checkState(condition);
    }
  }

  /** Like `untilElement`, but a timeout yields `null` instead of throwing. */
  async checkElement(condition: ElementCondition): Promise<ElementHandle | null> {
    try {
      return await this.untilElement(condition);
    } catch (err) {
      if (err instanceof WaitTimeoutError) return null;
      throw err;
    }
  }

  /** Like `untilState`, but a timeout yields `false` instead of throwing. */
  async checkState(condition: StateCondition): Promise<boolean> {
    try {
      return await this.untilState(condition);
    } catch (err) {
      if (err instanceof WaitTimeoutError) return false;
      throw err;
    }
  }

  get defaultTimeout(): number {
    return this.defaults.timeout;
  }

  private budget(condition: WaitCondition): WaitDefaults {
    return {
      timeout: condition.timeout ?? this.defaults.timeout,
      pollInterval: condition.pollInterval ?? this.defaults.pollInterval,
    };
  }

  private async probeElement(condition: ElementCondition): Promise<ElementHandle | null> {
    const candidates = await this.session.findElements(condition.strategy);

    for (const element of candidates) {
      switch (condition.kind) {
        case 'present':
          return element;
        case 'visible':
          if (await element.isVisible()) return element;
          break;
        case 'clickable':
          if ((await element.isVisible()) && (await element.isEnabled())) return element;
          break;
        case 'textContains':
          if ((await element.text()).includes(condition.text)) return element;
          break;
      }
    }

    return null;
  }

  private async probeState(condition: StateCondition): Promise<boolean> {
    switch (condition.kind) {
      case 'hidden': {
        const candidates = await this.session.findElements(condition.strategy);
        for (const element of candidates) {
          if (await element.isVisible()) return false;
        }
        return true;
      }
      case 'urlContains':
        return (await this.session.currentUrl()).includes(condition.fragment);
      case 'script':
        return (await this.session.executeScript(condition.expression)) === true;
      case 'documentReady':
        return (await this.session.readyState()) === 'complete';
    }
  }
}

// ── Description helper ───────────────────────────────────────

export function describeCondition(condition: WaitCondition): string {
  switch (condition.kind) {
    case 'present':
      return `${describeStrategy(condition.strategy)} to be present`;
    case 'visible':
      return `${describeStrategy(condition.strategy)} to be visible`;
    case 'clickable':
      return `${describeStrategy(condition.strategy)} to be clickable`;
    case 'textContains':
      return `${describeStrategy(condition.strategy)} to contain "${condition.text}"`;
    case 'hidden':
      return `${describeStrategy(condition.strategy)} to be hidden`;
    case 'urlContains':
      return `URL to contain "${condition.fragment}"`;
    case 'script':
      return condition.description ?? `script \`${condition.expression}\` to return true`;
    case 'documentReady':
      return 'document to finish loading';
  }
}
