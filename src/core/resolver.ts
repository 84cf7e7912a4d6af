import type { ElementLocator, LocatorStrategy } from '../schema/index.js';
import type { ElementHandle } from '../browser/session.js';
import * as log from '../utils/logger.js';
import { ResolutionTimeoutError, WaitTimeoutError, errorMessage } from './errors.js';
import type { StrategyFailure } from './errors.js';
import type { ElementCondition, WaitEngine } from './wait.js';
import { describeStrategy } from '../browser/selectors.js';

export type ResolutionMode = 'present' | 'visible' | 'clickable';

export interface ResolvedElement {
  element: ElementHandle;
  /** Index into `locator.strategies` of the strategy that won. */
  strategyIndex: number;
  strategy: LocatorStrategy;
}

export type ResolutionOutcome =
  | ({ found: true } & ResolvedElement)
  | { found: false; attempts: StrategyFailure[] };

export interface ResolveOptions {
  /** Budget per strategy, not for the whole call. */
  timeout?: number;
}

/**
 * Ordered-fallback resolution over an ElementLocator.
 *
 * Strategies are tried one at a time, each with its own short wait. The
 * first one that yields an element in the requested mode wins and later
 * strategies are never consulted.
 */
export class ElementResolver {
  constructor(
    private readonly wait: WaitEngine,
    private readonly strategyTimeout: number,
  ) {}

  async attempt(
    locator: ElementLocator,
    mode: ResolutionMode,
    options: ResolveOptions = {},
  ): Promise<ResolutionOutcome> {
    const timeout = options.timeout ?? this.strategyTimeout;
    const attempts: StrategyFailure[] = [];

    for (const [index, strategy] of locator.strategies.entries()) {
      try {
        const element = await this.wait.untilElement(conditionFor(mode, strategy, timeout));
        log.debug(
          `${locator.description}: resolved via strategy ${String(index + 1)}/${String(locator.strategies.length)} (${describeStrategy(strategy)})`,
        );
        return { found: true, element, strategyIndex: index, strategy };
      } catch (err) {
        if (!(err instanceof WaitTimeoutError)) {
          throw err;
        }
        attempts.push({ index, strategy, reason: errorMessage(err) });
      }
    }

    return { found: false, attempts };
  }

  /** Resolve or throw `ResolutionTimeoutError` listing every attempt. */
  async resolve(
    locator: ElementLocator,
    mode: ResolutionMode,
    options: ResolveOptions = {},
  ): Promise<ResolvedElement> {
    const outcome = await this.attempt(locator, mode, options);
    if (!outcome.found) {
      throw new ResolutionTimeoutError(locator.description, outcome.attempts);
    }
    const { element, strategyIndex, strategy } = outcome;
    return { element, strategyIndex, strategy };
  }

  async isResolvable(
    locator: ElementLocator,
    mode: ResolutionMode,
    options: ResolveOptions = {},
  ): Promise<boolean> {
    const outcome = await this.attempt(locator, mode, options);
    return outcome.found;
  }
}

function conditionFor(
  mode: ResolutionMode,
  strategy: LocatorStrategy,
  timeout: number,
): ElementCondition {
  return { kind: mode, strategy, timeout };
}
