import type { LocatorStrategy } from '../schema/index.js';
import { describeStrategy } from '../browser/selectors.js';

// ── Error kinds ───────────────────────────────────────────────

export type HarnessErrorKind =
  | 'resolution-timeout'
  | 'wait-timeout'
  | 'stale-reference'
  | 'not-interactable'
  | 'assertion'
  | 'session'
  | 'skipped';

/**
 * Base class for every failure the harness raises on purpose.
 * `kind` lets callers switch without instanceof chains.
 */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Waiting and resolution ────────────────────────────────────

export class WaitTimeoutError extends HarnessError {
  readonly kind = 'wait-timeout';
  readonly description: string;
  readonly timeout: number;
  readonly elapsed: number;

  constructor(description: string, timeout: number, elapsed: number, lastError?: unknown) {
    const suffix =
      lastError instanceof Error ? ` (last error: ${lastError.message})` : '';
    super(
      `Timed out after ${String(elapsed)}ms waiting for ${description}${suffix}`,
      lastError === undefined ? undefined : { cause: lastError },
    );
    this.description = description;
    this.timeout = timeout;
    this.elapsed = elapsed;
  }
}

export interface StrategyFailure {
  index: number;
  strategy: LocatorStrategy;
  reason: string;
}

export class ResolutionTimeoutError extends HarnessError {
  readonly kind = 'resolution-timeout';
  readonly target: string;
  readonly attempts: readonly StrategyFailure[];

  constructor(target: string, attempts: readonly StrategyFailure[]) {
    const tried = attempts
      .map((a) => `  ${String(a.index + 1)}. ${describeStrategy(a.strategy)}: ${a.reason}`)
      .join('\n');
    super(`Could not resolve "${target}" with any of ${String(attempts.length)} strategies:\n${tried}`);
    this.target = target;
    this.attempts = attempts;
  }
}

// ── Interaction ───────────────────────────────────────────────

export class StaleReferenceError extends HarnessError {
  readonly kind = 'stale-reference';
}

export class NotInteractableError extends HarnessError {
  readonly kind = 'not-interactable';
}

// ── Verification ──────────────────────────────────────────────

export class AssertionFailure extends HarnessError {
  readonly kind = 'assertion';
  readonly actual: string;
  readonly expected: string;

  constructor(message: string, actual: string, expected: string) {
    super(message);
    this.actual = actual;
    this.expected = expected;
  }
}

// ── Session / lifecycle ───────────────────────────────────────

export class SessionError extends HarnessError {
  readonly kind = 'session';
}

/** Thrown by a step to end its scenario as skipped rather than failed. */
export class ScenarioSkipped extends HarnessError {
  readonly kind = 'skipped';
}

// ── Helpers ───────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}
