/**
 * Element-resolution and interaction core.
 * Talks to the browser only through RemoteBrowserSession; never reads
 * files or the environment.
 */

export {
  HarnessError,
  WaitTimeoutError,
  ResolutionTimeoutError,
  StaleReferenceError,
  NotInteractableError,
  AssertionFailure,
  SessionError,
  ScenarioSkipped,
  errorMessage,
  isHarnessError,
} from './errors.js';
export type { HarnessErrorKind, StrategyFailure } from './errors.js';
export { WaitEngine, poll, describeCondition } from './wait.js';
export type {
  WaitCondition,
  ElementCondition,
  StateCondition,
  WaitDefaults,
} from './wait.js';
export { ElementResolver } from './resolver.js';
export type {
  ResolutionMode,
  ResolutionOutcome,
  ResolvedElement,
  ResolveOptions,
} from './resolver.js';
export { InteractionExecutor } from './interactions.js';
export type { StaleRetryPolicy, TypeOptions, ReadOptions } from './interactions.js';
