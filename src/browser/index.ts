/**
 * Browser boundary.
 * Playwright-backed implementation of the RemoteBrowserSession
 * capability set the core depends on.
 */

export { toPlaywrightSelector, describeStrategy, describeLocator } from './selectors.js';
export { launchSession, playwrightSessionFactory, mapActionError } from './runner.js';
export { attachConsoleCapture } from './capture.js';
export type { ConsoleCollector } from './capture.js';
export type {
  ElementHandle,
  RemoteBrowserSession,
  SessionFactory,
  SessionTimeouts,
  DocumentReadyState,
} from './session.js';
