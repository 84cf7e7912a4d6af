import type {
  BrowserCookie,
  ConsoleEntry,
  LocatorStrategy,
  Settings,
  WindowSize,
} from '../schema/index.js';

// ── Element handle ───────────────────────────────────────────

/**
 * A live reference to one rendered element.
 *
 * Actions reject with StaleReferenceError when the element has left the
 * render tree, and with NotInteractableError when it is present but does
 * not accept native input.
 */
export interface ElementHandle {
  /** The strategy that produced this handle, for logs. */
  readonly origin: LocatorStrategy;

  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;

  click(): Promise<void>;
  /** Click dispatched from page script, bypassing native hit-testing. */
  scriptClick(): Promise<void>;
  type(text: string): Promise<void>;
  clear(): Promise<void>;

  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** Live DOM property (e.g. `validationMessage`, `value`). */
  property(name: string): Promise<unknown>;
}

// ── Session ──────────────────────────────────────────────────

export type DocumentReadyState = 'loading' | 'interactive' | 'complete';

export interface SessionTimeouts {
  /** Default budget for native element actions. */
  implicitWait: number;
  pageLoad: number;
}

/**
 * One exclusively owned browser session. The core talks to the browser
 * only through this capability set.
 */
export interface RemoteBrowserSession {
  readonly id: string;

  navigate(url: string): Promise<void>;
  /** All elements matching the strategy right now; never waits. */
  findElements(strategy: LocatorStrategy): Promise<ElementHandle[]>;
  executeScript(expression: string): Promise<unknown>;

  currentUrl(): Promise<string>;
  title(): Promise<string>;
  pageSource(): Promise<string>;
  readyState(): Promise<DocumentReadyState>;

  cookies(): Promise<BrowserCookie[]>;
  consoleLogs(): Promise<ConsoleEntry[]>;
  screenshot(filePath: string): Promise<void>;

  windowSize(): Promise<WindowSize>;
  setWindowSize(size: WindowSize): Promise<void>;
  configureTimeouts(timeouts: SessionTimeouts): void;

  close(): Promise<void>;
}

// ── Factory ──────────────────────────────────────────────────

export interface SessionFactory {
  create(settings: Settings): Promise<RemoteBrowserSession>;
}
