import { writeFile } from 'node:fs/promises';

import type {
  BrowserCookie,
  ConsoleEntry,
  LocatorStrategy,
  Settings,
  WindowSize,
} from '../../src/schema/index.js';
import type {
  DocumentReadyState,
  ElementHandle,
  RemoteBrowserSession,
  SessionFactory,
  SessionTimeouts,
} from '../../src/browser/session.js';
import { NotInteractableError, StaleReferenceError } from '../../src/core/errors.js';

export interface FakeElementOptions {
  visible?: boolean;
  enabled?: boolean;
  text?: string;
  value?: string;
  attributes?: Record<string, string>;
  properties?: Record<string, unknown>;
  /** Native clicks that fail as stale before one succeeds. */
  staleClicks?: number;
  /** Native clicks are refused; script clicks still work. */
  blocked?: boolean;
  /** Script clicks reject with this error. */
  scriptClickError?: Error;
  /** Every read rejects as stale, like a node replaced by a re-render. */
  stale?: boolean;
  /** Milliseconds after creation before lookups can see the element. */
  appearsAfter?: number;
  onClick?: () => void;
}

/** In-memory element whose counters let tests see what the core did to it. */
export class FakeElement implements ElementHandle {
  visible: boolean;
  enabled: boolean;
  textContent: string;
  value: string;
  readonly attributes: Map<string, string>;
  readonly properties: Map<string, unknown>;
  staleClicks: number;
  blocked: boolean;
  scriptClickError: Error | undefined;
  stale: boolean;
  readonly visibleFrom: number;
  onClick: (() => void) | undefined;

  clickAttempts = 0;
  clicks = 0;
  scriptClicks = 0;
  clears = 0;

  constructor(
    readonly origin: LocatorStrategy,
    options: FakeElementOptions = {},
  ) {
    this.visible = options.visible ?? true;
    this.enabled = options.enabled ?? true;
    this.textContent = options.text ?? '';
    this.value = options.value ?? '';
    this.attributes = new Map(Object.entries(options.attributes ?? {}));
    this.properties = new Map(Object.entries(options.properties ?? {}));
    this.staleClicks = options.staleClicks ?? 0;
    this.blocked = options.blocked ?? false;
    this.scriptClickError = options.scriptClickError;
    this.stale = options.stale ?? false;
    this.visibleFrom = Date.now() + (options.appearsAfter ?? 0);
    this.onClick = options.onClick;
  }

  get mounted(): boolean {
    return Date.now() >= this.visibleFrom;
  }

  private checkAttached(): void {
    if (this.stale) {
      throw new StaleReferenceError('element is not attached to the DOM');
    }
  }

  async isVisible(): Promise<boolean> {
    this.checkAttached();
    return this.visible;
  }

  async isEnabled(): Promise<boolean> {
    return this.enabled;
  }

  async click(): Promise<void> {
    this.clickAttempts += 1;
    if (this.staleClicks > 0) {
      this.staleClicks -= 1;
      throw new StaleReferenceError('element is not attached to the DOM');
    }
    if (this.blocked) {
      throw new NotInteractableError('element intercepts pointer events');
    }
    this.clicks += 1;
    this.onClick?.();
  }

  async scriptClick(): Promise<void> {
    this.scriptClicks += 1;
    if (this.scriptClickError) throw this.scriptClickError;
    this.onClick?.();
  }

  async type(text: string): Promise<void> {
    this.value += text;
  }

  async clear(): Promise<void> {
    this.clears += 1;
    this.value = '';
  }

  async text(): Promise<string> {
    this.checkAttached();
    return this.textContent;
  }

  async attribute(name: string): Promise<string | null> {
    return this.attributes.get(name) ?? null;
  }

  async property(name: string): Promise<unknown> {
    if (name === 'value') return this.value;
    return this.properties.get(name);
  }
}

function keyOf(strategy: LocatorStrategy): string {
  return `${strategy.strategy}:${strategy.value}`;
}

/**
 * Browser session held entirely in memory. Elements are registered per
 * strategy; `text` lookups match any registered element whose text
 * contains the value, case-insensitively.
 */
export class FakeBrowserSession implements RemoteBrowserSession {
  readonly id: string;
  url = 'about:blank';
  pageTitle = 'Fake page';
  html = '<html><body></body></html>';
  ready: DocumentReadyState = 'complete';
  scriptResult: unknown = true;
  cookieJar: BrowserCookie[] = [];
  consoleEntries: ConsoleEntry[] = [];
  size: WindowSize = { width: 1280, height: 720 };
  timeouts: SessionTimeouts | undefined;

  closed = false;
  closeError: Error | undefined;
  readonly navigations: string[] = [];
  readonly lookups: string[] = [];
  readonly failingLookups = new Map<string, Error>();
  private readonly elements = new Map<string, FakeElement[]>();

  constructor(id = 'fake-session') {
    this.id = id;
  }

  add(strategy: LocatorStrategy, options: FakeElementOptions = {}): FakeElement {
    const element = new FakeElement(strategy, options);
    const key = keyOf(strategy);
    this.elements.set(key, [...(this.elements.get(key) ?? []), element]);
    return element;
  }

  remove(strategy: LocatorStrategy): void {
    this.elements.delete(keyOf(strategy));
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    this.url = url;
  }

  async findElements(strategy: LocatorStrategy): Promise<ElementHandle[]> {
    const key = keyOf(strategy);
    this.lookups.push(key);
    const failure = this.failingLookups.get(key);
    if (failure) throw failure;

    if (strategy.strategy === 'text') {
      const needle = strategy.value.toLowerCase();
      const matches: FakeElement[] = [];
      for (const list of this.elements.values()) {
        for (const el of list) {
          if (el.mounted && el.textContent.toLowerCase().includes(needle)) matches.push(el);
        }
      }
      return matches;
    }
    return (this.elements.get(key) ?? []).filter((el) => el.mounted);
  }

  async executeScript(): Promise<unknown> {
    return this.scriptResult;
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  async title(): Promise<string> {
    return this.pageTitle;
  }

  async pageSource(): Promise<string> {
    return this.html;
  }

  async readyState(): Promise<DocumentReadyState> {
    return this.ready;
  }

  async cookies(): Promise<BrowserCookie[]> {
    return this.cookieJar;
  }

  async consoleLogs(): Promise<ConsoleEntry[]> {
    return this.consoleEntries;
  }

  async screenshot(filePath: string): Promise<void> {
    await writeFile(filePath, 'png');
  }

  async windowSize(): Promise<WindowSize> {
    return this.size;
  }

  async setWindowSize(size: WindowSize): Promise<void> {
    this.size = size;
  }

  configureTimeouts(timeouts: SessionTimeouts): void {
    this.timeouts = timeouts;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.closeError) throw this.closeError;
  }
}

/** Hands out a new fake per scenario and keeps them for inspection. */
export class FakeSessionFactory implements SessionFactory {
  readonly created: FakeBrowserSession[] = [];
  failWith: Error | undefined;

  constructor(private readonly prepare: (session: FakeBrowserSession) => void = () => {}) {}

  async create(_settings: Settings): Promise<FakeBrowserSession> {
    if (this.failWith) throw this.failWith;
    const session = new FakeBrowserSession(`fake-${String(this.created.length + 1)}`);
    this.prepare(session);
    this.created.push(session);
    return session;
  }
}
