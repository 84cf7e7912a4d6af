import type { Settings, TestData } from '../schema/index.js';
import type { RemoteBrowserSession } from '../browser/session.js';
import type { PageModels } from '../pages/index.js';

/**
 * Everything one scenario may touch. Built fresh for each scenario and
 * cleared at its end; nothing here outlives the session it wraps.
 */
export class ScenarioContext {
  private readonly data = new Map<string, unknown>();

  constructor(
    readonly scenario: string,
    readonly session: RemoteBrowserSession,
    readonly pages: PageModels,
    readonly settings: Settings,
    readonly testData: TestData,
  ) {}

  remember(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  recall(key: string): unknown {
    return this.data.get(key);
  }

  /** Keys of scenario-local data currently held. */
  keys(): string[] {
    return [...this.data.keys()];
  }

  clear(): void {
    this.data.clear();
  }
}
