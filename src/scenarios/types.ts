import type { ScenarioContext } from '../lifecycle/context.js';

export interface ScenarioStep {
  /** Business-readable phrase shown in logs and reports. */
  text: string;
  run(ctx: ScenarioContext): Promise<void>;
}

export interface ScenarioDefinition {
  name: string;
  tags: readonly string[];
  steps: readonly ScenarioStep[];
  /** When set, the scenario is counted as skipped without a session. */
  skip?: string;
}
