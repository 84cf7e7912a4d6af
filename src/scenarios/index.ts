import type { ScenarioDefinition } from './types.js';

export type { ScenarioDefinition, ScenarioStep } from './types.js';
export { buildAuthScenarios } from './auth.js';

export interface ScenarioFilter {
  /** Keep scenarios carrying any of these tags. */
  tags?: readonly string[];
  /** Keep scenarios whose name contains any of these, case-insensitive. */
  names?: readonly string[];
}

/** Empty filters keep everything; both filters must match when both are set. */
export function selectScenarios(
  scenarios: readonly ScenarioDefinition[],
  filter: ScenarioFilter = {},
): ScenarioDefinition[] {
  const tags = (filter.tags ?? []).map((t) => t.toLowerCase());
  const names = (filter.names ?? []).map((n) => n.toLowerCase());

  return scenarios.filter((scenario) => {
    const tagged =
      tags.length === 0 || scenario.tags.some((t) => tags.includes(t.toLowerCase()));
    const named =
      names.length === 0 || names.some((n) => scenario.name.toLowerCase().includes(n));
    return tagged && named;
  });
}
