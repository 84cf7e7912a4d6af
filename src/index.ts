/**
 * Library entry: the pieces needed to drive the authentication scenarios
 * from code rather than the CLI.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './pages/index.js';
export * from './lifecycle/index.js';
export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  formatSummaryText,
  formatDuration,
  writeReports,
} from './report/index.js';
export { buildAuthScenarios, selectScenarios } from './scenarios/index.js';
export type { ScenarioDefinition, ScenarioStep, ScenarioFilter } from './scenarios/index.js';
