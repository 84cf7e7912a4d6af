/**
 * Report generation module.
 * Turns a RunSummary into the text summary, markdown report and JSON.
 */

export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  formatSummaryText,
  formatDuration,
  writeReports,
  SUMMARY_FILE,
  MARKDOWN_FILE,
  JSON_FILE,
} from './reporter.js';
export type { JsonOutput, JsonOutputScenario, JsonOutputStep } from './reporter.js';
