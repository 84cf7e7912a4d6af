/**
 * CLI module: parses arguments, delegates to the lifecycle manager,
 * handles exit codes. No business logic lives here.
 */

export { registerRunCommand, registerListCommand, applyRunOptions } from './run.js';
export type { RunOptions } from './run.js';
