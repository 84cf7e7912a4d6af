/**
 * Shared schemas and the types inferred from them.
 */

export * from './locator.js';
export * from './config.js';
export * from './testData.js';
export * from './capture.js';
export * from './results.js';
export * from './jsonOutput.js';
