export { ScenarioLifecycleManager } from './manager.js';
export type { LifecycleOptions } from './manager.js';
export { ScenarioContext } from './context.js';
export { TestMetrics, computePassRate } from './metrics.js';
export { FileArtifactSink, artifactFileName, sanitizeArtifactName } from './artifacts.js';
export type { ArtifactSink, ArtifactTarget } from './artifacts.js';
