/**
 * packcheck library API
 *
 * Exports the build, locate, run and verify stages for programmatic usage.
 */

// Types
export * from './types/index.js';

// Scenario (main entry point)
export {
  BundleScenario,
  type BundleScenarioOptions,
  ScenarioError,
  ScriptNotFoundError,
  BuildFailureError,
  NoArtifactsFoundError,
  NonZeroExitError,
  ExecutionTimeoutError,
  ArtifactLaunchError,
  ManifestMismatchError,
} from './scenario/index.js';

// Stages
export * as builder from './builder/index.js';
export * as locator from './locator/index.js';
export * as runner from './runner/index.js';
export * as manifest from './manifest/index.js';
export * as platform from './platform/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type PackcheckConfig } from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger, createTempDir, removeTempDir, listTempDirs } from './utils/index.js';
