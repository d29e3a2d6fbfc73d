/**
 * Scenario module.
 * Coordinates build, locate, execute and verify for one bundle mode.
 */

export { BundleScenario, type BundleScenarioOptions } from './scenario.js';
export {
  applyTransition,
  canTransition,
  getNextState,
  isTerminalState,
  stageForState,
  InvalidTransitionError,
} from './state-machine.js';
export { withScenarioEnvironment, type EnvironmentScopeOptions } from './environment-scope.js';
export {
  ScenarioError,
  ScriptNotFoundError,
  BuildFailureError,
  NoArtifactsFoundError,
  NonZeroExitError,
  ExecutionTimeoutError,
  ArtifactLaunchError,
  ManifestMismatchError,
  formatMissingEntry,
} from './errors.js';
