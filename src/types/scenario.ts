import type { Artifact, ExecutionResult } from './artifact.js';
import type { BundleMode } from './build.js';
import type { VerifyOutcome } from './manifest.js';

// Scenario State
export const ScenarioState = {
  PENDING: 'pending',
  BUILT: 'built',
  LOCATED: 'located',
  EXECUTED: 'executed',
  VERIFIED: 'verified',
  PASSED: 'passed',
  FAILED: 'failed',
} as const;

export type ScenarioState = (typeof ScenarioState)[keyof typeof ScenarioState];

// Scenario Event
export const ScenarioEvent = {
  BUILD_SUCCEEDED: 'build_succeeded',
  ARTIFACTS_LOCATED: 'artifacts_located',
  ARTIFACTS_EXECUTED: 'artifacts_executed',
  MANIFESTS_VERIFIED: 'manifests_verified',
  COMPLETED: 'completed',
  STAGE_FAILED: 'stage_failed',
} as const;

export type ScenarioEvent = (typeof ScenarioEvent)[keyof typeof ScenarioEvent];

// Scenario Stage
export const ScenarioStage = {
  BUILD: 'build',
  LOCATE: 'locate',
  EXECUTE: 'execute',
  VERIFY: 'verify',
} as const;

export type ScenarioStage = (typeof ScenarioStage)[keyof typeof ScenarioStage];

export interface ScenarioFailure {
  stage: ScenarioStage;
  message: string;
  error: Error;
}

export interface ScenarioOptions {
  /** Extra arguments for the packaging tool, appended after the defaults */
  toolArgs?: string[];
  /** Executable name; derived from the script name when omitted */
  appName?: string;
  /** Arguments passed to every built executable */
  appArgs?: string[];
  /** Per-artifact execution limit; falls back to the builder's default */
  timeoutMs?: number;
  /** Base name for manifest discovery; defaults to the application name */
  manifestName?: string;
}

// Scenario Report
export interface ScenarioReport {
  script: string;
  appName: string;
  mode: BundleMode;
  state: ScenarioState;
  history: ScenarioState[];
  artifacts: Artifact[];
  executions: ExecutionResult[];
  verification: VerifyOutcome | null;
  failure: ScenarioFailure | null;
  durationMs: number;
}
