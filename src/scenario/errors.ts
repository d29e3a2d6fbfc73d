/**
 * Scenario failure types. Each carries the stage it aborted.
 */

import { ScenarioStage, type MissingEntry } from '../types/index.js';

/**
 * Base class for every failure that aborts a scenario.
 */
export class ScenarioError extends Error {
  readonly stage: ScenarioStage;

  constructor(stage: ScenarioStage, message: string) {
    super(message);
    this.name = 'ScenarioError';
    this.stage = stage;
    Object.setPrototypeOf(this, ScenarioError.prototype);
  }
}

export class ScriptNotFoundError extends ScenarioError {
  readonly name = 'ScriptNotFoundError';
  readonly script: string;

  constructor(script: string) {
    super(ScenarioStage.BUILD, `Script ${script} not found.`);
    this.script = script;
    Object.setPrototypeOf(this, ScriptNotFoundError.prototype);
  }
}

export class BuildFailureError extends ScenarioError {
  readonly name = 'BuildFailureError';
  readonly script: string;
  readonly exitCode: number | null;

  constructor(script: string, exitCode: number | null) {
    super(ScenarioStage.BUILD, `Build of ${script} failed.`);
    this.script = script;
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, BuildFailureError.prototype);
  }
}

export class NoArtifactsFoundError extends ScenarioError {
  readonly name = 'NoArtifactsFoundError';
  readonly distDir: string;
  readonly appName: string;

  constructor(distDir: string, appName: string) {
    super(ScenarioStage.LOCATE, 'No executable file was found.');
    this.distDir = distDir;
    this.appName = appName;
    Object.setPrototypeOf(this, NoArtifactsFoundError.prototype);
  }
}

export class NonZeroExitError extends ScenarioError {
  readonly name = 'NonZeroExitError';
  readonly artifactPath: string;
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(artifactPath: string, exitCode: number | null, signal: string | null = null) {
    const code = exitCode ?? signal ?? 'unknown';
    super(ScenarioStage.EXECUTE, `Running exe ${artifactPath} failed with return-code ${code}.`);
    this.artifactPath = artifactPath;
    this.exitCode = exitCode;
    this.signal = signal;
    Object.setPrototypeOf(this, NonZeroExitError.prototype);
  }
}

export class ExecutionTimeoutError extends ScenarioError {
  readonly name = 'ExecutionTimeoutError';
  readonly artifactPath: string;
  readonly timeoutMs: number;

  constructor(artifactPath: string, timeoutMs: number) {
    super(ScenarioStage.EXECUTE, `Running exe ${artifactPath} timed out after ${timeoutMs}ms.`);
    this.artifactPath = artifactPath;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ExecutionTimeoutError.prototype);
  }
}

export class ArtifactLaunchError extends ScenarioError {
  readonly name = 'ArtifactLaunchError';
  readonly artifactPath: string;

  constructor(artifactPath: string) {
    super(ScenarioStage.EXECUTE, `Failed to start ${artifactPath}`);
    this.artifactPath = artifactPath;
    Object.setPrototypeOf(this, ArtifactLaunchError.prototype);
  }
}

/**
 * One line per missing pattern or missing artifact.
 */
export function formatMissingEntry(entry: MissingEntry): string {
  if (entry.kind === 'artifact') {
    return `Executable for ${entry.manifest} missing`;
  }
  return `Missing ${entry.pattern} in ${entry.artifact}`;
}

export class ManifestMismatchError extends ScenarioError {
  readonly name = 'ManifestMismatchError';
  readonly missing: MissingEntry[];

  constructor(missing: MissingEntry[]) {
    super(ScenarioStage.VERIFY, missing.map(formatMissingEntry).join('\n'));
    this.missing = missing;
    Object.setPrototypeOf(this, ManifestMismatchError.prototype);
  }
}
