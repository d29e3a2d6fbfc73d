/**
 * Bundle scenario.
 * Drives one build-and-verify scenario: build the script, locate the
 * executables, run each one, then check manifests if the scenario has any.
 */

import { access } from 'node:fs/promises';
import { join, parse, resolve } from 'node:path';
import {
  ScenarioEvent,
  ScenarioState,
  type Artifact,
  type BundleMode,
  type ContentLister,
  type DependencyGraph,
  type ExecutionResult,
  type Platform,
  type ScenarioFailure,
  type ScenarioOptions,
  type ScenarioReport,
  type VerifyOutcome,
} from '../types/index.js';
import { BuildOrchestrator, createBuildRequest } from '../builder/orchestrator.js';
import type { PackagingTool } from '../builder/tool.js';
import { locate } from '../locator/locator.js';
import { runArtifact } from '../runner/runner.js';
import { discoverManifests } from '../manifest/discovery.js';
import { loadManifests } from '../manifest/parser.js';
import { verifyManifests } from '../manifest/verifier.js';
import { detectPlatform } from '../platform/index.js';
import { applyTransition, stageForState } from './state-machine.js';
import { withScenarioEnvironment } from './environment-scope.js';
import {
  BuildFailureError,
  ExecutionTimeoutError,
  ManifestMismatchError,
  NoArtifactsFoundError,
  NonZeroExitError,
  ScenarioError,
  ScriptNotFoundError,
} from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scenario');

export interface BundleScenarioOptions {
  /** Private directory of this scenario; the tool's specpath, dist and build dirs live here */
  workDir: string;
  mode: BundleMode;
  tool: PackagingTool;
  lister: ContentLister;
  /** Directory scripts are resolved against */
  scriptsDir: string;
  /** Directory manifests are discovered in; defaults to `scriptsDir` */
  manifestsDir?: string;
  /** Shared precomputed dependency graph, copied for every build */
  graph?: DependencyGraph;
  platform?: Platform;
  /** Default per-artifact execution limit; 0 disables it */
  runTimeoutMs?: number;
}

export class BundleScenario {
  readonly mode: BundleMode;
  readonly workDir: string;
  readonly specDir: string;
  readonly distDir: string;
  readonly buildDir: string;

  private readonly orchestrator: BuildOrchestrator;
  private readonly lister: ContentLister;
  private readonly scriptsDir: string;
  private readonly manifestsDir: string;
  private readonly graph: DependencyGraph;
  private readonly platform: Platform;
  private readonly runTimeoutMs: number;

  constructor(options: BundleScenarioOptions) {
    this.mode = options.mode;
    this.workDir = resolve(options.workDir);
    this.specDir = this.workDir;
    this.distDir = join(this.workDir, 'dist');
    this.buildDir = join(this.workDir, 'build');
    this.orchestrator = new BuildOrchestrator({ tool: options.tool, configDir: this.workDir });
    this.lister = options.lister;
    this.scriptsDir = resolve(options.scriptsDir);
    this.manifestsDir = resolve(options.manifestsDir ?? options.scriptsDir);
    this.graph = options.graph;
    this.platform = options.platform ?? detectPlatform();
    this.runTimeoutMs = options.runTimeoutMs ?? 0;
  }

  /**
   * Run the scenario and report its outcome. Scenario failures are recorded
   * in the report, not thrown.
   */
  async run(script: string, options: ScenarioOptions = {}): Promise<ScenarioReport> {
    const startTime = Date.now();
    const appName = options.appName ?? parse(script).name;

    let state: ScenarioState = ScenarioState.PENDING;
    const history: ScenarioState[] = [state];
    const advance = (event: ScenarioEvent): void => {
      state = applyTransition(state, event);
      history.push(state);
    };

    const artifacts: Artifact[] = [];
    const executions: ExecutionResult[] = [];
    let verification: VerifyOutcome | null = null;
    let failure: ScenarioFailure | null = null;

    log.info({ script, appName, mode: this.mode, workDir: this.workDir }, 'Starting scenario');

    try {
      await withScenarioEnvironment({ cwd: this.workDir }, async () => {
        // Build
        const scriptPath = await this.resolveScript(script);
        const toolArgs = [...(options.toolArgs ?? [])];
        if (options.appName) {
          toolArgs.push('--name', options.appName);
        }

        const request = createBuildRequest({
          scriptPath,
          appName,
          mode: this.mode,
          toolArgs,
          specDir: this.specDir,
          distDir: this.distDir,
          buildDir: this.buildDir,
        });

        const outcome = await this.orchestrator.build(request, this.graph);
        if (!outcome.success) {
          throw new BuildFailureError(script, outcome.exitCode);
        }
        advance(ScenarioEvent.BUILD_SUCCEEDED);

        // Locate
        artifacts.push(...(await locate(outcome.distDir, appName, this.platform)));
        if (artifacts.length === 0) {
          throw new NoArtifactsFoundError(outcome.distDir, appName);
        }
        advance(ScenarioEvent.ARTIFACTS_LOCATED);

        // Execute, one artifact at a time
        const timeoutMs = options.timeoutMs ?? this.runTimeoutMs;
        for (const artifact of artifacts) {
          const execution = await runArtifact(
            artifact,
            options.appArgs ?? [],
            { timeoutMs },
            this.platform
          );
          executions.push(execution);

          if (execution.timedOut) {
            throw new ExecutionTimeoutError(artifact.path, timeoutMs);
          }
          if (execution.exitCode !== 0) {
            throw new NonZeroExitError(artifact.path, execution.exitCode, execution.signal);
          }
        }
        advance(ScenarioEvent.ARTIFACTS_EXECUTED);

        // Verify
        const manifestPaths = await discoverManifests(
          this.manifestsDir,
          options.manifestName ?? appName
        );
        if (manifestPaths.length > 0) {
          const manifests = await loadManifests(manifestPaths);
          verification = await verifyManifests(artifacts, manifests, this.lister);
          if (!verification.ok) {
            throw new ManifestMismatchError(verification.missing);
          }
          advance(ScenarioEvent.MANIFESTS_VERIFIED);
        }

        advance(ScenarioEvent.COMPLETED);
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const stage = err instanceof ScenarioError ? err.stage : stageForState(state);
      failure = { stage, message: err.message, error: err };
      advance(ScenarioEvent.STAGE_FAILED);

      log.warn({ script, mode: this.mode, stage, error: err.message }, 'Scenario failed');
    }

    const report: ScenarioReport = {
      script,
      appName,
      mode: this.mode,
      state,
      history,
      artifacts,
      executions,
      verification,
      failure,
      durationMs: Date.now() - startTime,
    };

    log.info(
      { script, mode: this.mode, state, durationMs: report.durationMs },
      'Scenario complete'
    );

    return report;
  }

  /**
   * Run the scenario and throw its failure, if any.
   */
  async testScript(script: string, options: ScenarioOptions = {}): Promise<ScenarioReport> {
    const report = await this.run(script, options);
    if (report.failure) {
      throw report.failure.error;
    }
    return report;
  }

  private async resolveScript(script: string): Promise<string> {
    const scriptPath = resolve(this.scriptsDir, script);
    try {
      await access(scriptPath);
    } catch {
      throw new ScriptNotFoundError(script);
    }
    return scriptPath;
  }
}
