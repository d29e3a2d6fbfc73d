/**
 * Build orchestrator.
 * Assembles the packaging invocation for a request and runs the tool on a
 * private copy of the shared dependency graph.
 */

import {
  BundleMode,
  buildRequestSchema,
  type BuildOutcome,
  type BuildRequest,
  type BuildRequestInput,
  type DependencyGraph,
} from '../types/index.js';
import type { PackagingTool } from './tool.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('build-orchestrator');

const MODE_FLAGS: Record<BundleMode, string> = {
  [BundleMode.ONE_DIR]: '--onedir',
  [BundleMode.ONE_FILE]: '--onefile',
};

/**
 * Validate a request and freeze it; requests are never mutated afterwards.
 */
export function createBuildRequest(input: BuildRequestInput): BuildRequest {
  const data = buildRequestSchema.parse(input);
  return Object.freeze({
    ...data,
    toolArgs: Object.freeze([...data.toolArgs]),
  });
}

/**
 * Full tool argument list. Order is fixed so caller-supplied arguments,
 * which come last, can override the defaults.
 */
export function assembleToolArgs(request: BuildRequest): string[] {
  return [
    request.scriptPath,
    '--debug',
    '--noupx',
    '--specpath',
    request.specDir,
    '--distpath',
    request.distDir,
    '--workpath',
    request.buildDir,
    '--log-level=DEBUG',
    MODE_FLAGS[request.mode],
    ...request.toolArgs,
  ];
}

export interface BuildOrchestratorOptions {
  tool: PackagingTool;
  /** Override directory for the tool's persisted configuration */
  configDir: string;
}

export class BuildOrchestrator {
  private readonly tool: PackagingTool;
  private readonly configDir: string;

  constructor(options: BuildOrchestratorOptions) {
    this.tool = options.tool;
    this.configDir = options.configDir;
  }

  /**
   * Run the packaging tool for one request. The shared graph is deep-copied
   * so the tool can never mutate the caller's instance.
   */
  async build(request: BuildRequest, sharedGraph: DependencyGraph): Promise<BuildOutcome> {
    const args = assembleToolArgs(request);
    const startTime = Date.now();

    log.info(
      { script: request.scriptPath, mode: request.mode, tool: this.tool.name },
      'Starting build'
    );

    const result = await this.tool.run(args, {
      configDir: this.configDir,
      dependencyGraph: structuredClone(sharedGraph),
    });

    const outcome: BuildOutcome = {
      success: result.exitCode === 0,
      distDir: request.distDir,
      exitCode: result.exitCode,
    };

    log.info(
      {
        script: request.scriptPath,
        success: outcome.success,
        exitCode: outcome.exitCode,
        durationMs: Date.now() - startTime,
      },
      'Build finished'
    );

    return outcome;
  }
}
