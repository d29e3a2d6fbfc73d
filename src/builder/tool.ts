/**
 * Packaging tool adapters.
 * The harness treats the tool as a black box: arguments and configuration in,
 * files on disk out, success reported through the exit code.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { execa } from 'execa';
import type { ToolConfig, ToolRunResult } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('packaging-tool');

/**
 * File the dependency graph is serialized to for out-of-process tools.
 */
export const DEPENDENCY_GRAPH_FILE = 'dependency-graph.json';

/**
 * Environment variable pointing an out-of-process tool at the graph file.
 */
export const DEPENDENCY_GRAPH_ENV = 'PACKCHECK_DEPENDENCY_GRAPH';

export interface PackagingTool {
  readonly name: string;
  run(args: readonly string[], config: ToolConfig): Promise<ToolRunResult>;
}

export interface CommandPackagingToolOptions {
  /** Executable to invoke, e.g. `pyinstaller` */
  command: string;
  /** Environment variable the tool reads its config directory from */
  configEnv: string;
  /** Environment to start from; defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * Runs the packaging tool as a child process in the current working directory.
 */
export class CommandPackagingTool implements PackagingTool {
  readonly name: string;
  private readonly command: string;
  private readonly configEnv: string;
  private readonly baseEnv: NodeJS.ProcessEnv | undefined;

  constructor(options: CommandPackagingToolOptions) {
    this.name = options.command;
    this.command = options.command;
    this.configEnv = options.configEnv;
    this.baseEnv = options.baseEnv;
  }

  async run(args: readonly string[], config: ToolConfig): Promise<ToolRunResult> {
    const env: Record<string, string | undefined> = {
      ...(this.baseEnv ?? process.env),
      [this.configEnv]: config.configDir,
    };

    if (config.dependencyGraph !== undefined) {
      const graphPath = join(config.configDir, DEPENDENCY_GRAPH_FILE);
      await writeFile(graphPath, JSON.stringify(config.dependencyGraph), 'utf-8');
      env[DEPENDENCY_GRAPH_ENV] = graphPath;
    }

    log.info({ command: this.command, args }, 'Invoking packaging tool');

    const result = await execa(this.command, [...args], {
      env,
      extendEnv: false,
      stdio: 'inherit',
      reject: false,
    });

    if (result.failed && result.exitCode === undefined) {
      log.error(
        { command: this.command, signal: result.signal, timedOut: result.timedOut },
        'Packaging tool did not exit normally'
      );
    }

    return { exitCode: result.exitCode ?? null };
  }
}
