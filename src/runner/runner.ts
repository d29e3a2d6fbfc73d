/**
 * Execution runner.
 * Runs one built artifact from its own directory with a reduced environment.
 */

import { basename, dirname, join } from 'node:path';
import { execa } from 'execa';
import type { Artifact, ExecutionResult, Platform, RunOptions } from '../types/index.js';
import { detectPlatform, getCapabilities } from '../platform/index.js';
import { ArtifactLaunchError } from '../scenario/errors.js';
import { buildChildEnv } from './environment.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('runner');

/**
 * Grace period between SIGTERM and SIGKILL once the time limit expires.
 */
const FORCE_KILL_DELAY_MS = 5000;

export interface Invocation {
  file: string;
  cwd: string;
}

/**
 * Work out how to call an artifact: from its own directory, by relative name
 * where the host resolves it against the child's cwd.
 */
export function invocationFor(artifactPath: string, platform: Platform): Invocation {
  const cwd = dirname(artifactPath);
  const file = getCapabilities(platform).relativeInvocation
    ? `./${basename(artifactPath)}`
    : join(cwd, basename(artifactPath));

  return { file, cwd };
}

/**
 * Execute an artifact and report its exit status.
 * Output goes straight to this process's stdout/stderr.
 */
export async function runArtifact(
  artifact: Artifact,
  args: readonly string[] = [],
  options: RunOptions = {},
  platform: Platform = detectPlatform()
): Promise<ExecutionResult> {
  const { file, cwd } = invocationFor(artifact.path, platform);
  const env = buildChildEnv(options.baseEnv ?? process.env, platform);
  const timeoutMs = options.timeoutMs ?? 0;

  log.info({ invocation: file, cwd, args, timeoutMs }, `RUNNING: ${file}`);

  const result = await execa(file, [...args], {
    cwd,
    env,
    extendEnv: false,
    stdio: 'inherit',
    reject: false,
    timeout: timeoutMs,
    forceKillAfterDelay: FORCE_KILL_DELAY_MS,
    windowsHide: true,
  });

  const exitCode = result.exitCode ?? null;
  const signal = result.signal ?? null;

  if (result.failed && exitCode === null && signal === null && !result.timedOut) {
    log.error({ artifact: artifact.path, command: result.command }, 'Artifact could not be started');
    throw new ArtifactLaunchError(artifact.path);
  }

  const execution: ExecutionResult = {
    artifact,
    exitCode,
    signal,
    timedOut: result.timedOut,
    durationMs: result.durationMs,
  };

  log.debug(
    {
      artifact: artifact.path,
      exitCode,
      signal,
      timedOut: execution.timedOut,
      durationMs: execution.durationMs,
    },
    'Artifact finished'
  );

  return execution;
}
