/**
 * Scoped working-directory and PATH overrides for the duration of a scenario.
 *
 * The working directory is process-global: scenarios that must not observe
 * each other's scope run in separate processes.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('environment-scope');

export interface EnvironmentScopeOptions {
  /** Working directory while the scope is active */
  cwd: string;
}

/**
 * Run `fn` with the working directory switched to `options.cwd`. The previous
 * working directory and PATH are restored on every exit path.
 */
export async function withScenarioEnvironment<T>(
  options: EnvironmentScopeOptions,
  fn: () => Promise<T>
): Promise<T> {
  const previousCwd = process.cwd();
  const previousPath = process.env['PATH'];

  process.chdir(options.cwd);
  log.debug({ cwd: options.cwd }, 'Entered scenario environment');

  try {
    return await fn();
  } finally {
    process.chdir(previousCwd);
    if (previousPath === undefined) {
      delete process.env['PATH'];
    } else {
      process.env['PATH'] = previousPath;
    }
    log.debug({ cwd: previousCwd }, 'Restored environment');
  }
}
