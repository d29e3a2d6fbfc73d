import type { Platform } from '../types/index.js';
import { getCapabilities } from '../platform/index.js';

/**
 * Build the environment for an artifact run.
 *
 * Starts from a copy of `baseEnv` with every spelling of PATH removed. On
 * platforms that need a minimal search path, PATH is rebuilt from the system
 * directories only; the original value never reaches the child.
 */
export function buildChildEnv(
  baseEnv: NodeJS.ProcessEnv,
  platform: Platform
): Record<string, string> {
  const env: Record<string, string> = {};

  for (const [key, value] of Object.entries(baseEnv)) {
    if (value === undefined) continue;
    if (key.toUpperCase() === 'PATH') continue;
    env[key] = value;
  }

  const { systemSearchPath, pathDelimiter } = getCapabilities(platform);
  if (systemSearchPath) {
    env['PATH'] = systemSearchPath(baseEnv).join(pathDelimiter);
  }

  return env;
}
