import { resolve } from 'node:path';
import fg from 'fast-glob';
import { createLogger } from '../utils/logger.js';
import { compareCodePoints } from './matcher.js';

const log = createLogger('manifest-discovery');

export const MANIFEST_EXTENSION = '.toc';

/** Conventional prefix of scenario names, dropped for multipackage manifests. */
export const SCENARIO_PREFIX = 'test_';

export function stripScenarioPrefix(name: string): string {
  return name.startsWith(SCENARIO_PREFIX) ? name.slice(SCENARIO_PREFIX.length) : name;
}

/**
 * Find the manifests belonging to a scenario: `<baseName>.toc` for the
 * primary artifact and `<stripped>_?.toc` for multipackage variants.
 * @returns Absolute paths in sorted order
 */
export async function discoverManifests(manifestsDir: string, baseName: string): Promise<string[]> {
  const patterns = [
    `${fg.escapePath(baseName)}${MANIFEST_EXTENSION}`,
    `${fg.escapePath(stripScenarioPrefix(baseName))}_?${MANIFEST_EXTENSION}`,
  ];

  const found = await fg(patterns, {
    cwd: manifestsDir,
    onlyFiles: true,
    absolute: true,
    unique: true,
  });

  const manifests = [...new Set(found.map((p) => resolve(p)))].sort(compareCodePoints);

  log.debug({ manifestsDir, baseName, manifests }, 'Discovered manifests');
  return manifests;
}
