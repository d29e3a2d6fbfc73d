/**
 * Artifact locator.
 * Reconstructs the executables a build produced from naming conventions alone.
 */

import { basename, resolve } from 'node:path';
import fg from 'fast-glob';
import { BUNDLE_MODES, type Artifact, type Platform } from '../types/index.js';
import {
  NAME_TOKEN,
  PathTemplateKind,
  detectPlatform,
  getCapabilities,
  getTemplates,
  type PathTemplate,
} from '../platform/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('locator');

/** Wildcard matching the single multipackage suffix character. */
const MULTIPACKAGE_WILDCARD = '_?';

export interface CandidatePattern {
  pattern: string;
  kind: PathTemplateKind;
}

/**
 * Expand one template into a glob pattern below `distDir`.
 */
export function expandTemplate(template: PathTemplate, distDir: string, name: string): string {
  const escapedName = fg.escapePath(name);
  const segments = template.segments.map((segment) => segment.split(NAME_TOKEN).join(escapedName));
  const last = segments.length - 1;
  const wildcard = template.kind === PathTemplateKind.MULTIPACKAGE ? MULTIPACKAGE_WILDCARD : '';
  segments[last] = `${segments[last] ?? ''}${wildcard}${template.suffix}`;

  return [fg.convertPathToPattern(distDir), ...segments].join('/');
}

/**
 * All candidate patterns for a platform, across every bundle mode, without duplicates.
 */
export function candidatePatterns(distDir: string, name: string, platform: Platform): CandidatePattern[] {
  const seen = new Set<string>();
  const candidates: CandidatePattern[] = [];

  for (const mode of BUNDLE_MODES) {
    for (const template of getTemplates(platform, mode)) {
      const pattern = expandTemplate(template, distDir, name);
      if (seen.has(pattern)) continue;
      seen.add(pattern);
      candidates.push({ pattern, kind: template.kind });
    }
  }

  return candidates;
}

/**
 * Strip the platform executable suffix from a file name.
 */
function stripExecutableSuffix(fileName: string, suffix: string): string {
  if (suffix && fileName.toLowerCase().endsWith(suffix.toLowerCase())) {
    return fileName.slice(0, -suffix.length);
  }
  return fileName;
}

function toArtifact(path: string, kind: PathTemplateKind, platform: Platform): Artifact {
  const id = stripExecutableSuffix(basename(path), getCapabilities(platform).executableSuffix);
  const suffix = kind === PathTemplateKind.MULTIPACKAGE ? id.slice(-1) : null;
  return Object.freeze({ path, id, suffix });
}

/**
 * Primary artifacts first, then multipackage variants by suffix; path breaks ties.
 */
export function compareArtifacts(a: Artifact, b: Artifact): number {
  const suffixA = a.suffix ?? '';
  const suffixB = b.suffix ?? '';
  if (suffixA !== suffixB) {
    return suffixA < suffixB ? -1 : 1;
  }
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

/**
 * Find every executable built for `name` under `distDir`.
 * Directories matching a pattern are discarded. An empty result means the
 * build produced nothing recognizable; callers treat that as a failure.
 */
export async function locate(
  distDir: string,
  name: string,
  platform: Platform = detectPlatform()
): Promise<Artifact[]> {
  const found = new Map<string, Artifact>();

  for (const { pattern, kind } of candidatePatterns(distDir, name, platform)) {
    const matches = await fg(pattern, {
      onlyFiles: true,
      absolute: true,
      dot: true,
      unique: true,
    });

    for (const match of matches) {
      const path = resolve(match);
      if (!found.has(path)) {
        found.set(path, toArtifact(path, kind, platform));
      }
    }
  }

  const artifacts = [...found.values()].sort(compareArtifacts);

  log.debug(
    { distDir, name, platform, artifacts: artifacts.map((a) => a.path) },
    'Located artifacts'
  );

  return artifacts;
}
