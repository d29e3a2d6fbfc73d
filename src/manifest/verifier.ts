/**
 * Manifest verifier.
 * Pairs each manifest with the artifact it describes and checks that every
 * expected pattern appears in the artifact's content listing.
 */

import type {
  Artifact,
  ContentLister,
  Manifest,
  ManifestCheck,
  MissingEntry,
  VerifyOutcome,
} from '../types/index.js';
import { compareCodePoints, matchPatterns } from './matcher.js';
import { SCENARIO_PREFIX, stripScenarioPrefix } from './discovery.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('manifest-verifier');

/**
 * Find the artifacts a manifest describes, by identifier. A primary manifest
 * named after the scenario (`test_<name>`) also pairs with `<name>`. Several
 * layouts can yield the same identifier; all of them are returned.
 */
export function pairArtifacts(
  manifest: Manifest,
  artifactsById: ReadonlyMap<string, readonly Artifact[]>
): readonly Artifact[] {
  const direct = artifactsById.get(manifest.id) ?? [];
  if (direct.length > 0 || !manifest.id.startsWith(SCENARIO_PREFIX)) {
    return direct;
  }
  return artifactsById.get(stripScenarioPrefix(manifest.id)) ?? [];
}

function groupById(artifacts: readonly Artifact[]): Map<string, Artifact[]> {
  const groups = new Map<string, Artifact[]>();
  for (const artifact of artifacts) {
    const group = groups.get(artifact.id);
    if (group) {
      group.push(artifact);
    } else {
      groups.set(artifact.id, [artifact]);
    }
  }
  return groups;
}

/**
 * Verify all manifests. Every missing pattern and missing artifact is
 * collected before the outcome is returned.
 */
export async function verifyManifests(
  artifacts: readonly Artifact[],
  manifests: readonly Manifest[],
  lister: ContentLister
): Promise<VerifyOutcome> {
  const artifactsById = groupById(artifacts);
  const missing: MissingEntry[] = [];
  const checks: ManifestCheck[] = [];

  const ordered = [...manifests].sort((a, b) => compareCodePoints(a.path, b.path));

  for (const manifest of ordered) {
    log.info({ manifest: manifest.path }, 'Matching manifest');

    const paired = pairArtifacts(manifest, artifactsById);
    if (paired.length === 0) {
      log.warn({ manifest: manifest.path, id: manifest.id }, 'No artifact for manifest');
      missing.push({ kind: 'artifact', manifest: manifest.path });
      checks.push({ manifest: manifest.path, artifact: null, matched: 0, missing: 0 });
      continue;
    }
    if (paired.length > 1) {
      log.warn(
        { manifest: manifest.path, artifacts: paired.map((a) => a.path) },
        'Several artifacts share the manifest identifier; checking each'
      );
    }

    for (const artifact of paired) {
      const listing = await lister(artifact.path);
      const result = matchPatterns(manifest.patterns, listing);

      for (const match of result.matches) {
        log.debug({ pattern: match.pattern, entry: match.entry }, `MATCH: ${match.pattern}`);
      }
      for (const pattern of result.missing) {
        log.debug({ pattern, artifact: artifact.path }, `MISSING: ${pattern}`);
        missing.push({ kind: 'pattern', pattern, artifact: artifact.path, manifest: manifest.path });
      }

      checks.push({
        manifest: manifest.path,
        artifact: artifact.path,
        matched: result.matches.length,
        missing: result.missing.length,
      });
    }
  }

  const outcome: VerifyOutcome = { ok: missing.length === 0, missing, checks };

  log.info(
    { ok: outcome.ok, manifests: ordered.length, missing: missing.length },
    'Manifest verification complete'
  );

  return outcome;
}
