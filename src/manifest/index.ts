/**
 * Manifest module.
 * Discovery, parsing and verification of expected-content manifests.
 */

export { ManifestParseError, ManifestValidationError } from './errors.js';
export {
  parseManifestPatterns,
  manifestPatternsSchema,
  manifestId,
  loadManifest,
  loadManifests,
} from './parser.js';
export {
  discoverManifests,
  stripScenarioPrefix,
  MANIFEST_EXTENSION,
  SCENARIO_PREFIX,
} from './discovery.js';
export {
  matchPatterns,
  matchesAtStart,
  compileAnchored,
  compareCodePoints,
  type PatternMatch,
  type MatchResult,
} from './matcher.js';
export { verifyManifests, pairArtifacts } from './verifier.js';
export { createCommandLister, parseListing, DEFAULT_LIST_ARGS } from './lister.js';
export { parseListLiteral, decodeEscapes } from './literal.js';
