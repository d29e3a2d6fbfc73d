export {
  locate,
  candidatePatterns,
  expandTemplate,
  compareArtifacts,
  type CandidatePattern,
} from './locator.js';
