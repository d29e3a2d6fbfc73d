// Manifest (.toc)
export interface Manifest {
  /** Path of the manifest file */
  path: string;
  /** File stem, matched against artifact identifiers */
  id: string;
  /** Patterns in declaration order */
  patterns: string[];
}

/**
 * Flat list of internal file names of an artifact.
 */
export type ContentListing = readonly string[];

/**
 * Maps an artifact path to its content listing.
 */
export type ContentLister = (artifactPath: string) => Promise<ContentListing>;

// Missing entries
export type MissingEntry =
  | { kind: 'pattern'; pattern: string; artifact: string; manifest: string }
  | { kind: 'artifact'; manifest: string };

export interface ManifestCheck {
  manifest: string;
  artifact: string | null;
  matched: number;
  missing: number;
}

// Verify Outcome
export interface VerifyOutcome {
  ok: boolean;
  missing: MissingEntry[];
  checks: ManifestCheck[];
}
