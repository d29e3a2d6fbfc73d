// Artifact
export interface Artifact {
  /** Absolute path to the executable */
  readonly path: string;
  /** Identifier derived from the file stem, used to pair manifests */
  readonly id: string;
  /** Multipackage suffix character, or null for a primary artifact */
  readonly suffix: string | null;
}

// Execution Result
export interface ExecutionResult {
  artifact: Artifact;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  durationMs: number;
}

export interface RunOptions {
  /** 0 or undefined disables the limit */
  timeoutMs?: number;
  /** Source environment to derive the child's from; defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
}
