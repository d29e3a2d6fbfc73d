import { z } from 'zod';

// Bundle Mode
export const BundleMode = {
  ONE_DIR: 'onedir',
  ONE_FILE: 'onefile',
} as const;

export type BundleMode = (typeof BundleMode)[keyof typeof BundleMode];

export const BUNDLE_MODES: readonly BundleMode[] = [BundleMode.ONE_DIR, BundleMode.ONE_FILE];

// Platform
export const Platform = {
  WINDOWS: 'windows',
  MACOS: 'macos',
  UNIX: 'unix',
} as const;

export type Platform = (typeof Platform)[keyof typeof Platform];

/**
 * The caller's precomputed dependency graph. Opaque to the harness; it must be
 * structured-cloneable because every build receives its own copy.
 */
export type DependencyGraph = unknown;

// Build Request
export const buildRequestSchema = z.object({
  scriptPath: z.string().min(1),
  appName: z.string().min(1),
  mode: z.enum([BundleMode.ONE_DIR, BundleMode.ONE_FILE]),
  toolArgs: z.array(z.string()).default([]),
  specDir: z.string().min(1),
  distDir: z.string().min(1),
  buildDir: z.string().min(1),
});

export type BuildRequestInput = z.input<typeof buildRequestSchema>;

export interface BuildRequest {
  readonly scriptPath: string;
  readonly appName: string;
  readonly mode: BundleMode;
  readonly toolArgs: readonly string[];
  readonly specDir: string;
  readonly distDir: string;
  readonly buildDir: string;
}

// Build Outcome
export interface BuildOutcome {
  success: boolean;
  distDir: string;
  exitCode: number | null;
}

// Packaging tool configuration handed to every invocation
export interface ToolConfig {
  /** Directory the tool persists its own configuration/cache into */
  configDir: string;
  /** Private copy of the caller's dependency graph */
  dependencyGraph: DependencyGraph;
}

export interface ToolRunResult {
  exitCode: number | null;
}
