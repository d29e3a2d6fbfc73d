import { z } from 'zod';
import { BundleMode } from '../types/index.js';

export const modeOptionSchema = z.enum([BundleMode.ONE_DIR, BundleMode.ONE_FILE, 'all']);

export const runCommandOptionsSchema = z.object({
  mode: modeOptionSchema.default('all'),
  name: z.string().min(1).optional(),
  manifestName: z.string().min(1).optional(),
  toolArg: z.array(z.string()).default([]),
  appArg: z.array(z.string()).default([]),
  scriptsDir: z.string().min(1).optional(),
  manifestsDir: z.string().min(1).optional(),
  workDir: z.string().min(1).optional(),
  timeout: z.coerce.number().int().min(0).optional(),
  keep: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type RunCommandOptions = z.infer<typeof runCommandOptionsSchema>;

export const inspectCommandOptionsSchema = z.object({
  platform: z.enum(['windows', 'macos', 'unix']).optional(),
  manifestsDir: z.string().min(1).optional(),
  manifestName: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

export type InspectCommandOptions = z.infer<typeof inspectCommandOptionsSchema>;

export interface ValidationError {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Validate raw command options against a schema.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Modes selected by the `--mode` option.
 */
export function selectModes(mode: z.infer<typeof modeOptionSchema>): BundleMode[] {
  return mode === 'all' ? [BundleMode.ONE_DIR, BundleMode.ONE_FILE] : [mode];
}
