/**
 * Parser for manifest (.toc) files.
 *
 * A manifest is a list literal (`['^lib.*\\.so$', 'main']`, decoded with
 * string-literal escapes) or any other YAML/JSON sequence of regular
 * expressions. Content is only ever parsed as data.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Manifest } from '../types/index.js';
import { ManifestParseError, ManifestValidationError } from './errors.js';
import { parseListLiteral } from './literal.js';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export const manifestPatternsSchema = z.array(
  z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' })
);

/**
 * Parse manifest content into its ordered pattern list.
 * @throws ManifestParseError if the content is not YAML/JSON
 * @throws ManifestValidationError if it is not a list of valid patterns
 */
export function parseManifestPatterns(content: string, manifestPath = '<string>'): string[] {
  let parsed: unknown;

  try {
    parsed = parseListLiteral(content) ?? parseYaml(content);
  } catch (error) {
    throw new ManifestParseError(
      manifestPath,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  const result = manifestPatternsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ManifestValidationError(manifestPath, result.error);
  }

  return result.data;
}

/**
 * Manifest identifier: the file name without its extension.
 */
export function manifestId(manifestPath: string): string {
  const name = basename(manifestPath);
  return name.slice(0, name.length - extname(name).length);
}

/**
 * Read and parse one manifest file.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  const content = await readFile(manifestPath, 'utf-8');
  return {
    path: manifestPath,
    id: manifestId(manifestPath),
    patterns: parseManifestPatterns(content, manifestPath),
  };
}

export async function loadManifests(manifestPaths: readonly string[]): Promise<Manifest[]> {
  const manifests: Manifest[] = [];
  for (const manifestPath of manifestPaths) {
    manifests.push(await loadManifest(manifestPath));
  }
  return manifests;
}
