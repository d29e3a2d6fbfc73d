/**
 * Errors raised while reading manifest (.toc) files.
 */

import type { ZodError } from 'zod';

/**
 * Error thrown when a manifest file is not valid YAML/JSON.
 */
export class ManifestParseError extends Error {
  readonly name = 'ManifestParseError';
  readonly manifestPath: string;
  readonly parseError: Error;

  constructor(manifestPath: string, parseError: Error) {
    super(`Failed to parse manifest at ${manifestPath}: ${parseError.message}`);
    this.manifestPath = manifestPath;
    this.parseError = parseError;
    Object.setPrototypeOf(this, ManifestParseError.prototype);
  }
}

/**
 * Error thrown when a manifest is not a list of valid patterns.
 */
export class ManifestValidationError extends Error {
  readonly name = 'ManifestValidationError';
  readonly manifestPath: string;
  readonly validationErrors: string[];

  constructor(manifestPath: string, zodError: ZodError) {
    const validationErrors = zodError.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`
    );
    super(`Manifest validation failed for ${manifestPath}: ${validationErrors.join('; ')}`);
    this.manifestPath = manifestPath;
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, ManifestValidationError.prototype);
  }
}
