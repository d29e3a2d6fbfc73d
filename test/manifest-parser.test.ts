/**
 * Manifest Parser Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import {
  ManifestParseError,
  ManifestValidationError,
  loadManifest,
  manifestId,
  matchPatterns,
  parseManifestPatterns,
} from '../src/manifest/index.js';

describe('parseManifestPatterns', () => {
  it('should parse a flow-style list literal', () => {
    expect(parseManifestPatterns("['^lib.*\\.so', 'main', \"data/.*\"]")).toEqual([
      '^lib.*\\.so',
      'main',
      'data/.*',
    ]);
  });

  it('should decode escaped backslashes in single-quoted items', () => {
    const patterns = parseManifestPatterns("['^lib.*\\\\.so$']");

    expect(patterns).toEqual(['^lib.*\\.so$']);
    expect(matchPatterns(patterns, ['libfoo.so']).missing).toEqual([]);
  });

  it('should keep unknown escapes in double-quoted items', () => {
    // File text: ["^lib.*\.so$", "^data\\\\dir"]
    const patterns = parseManifestPatterns('["^lib.*\\.so$", "^data\\\\\\\\dir"]');

    expect(patterns).toEqual(['^lib.*\\.so$', '^data\\\\dir']);
    expect(matchPatterns(patterns, ['libfoo.so', 'data\\dir']).missing).toEqual([]);
  });

  it('should leave raw items undecoded', () => {
    expect(parseManifestPatterns("[r'^a\\\\b', 'c']")).toEqual(['^a\\\\b', 'c']);
  });

  it('should accept a trailing comma', () => {
    expect(parseManifestPatterns("['a', 'b',]")).toEqual(['a', 'b']);
  });

  it('should reject nested lists', () => {
    expect(() => parseManifestPatterns("['a', ['b']]", 'x.toc')).toThrow(ManifestValidationError);
  });

  it('should parse a block sequence', () => {
    expect(parseManifestPatterns('- base_library.zip\n- ^struct\n')).toEqual([
      'base_library.zip',
      '^struct',
    ]);
  });

  it('should parse a JSON array', () => {
    expect(parseManifestPatterns('["a", "b"]')).toEqual(['a', 'b']);
  });

  it('should reject content that is not a list', () => {
    expect(() => parseManifestPatterns('pattern: value', 'x.toc')).toThrow(ManifestValidationError);
  });

  it('should reject list items that are not strings', () => {
    expect(() => parseManifestPatterns('[1, 2]', 'x.toc')).toThrow(ManifestValidationError);
  });

  it('should reject invalid regular expressions', () => {
    try {
      parseManifestPatterns("['ok', '(unclosed']", 'bad.toc');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestValidationError);
      if (error instanceof ManifestValidationError) {
        expect(error.manifestPath).toBe('bad.toc');
        expect(error.validationErrors).toEqual(['1: Invalid regular expression']);
      }
    }
  });

  it('should reject malformed YAML', () => {
    expect(() => parseManifestPatterns("['unterminated", 'x.toc')).toThrow(ManifestParseError);
  });

  it('should treat expressions as plain data', () => {
    expect(() => parseManifestPatterns("__import__('os').system('true')", 'x.toc')).toThrow(
      ManifestValidationError
    );
  });
});

describe('manifestId', () => {
  it('should drop the directory and extension', () => {
    expect(manifestId('/m/test_app_1.toc')).toBe('test_app_1');
    expect(manifestId('app.toc')).toBe('app');
  });
});

describe('loadManifest', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('should read a manifest file', async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), 'manifest-'));
    const file = path.join(dir, 'app.toc');
    await fs.writeFile(file, "['^lib', 'main']\n");

    expect(await loadManifest(file)).toEqual({
      path: file,
      id: 'app',
      patterns: ['^lib', 'main'],
    });
  });
});
