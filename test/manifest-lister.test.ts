/**
 * Content Lister Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { createCommandLister, parseListing } from '../src/manifest/index.js';

describe('parseListing', () => {
  it('should split lines and drop blanks', () => {
    expect(parseListing('libfoo.so\r\n  main  \n\nbase_library.zip\n')).toEqual([
      'libfoo.so',
      'main',
      'base_library.zip',
    ]);
  });

  it('should decode bytes as UTF-8', () => {
    expect(parseListing(new TextEncoder().encode('données.txt\nb'))).toEqual(['données.txt', 'b']);
  });
});

describe('createCommandLister', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(tmpdir(), 'lister-')));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should run the listing command with the artifact path last', async () => {
    const command = path.join(dir, 'fake-viewer');
    await fs.writeFile(
      command,
      [
        `#!${process.execPath}`,
        "process.stdout.write(process.argv.slice(2).join('\\n') + '\\n');",
      ].join('\n'),
      { mode: 0o755 }
    );

    const lister = createCommandLister(command);

    expect(await lister('/dist/app/app')).toEqual(['--list', '--brief', '/dist/app/app']);
  });

  it('should reject when the listing command fails', async () => {
    const command = path.join(dir, 'broken-viewer');
    await fs.writeFile(command, `#!${process.execPath}\nprocess.exit(1);\n`, { mode: 0o755 });

    await expect(createCommandLister(command, [])('/dist/app')).rejects.toThrow();
  });
});
