import { mkdir, rm, readdir } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { ensureTmpDir, getTmpDir } from './paths.js';
import { createLogger } from './logger.js';

const log = createLogger('temp');

export async function createTempDir(prefix: string): Promise<string> {
  const tmpRoot = await ensureTmpDir();

  const dirName = `${prefix}-${nanoid(8)}`;
  const dirPath = join(tmpRoot, dirName);
  await mkdir(dirPath, { recursive: true });

  log.debug({ dirPath }, 'Created temp directory');
  return dirPath;
}

export async function removeTempDir(path: string): Promise<void> {
  const tmpRoot = resolve(getTmpDir());
  const target = resolve(path);

  if (!target.startsWith(tmpRoot + sep)) {
    throw new Error(`Refusing to remove directory outside tmp: ${path}`);
  }

  try {
    await rm(target, { recursive: true, force: true });
    log.debug({ path: target }, 'Removed temp directory');
  } catch (error) {
    log.warn({ path: target, error }, 'Failed to remove temp directory');
  }
}

export async function listTempDirs(): Promise<string[]> {
  const tmpRoot = getTmpDir();

  try {
    const entries = await readdir(tmpRoot, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => join(tmpRoot, e.name));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
}
