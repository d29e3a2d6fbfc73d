import { join } from 'node:path';
import { homedir } from 'node:os';
import { mkdir } from 'node:fs/promises';

let packcheckRoot: string | null = null;

export function getPackcheckRoot(): string {
  if (packcheckRoot) {
    return packcheckRoot;
  }

  packcheckRoot = process.env['PACKCHECK_ROOT'] ?? join(homedir(), '.packcheck');
  return packcheckRoot;
}

export function setPackcheckRoot(root: string | null): void {
  packcheckRoot = root;
}

export function getTmpDir(): string {
  return join(getPackcheckRoot(), 'tmp');
}

export async function ensureTmpDir(): Promise<string> {
  const dir = getTmpDir();
  await mkdir(dir, { recursive: true });
  return dir;
}
