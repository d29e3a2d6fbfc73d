import { execa } from 'execa';
import type { ContentLister, ContentListing } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('lister');

export const DEFAULT_LIST_ARGS = ['--list', '--brief'] as const;

const decoder = new TextDecoder('utf-8');

/**
 * Split raw listing output into entry names, one per line.
 */
export function parseListing(output: string | Uint8Array): ContentListing {
  const text = typeof output === 'string' ? output : decoder.decode(output);
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Content lister backed by an external command that prints one archive entry
 * per line: `<command> <...args> <artifact>`.
 */
export function createCommandLister(
  command: string,
  args: readonly string[] = DEFAULT_LIST_ARGS
): ContentLister {
  return async (artifactPath: string): Promise<ContentListing> => {
    log.debug({ command, args, artifactPath }, 'Listing artifact contents');

    const result = await execa(command, [...args, artifactPath], {
      encoding: 'utf8',
      stripFinalNewline: true,
    });

    const listing = parseListing(result.stdout);
    log.debug({ artifactPath, entries: listing.length }, 'Artifact contents listed');
    return listing;
  };
}
