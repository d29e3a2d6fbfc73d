/**
 * Per-platform capabilities used when locating and running artifacts.
 * Adding a platform means adding a row here, not new branches elsewhere.
 */

import { win32 } from 'node:path';
import { Platform } from '../types/index.js';

export interface PlatformCapabilities {
  /** Appended to every artifact path template */
  executableSuffix: string;
  /** Application bundle layouts exist on this platform */
  appBundles: boolean;
  /**
   * Directories the child PATH is rebuilt from, in order.
   * `null` means the child gets no PATH at all.
   */
  systemSearchPath: ((env: NodeJS.ProcessEnv) => string[]) | null;
  /** Separator used when joining `systemSearchPath` */
  pathDelimiter: string;
  /** Whether `./name` resolves against the child's working directory */
  relativeInvocation: boolean;
}

/**
 * Minimal Windows search path: `%SystemRoot%\system32;%SystemRoot%`.
 */
function windowsSystemPath(env: NodeJS.ProcessEnv): string[] {
  const systemRoot = env['SystemRoot'] ?? env['SYSTEMROOT'] ?? 'C:\\Windows';
  return [win32.join(systemRoot, 'system32'), systemRoot];
}

export const PLATFORM_CAPABILITIES: Record<Platform, PlatformCapabilities> = {
  [Platform.WINDOWS]: {
    executableSuffix: '.exe',
    appBundles: false,
    systemSearchPath: windowsSystemPath,
    pathDelimiter: ';',
    // CreateProcess does not search the child's cwd for the program
    relativeInvocation: false,
  },
  [Platform.MACOS]: {
    executableSuffix: '',
    appBundles: true,
    systemSearchPath: null,
    pathDelimiter: ':',
    relativeInvocation: true,
  },
  [Platform.UNIX]: {
    executableSuffix: '',
    appBundles: false,
    systemSearchPath: null,
    pathDelimiter: ':',
    relativeInvocation: true,
  },
};

/**
 * Map a Node.js platform id onto a harness platform.
 */
export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  switch (nodePlatform) {
    case 'win32':
      return Platform.WINDOWS;
    case 'darwin':
      return Platform.MACOS;
    default:
      return Platform.UNIX;
  }
}

export function getCapabilities(platform: Platform): PlatformCapabilities {
  return PLATFORM_CAPABILITIES[platform];
}
