/**
 * Artifact naming conventions.
 *
 * A template is a list of path segments below the dist directory in which
 * `{name}` stands for the artifact base name. The last segment is the
 * executable itself; multipackage templates accept one extra suffix character.
 */

import { BundleMode, Platform } from '../types/index.js';
import { getCapabilities } from './capabilities.js';

export const NAME_TOKEN = '{name}';

export const PathTemplateKind = {
  PRIMARY: 'primary',
  MULTIPACKAGE: 'multipackage',
  APP_BUNDLE: 'app-bundle',
} as const;

export type PathTemplateKind = (typeof PathTemplateKind)[keyof typeof PathTemplateKind];

export interface PathTemplate {
  kind: PathTemplateKind;
  segments: readonly string[];
  /** Appended to the final segment, e.g. `.exe` */
  suffix: string;
}

const ONE_DIR_SEGMENTS = [NAME_TOKEN, NAME_TOKEN] as const;
const ONE_FILE_SEGMENTS = [NAME_TOKEN] as const;
const APP_BUNDLE_SEGMENTS = [`${NAME_TOKEN}.app`, 'Contents', 'MacOS', NAME_TOKEN] as const;

function templatesFor(platform: Platform, mode: BundleMode): PathTemplate[] {
  const { executableSuffix, appBundles } = getCapabilities(platform);
  const segments = mode === BundleMode.ONE_DIR ? ONE_DIR_SEGMENTS : ONE_FILE_SEGMENTS;

  const templates: PathTemplate[] = [
    { kind: PathTemplateKind.PRIMARY, segments, suffix: executableSuffix },
    { kind: PathTemplateKind.MULTIPACKAGE, segments, suffix: executableSuffix },
  ];

  if (appBundles) {
    templates.push({ kind: PathTemplateKind.APP_BUNDLE, segments: APP_BUNDLE_SEGMENTS, suffix: '' });
  }

  return templates;
}

/**
 * Convention table keyed by (platform, bundle mode).
 */
export const CONVENTION_TABLE: Record<Platform, Record<BundleMode, readonly PathTemplate[]>> = {
  [Platform.WINDOWS]: {
    [BundleMode.ONE_DIR]: templatesFor(Platform.WINDOWS, BundleMode.ONE_DIR),
    [BundleMode.ONE_FILE]: templatesFor(Platform.WINDOWS, BundleMode.ONE_FILE),
  },
  [Platform.MACOS]: {
    [BundleMode.ONE_DIR]: templatesFor(Platform.MACOS, BundleMode.ONE_DIR),
    [BundleMode.ONE_FILE]: templatesFor(Platform.MACOS, BundleMode.ONE_FILE),
  },
  [Platform.UNIX]: {
    [BundleMode.ONE_DIR]: templatesFor(Platform.UNIX, BundleMode.ONE_DIR),
    [BundleMode.ONE_FILE]: templatesFor(Platform.UNIX, BundleMode.ONE_FILE),
  },
};

export function getTemplates(platform: Platform, mode: BundleMode): readonly PathTemplate[] {
  return CONVENTION_TABLE[platform][mode];
}
