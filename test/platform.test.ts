/**
 * Platform Convention Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
  CONVENTION_TABLE,
  PathTemplateKind,
  detectPlatform,
  getCapabilities,
  getTemplates,
} from '../src/platform/index.js';
import { BundleMode, Platform } from '../src/types/index.js';

describe('detectPlatform', () => {
  it('should map Node platform ids', () => {
    expect(detectPlatform('win32')).toBe(Platform.WINDOWS);
    expect(detectPlatform('darwin')).toBe(Platform.MACOS);
    expect(detectPlatform('linux')).toBe(Platform.UNIX);
    expect(detectPlatform('freebsd')).toBe(Platform.UNIX);
  });
});

describe('Convention table', () => {
  it('should have a row for every platform and bundle mode', () => {
    for (const platform of Object.values(Platform)) {
      for (const mode of Object.values(BundleMode)) {
        expect(CONVENTION_TABLE[platform][mode].length).toBeGreaterThanOrEqual(2);
      }
    }
  });

  it('should describe one-dir layouts as <name>/<name>', () => {
    const [primary, multipackage] = getTemplates(Platform.UNIX, BundleMode.ONE_DIR);

    expect(primary).toEqual({
      kind: PathTemplateKind.PRIMARY,
      segments: ['{name}', '{name}'],
      suffix: '',
    });
    expect(multipackage?.kind).toBe(PathTemplateKind.MULTIPACKAGE);
    expect(multipackage?.segments).toEqual(['{name}', '{name}']);
  });

  it('should describe one-file layouts as a single segment', () => {
    const [primary] = getTemplates(Platform.UNIX, BundleMode.ONE_FILE);
    expect(primary?.segments).toEqual(['{name}']);
  });

  it('should append .exe on Windows', () => {
    for (const template of getTemplates(Platform.WINDOWS, BundleMode.ONE_FILE)) {
      expect(template.suffix).toBe('.exe');
    }
  });

  it('should add the application bundle layout on macOS only', () => {
    const macKinds = getTemplates(Platform.MACOS, BundleMode.ONE_DIR).map((t) => t.kind);
    const unixKinds = getTemplates(Platform.UNIX, BundleMode.ONE_DIR).map((t) => t.kind);

    expect(macKinds).toContain(PathTemplateKind.APP_BUNDLE);
    expect(unixKinds).not.toContain(PathTemplateKind.APP_BUNDLE);

    const bundle = getTemplates(Platform.MACOS, BundleMode.ONE_FILE).find(
      (t) => t.kind === PathTemplateKind.APP_BUNDLE
    );
    expect(bundle?.segments).toEqual(['{name}.app', 'Contents', 'MacOS', '{name}']);
    expect(bundle?.suffix).toBe('');
  });
});

describe('Platform capabilities', () => {
  it('should rebuild a system search path on Windows', () => {
    const { systemSearchPath } = getCapabilities(Platform.WINDOWS);
    expect(systemSearchPath?.({ SystemRoot: 'D:\\Win' })).toEqual(['D:\\Win\\system32', 'D:\\Win']);
    expect(systemSearchPath?.({})).toEqual(['C:\\Windows\\system32', 'C:\\Windows']);
  });

  it('should give POSIX children no search path', () => {
    expect(getCapabilities(Platform.UNIX).systemSearchPath).toBeNull();
    expect(getCapabilities(Platform.MACOS).systemSearchPath).toBeNull();
  });

  it('should invoke relatively only where the host resolves against cwd', () => {
    expect(getCapabilities(Platform.UNIX).relativeInvocation).toBe(true);
    expect(getCapabilities(Platform.WINDOWS).relativeInvocation).toBe(false);
  });
});
