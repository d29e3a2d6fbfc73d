/**
 * Manifest Verifier Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { pairArtifacts, verifyManifests } from '../src/manifest/index.js';
import type { Artifact, ContentListing, Manifest } from '../src/types/index.js';

const app: Artifact = { path: '/dist/app/app', id: 'app', suffix: null };
const app2: Artifact = { path: '/dist/app/app_2', id: 'app_2', suffix: '2' };

function fakeLister(listings: Record<string, ContentListing>) {
  return vi.fn(async (artifactPath: string): Promise<ContentListing> => listings[artifactPath] ?? []);
}

describe('pairArtifacts', () => {
  const byId = new Map([
    ['app', [app]],
    ['app_2', [app2]],
  ]);

  it('should pair by identifier', () => {
    expect(pairArtifacts({ path: '/m/app_2.toc', id: 'app_2', patterns: [] }, byId)).toEqual([app2]);
  });

  it('should pair a prefixed scenario manifest with the unprefixed artifact', () => {
    expect(pairArtifacts({ path: '/m/test_app.toc', id: 'test_app', patterns: [] }, byId)).toEqual([
      app,
    ]);
  });

  it('should return nothing when no identifier matches', () => {
    expect(pairArtifacts({ path: '/m/app_3.toc', id: 'app_3', patterns: [] }, byId)).toEqual([]);
  });
});

describe('verifyManifests', () => {
  it('should pass when every pattern is found', async () => {
    const lister = fakeLister({ '/dist/app/app': ['libfoo.so', 'main'] });
    const manifests: Manifest[] = [{ path: '/m/app.toc', id: 'app', patterns: ['^lib.*\\.so$'] }];

    const outcome = await verifyManifests([app], manifests, lister);

    expect(outcome.ok).toBe(true);
    expect(outcome.missing).toEqual([]);
    expect(outcome.checks).toEqual([
      { manifest: '/m/app.toc', artifact: '/dist/app/app', matched: 1, missing: 0 },
    ]);
    expect(lister).toHaveBeenCalledWith('/dist/app/app');
  });

  it('should report a missing pattern with its artifact', async () => {
    const lister = fakeLister({ '/dist/app/app': ['a.txt', 'b.txt'] });
    const manifests: Manifest[] = [
      { path: '/m/app.toc', id: 'app', patterns: ['^missing\\.txt$'] },
    ];

    const outcome = await verifyManifests([app], manifests, lister);

    expect(outcome.ok).toBe(false);
    expect(outcome.missing).toEqual([
      {
        kind: 'pattern',
        pattern: '^missing\\.txt$',
        artifact: '/dist/app/app',
        manifest: '/m/app.toc',
      },
    ]);
  });

  it('should report a manifest without an artifact', async () => {
    const lister = fakeLister({});
    const manifests: Manifest[] = [{ path: '/m/app_5.toc', id: 'app_5', patterns: ['x'] }];

    const outcome = await verifyManifests([app], manifests, lister);

    expect(outcome.ok).toBe(false);
    expect(outcome.missing).toEqual([{ kind: 'artifact', manifest: '/m/app_5.toc' }]);
    expect(outcome.checks).toEqual([
      { manifest: '/m/app_5.toc', artifact: null, matched: 0, missing: 0 },
    ]);
    expect(lister).not.toHaveBeenCalled();
  });

  it('should collect every mismatch across manifests', async () => {
    const lister = fakeLister({
      '/dist/app/app': ['main'],
      '/dist/app/app_2': ['other'],
    });
    const manifests: Manifest[] = [
      { path: '/m/app_2.toc', id: 'app_2', patterns: ['z2', 'other'] },
      { path: '/m/app.toc', id: 'app', patterns: ['y', 'main', 'x'] },
      { path: '/m/app_9.toc', id: 'app_9', patterns: [] },
    ];

    const outcome = await verifyManifests([app, app2], manifests, lister);

    expect(outcome.ok).toBe(false);
    expect(outcome.missing).toEqual([
      { kind: 'pattern', pattern: 'x', artifact: '/dist/app/app', manifest: '/m/app.toc' },
      { kind: 'pattern', pattern: 'y', artifact: '/dist/app/app', manifest: '/m/app.toc' },
      { kind: 'pattern', pattern: 'z2', artifact: '/dist/app/app_2', manifest: '/m/app_2.toc' },
      { kind: 'artifact', manifest: '/m/app_9.toc' },
    ]);
  });

  it('should check every artifact that shares the manifest identifier', async () => {
    const oneFile: Artifact = { path: '/dist/app', id: 'app', suffix: null };
    const lister = fakeLister({
      '/dist/app': ['main'],
      '/dist/app/app': ['libfoo.so'],
    });
    const manifests: Manifest[] = [{ path: '/m/app.toc', id: 'app', patterns: ['main'] }];

    const outcome = await verifyManifests([oneFile, app], manifests, lister);

    expect(lister.mock.calls.map(([artifactPath]) => artifactPath)).toEqual(['/dist/app', '/dist/app/app']);
    expect(outcome.checks).toEqual([
      { manifest: '/m/app.toc', artifact: '/dist/app', matched: 1, missing: 0 },
      { manifest: '/m/app.toc', artifact: '/dist/app/app', matched: 0, missing: 1 },
    ]);
    expect(outcome.missing).toEqual([
      { kind: 'pattern', pattern: 'main', artifact: '/dist/app/app', manifest: '/m/app.toc' },
    ]);
  });

  it('should pass with no manifests', async () => {
    const outcome = await verifyManifests([app], [], fakeLister({}));
    expect(outcome).toEqual({ ok: true, missing: [], checks: [] });
  });
});
