import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DebugBucketIndex } from './debugBuckets.js';
import { sweepExpired, sweepOnStartup, type StoreSweepTargets } from './maintenance.js';
import { WorkspaceManager } from './workspace.js';

describe('store sweeps', () => {
  let root: string;
  let targets: StoreSweepTargets;
  const now = Date.parse('2024-03-15T08:00:00.000Z');

  async function aged(path: string, ageMs: number): Promise<void> {
    const time = new Date(now - ageMs);
    await utimes(path, time, time);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'relay-sweep-'));
    targets = {
      workspaces: new WorkspaceManager(join(root, 'work')),
      debug: new DebugBucketIndex({
        rootDir: join(root, 'debug'),
        publicUrl: 'http://relay.test/files/debug',
        maxSessions: 5,
        retentionHours: 1,
        now: () => now,
      }),
      reportsDir: join(root, 'reports'),
      imagesDir: join(root, 'images'),
      artifactTtlSeconds: 3600,
      imageTtlSeconds: 600,
    };
    await mkdir(targets.reportsDir);
    await mkdir(targets.imagesDir);
    await writeFile(join(targets.reportsDir, 'fresh.xlsx'), 'x');
    await aged(join(targets.reportsDir, 'fresh.xlsx'), 60_000);
    await mkdir(join(targets.imagesDir, 'old-set'));
    await aged(join(targets.imagesDir, 'old-set'), 20 * 60_000);
    await mkdir(join(targets.imagesDir, 'new-set'));
    await aged(join(targets.imagesDir, 'new-set'), 60_000);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('clears workspaces and every report at startup', async () => {
    await targets.workspaces.acquire();

    const counts = await sweepOnStartup(targets, now);

    expect(counts).toEqual({ workspaces: 1, reports: 1, images: 1, debugSessions: 0 });
    expect(await readdir(targets.reportsDir)).toEqual([]);
    expect(await readdir(targets.imagesDir)).toEqual(['new-set']);
  });

  it('keeps live reports and workspaces in the periodic sweep', async () => {
    const workspace = await targets.workspaces.acquire();

    const counts = await sweepExpired(targets, now);

    expect(counts).toEqual({ reports: 0, images: 1, debugSessions: 0 });
    expect(await readdir(targets.reportsDir)).toEqual(['fresh.xlsx']);
    expect(await readdir(join(root, 'work'))).toEqual([workspace.id]);
  });
});
