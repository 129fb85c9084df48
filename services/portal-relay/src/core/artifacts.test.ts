import { mkdir, mkdtemp, readdir, rm, symlink, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { collisionFreeName, moveIntoStore, sweepDirectory, timestampSlug } from './artifacts.js';

describe('artifact file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('formats a local timestamp slug', () => {
    expect(timestampSlug(new Date(2024, 2, 5, 7, 8, 9))).toBe('20240305_070809');
  });

  it('builds unique names and keeps only plain extensions', () => {
    const date = new Date(2024, 2, 15, 8, 0, 0);
    const a = collisionFreeName('/work/x/report.XLSX', 'bin', date);
    const b = collisionFreeName('/work/y/report.xlsx', 'bin', date);

    expect(a).toMatch(/^20240315_080000_[0-9a-f-]{36}\.xlsx$/);
    expect(a).not.toBe(b);
    expect(collisionFreeName('/work/x/report.tar-gz!', 'xlsx', date)).toMatch(/\.xlsx$/);
  });

  it('moves a file into the store directory', async () => {
    const source = join(dir, 'download.xlsx');
    await writeFile(source, 'data');

    const target = await moveIntoStore(source, join(dir, 'reports'), 'stored.xlsx');

    expect(target).toBe(join(dir, 'reports', 'stored.xlsx'));
    expect(await readdir(dir)).toEqual(['reports']);
  });

  it('sweeps entries older than the cutoff', async () => {
    const now = Date.parse('2024-03-15T08:00:00.000Z');
    await writeFile(join(dir, 'old.xlsx'), 'x');
    await mkdir(join(dir, 'old-set'));
    await writeFile(join(dir, 'fresh.xlsx'), 'x');
    const twoHoursAgo = new Date(now - 2 * 60 * 60 * 1000);
    await utimes(join(dir, 'old.xlsx'), twoHoursAgo, twoHoursAgo);
    await utimes(join(dir, 'old-set'), twoHoursAgo, twoHoursAgo);
    const fresh = new Date(now - 60 * 1000);
    await utimes(join(dir, 'fresh.xlsx'), fresh, fresh);

    expect(await sweepDirectory(dir, 60 * 60 * 1000, now)).toBe(2);
    expect(await readdir(dir)).toEqual(['fresh.xlsx']);
  });

  it('skips entries that vanish between listing and stat', async () => {
    const now = Date.parse('2024-03-15T08:00:00.000Z');
    await writeFile(join(dir, 'old.xlsx'), 'x');
    const twoHoursAgo = new Date(now - 2 * 60 * 60 * 1000);
    await utimes(join(dir, 'old.xlsx'), twoHoursAgo, twoHoursAgo);
    await symlink(join(dir, 'already-removed.xlsx'), join(dir, 'dangling.xlsx'));

    expect(await sweepDirectory(dir, 60 * 60 * 1000, now)).toBe(1);
    expect(await readdir(dir)).toEqual(['dangling.xlsx']);
  });
});
