import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtifactRegistry } from './artifactRegistry.js';
import { fileExists } from './artifacts.js';
import { DuplicateKeyError } from './errors.js';
import { ExpiryScheduler } from './expiryScheduler.js';

describe('ArtifactRegistry', () => {
  let dir: string;
  let scheduler: ExpiryScheduler;
  let clock: number;

  const registry = () => new ArtifactRegistry({ scheduler, now: () => clock });

  async function storedFile(name: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, 'spreadsheet');
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-registry-'));
    scheduler = new ExpiryScheduler();
    clock = Date.parse('2024-03-15T08:00:00.000Z');
  });

  afterEach(async () => {
    scheduler.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('resolves a registered artifact with its metadata', async () => {
    const subject = registry();
    const path = await storedFile('a.xlsx');

    const artifact = subject.register('file-1', path, '2024-03-15', 3600);
    const lookup = await subject.resolve('file-1');

    expect(artifact.created_at).toBe('2024-03-15T08:00:00.000Z');
    expect(artifact.expires_at).toBe('2024-03-15T09:00:00.000Z');
    expect(lookup).toEqual({ status: 'found', artifact });
    expect(scheduler.pending()).toBe(1);
  });

  it('returns not_found for an unknown id', async () => {
    expect(await registry().resolve('missing')).toEqual({ status: 'not_found' });
  });

  it('expires at the deadline, deletes the file, then forgets the id', async () => {
    const subject = registry();
    const path = await storedFile('b.xlsx');
    subject.register('file-2', path, '2024-03-15', 60);

    clock += 59_999;
    expect((await subject.resolve('file-2')).status).toBe('found');

    clock += 1;
    expect(await subject.resolve('file-2')).toEqual({ status: 'expired' });
    expect(await fileExists(path)).toBe(false);

    clock -= 30_000;
    expect(await subject.resolve('file-2')).toEqual({ status: 'not_found' });
  });

  it('treats a missing backing file as expired', async () => {
    const subject = registry();
    const path = await storedFile('c.xlsx');
    subject.register('file-3', path, '2024-03-15', 3600);
    await rm(path);

    expect(await subject.resolve('file-3')).toEqual({ status: 'expired' });
    expect(subject.size()).toBe(0);
  });

  it('evicts idempotently', async () => {
    const subject = registry();
    const path = await storedFile('d.xlsx');
    subject.register('file-4', path, '2024-03-15', 3600);

    await subject.evict('file-4');
    await subject.evict('file-4');

    expect(subject.size()).toBe(0);
    expect(await fileExists(path)).toBe(false);
  });

  it('rejects a duplicate id', async () => {
    const subject = registry();
    const path = await storedFile('e.xlsx');
    subject.register('file-5', path, '2024-03-15', 3600);

    expect(() => subject.register('file-5', path, '2024-03-16', 3600)).toThrow(DuplicateKeyError);
  });
});
