import { copyFile, mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DebugBucketIndex, debugFileType } from './debugBuckets.js';
import { NotFoundError } from './errors.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, copyFile: vi.fn(actual.copyFile) };
});

describe('DebugBucketIndex', () => {
  let root: string;
  let source: string;
  let clock: number;

  const index = (overrides: { maxSessions?: number; retentionHours?: number } = {}) =>
    new DebugBucketIndex({
      rootDir: join(root, 'debug'),
      publicUrl: 'http://relay.test/files/debug',
      maxSessions: overrides.maxSessions ?? 10,
      retentionHours: overrides.retentionHours ?? 24,
      now: () => clock,
    });

  async function diagnostics(): Promise<string[]> {
    const screenshot = join(source, 'login_error_screenshot.png');
    const html = join(source, 'login_page_source.html');
    await writeFile(screenshot, 'png-bytes');
    await writeFile(html, '<html></html>');
    return [screenshot, html];
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'relay-debug-'));
    source = join(root, 'source');
    await mkdir(source);
    clock = Date.parse('2024-03-15T08:00:00.000Z');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('copies existing files into a new session', async () => {
    const subject = index();
    const files = await diagnostics();

    const session = await subject.createSession([...files, join(source, 'never-written.png')]);

    expect(session?.created_at).toBe('2024-03-15T08:00:00.000Z');
    expect(session?.files).toEqual([
      {
        name: 'login_error_screenshot.png',
        url: `http://relay.test/files/debug/${session?.debug_id}/login_error_screenshot.png`,
        type: 'image',
        size: 9,
      },
      {
        name: 'login_page_source.html',
        url: `http://relay.test/files/debug/${session?.debug_id}/login_page_source.html`,
        type: 'html',
        size: 13,
      },
    ]);
  });

  it('removes a half-copied session', async () => {
    const files = await diagnostics();
    const actual = await vi.importActual<typeof import('fs/promises')>('fs/promises');
    vi.mocked(copyFile).mockImplementationOnce(actual.copyFile).mockRejectedValueOnce(new Error('disk full'));

    await expect(index().createSession(files)).rejects.toThrow('disk full');
    expect(await readdir(join(root, 'debug'))).toEqual([]);
    expect(await index().list()).toEqual([]);
  });

  it('creates nothing when no diagnostic file exists', async () => {
    const subject = index();

    expect(await subject.createSession([join(source, 'missing.png')])).toBeUndefined();
    expect(await subject.list()).toEqual([]);
  });

  it('lists sessions newest first and retrieves one', async () => {
    const subject = index();
    const files = await diagnostics();
    const first = await subject.createSession(files);
    clock += 1000;
    const second = await subject.createSession(files);

    const sessions = await subject.list();

    expect(sessions.map((session) => session.debug_id)).toEqual([second?.debug_id, first?.debug_id]);
    expect(sessions[0]?.file_count).toBe(2);
    expect((await subject.get(first?.debug_id ?? '')).files).toHaveLength(2);
  });

  it('rejects unknown and malformed ids', async () => {
    const subject = index();

    await expect(subject.get('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(NotFoundError);
    await expect(subject.get('../work')).rejects.toMatchObject({ code: 'DEBUG_SESSION_NOT_FOUND', statusCode: 404 });
  });

  it('keeps at most maxSessions sessions', async () => {
    const subject = index({ maxSessions: 2 });
    const files = await diagnostics();
    const oldest = await subject.createSession(files);
    clock += 1000;
    await subject.createSession(files);
    clock += 1000;
    await subject.createSession(files);

    const ids = (await subject.list()).map((session) => session.debug_id);

    expect(ids).toHaveLength(2);
    expect(ids).not.toContain(oldest?.debug_id);
    expect(await readdir(join(root, 'debug'))).toHaveLength(2);
  });

  it('prunes sessions older than the retention window', async () => {
    const subject = index({ retentionHours: 1 });
    await subject.createSession(await diagnostics());

    clock += 2 * 60 * 60 * 1000;

    expect(await subject.prune()).toBe(1);
    expect(await subject.list()).toEqual([]);
  });
});

describe('debugFileType', () => {
  it('classifies by extension', () => {
    expect(debugFileType('shot.JPG')).toBe('image');
    expect(debugFileType('page.htm')).toBe('html');
    expect(debugFileType('trace.zip')).toBe('other');
  });
});
