import { randomUUID } from 'crypto';
import { copyFile, mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { fileExists } from './artifacts.js';
import { errorMessage, NotFoundError } from './errors.js';
import { isObject, isUuid } from './validation.js';

const MANIFEST_NAME = '.manifest.json';

export type DebugFileType = 'image' | 'html' | 'other';

export interface DebugFile {
  name: string;
  url: string;
  type: DebugFileType;
  size: number;
}

export interface DebugSessionSummary {
  debug_id: string;
  created_at: string;
  file_count: number;
}

export interface DebugSessionDetail {
  debug_id: string;
  created_at: string;
  files: DebugFile[];
}

interface Manifest {
  debug_id: string;
  created_at: string;
  files: string[];
}

export interface DebugBucketOptions {
  rootDir: string;
  /** Public URL prefix under which `rootDir` is served. */
  publicUrl: string;
  maxSessions: number;
  retentionHours: number;
  now?: () => number;
}

export function debugFileType(name: string): DebugFileType {
  const ext = extname(name).toLowerCase();
  if (ext === '.png' || ext === '.jpg' || ext === '.jpeg') return 'image';
  if (ext === '.html' || ext === '.htm') return 'html';
  return 'other';
}

function isManifest(value: unknown): value is Manifest {
  return (
    isObject(value) &&
    typeof value.debug_id === 'string' &&
    typeof value.created_at === 'string' &&
    Array.isArray(value.files) &&
    value.files.every((file) => typeof file === 'string')
  );
}

/**
 * Failure diagnostics kept apart from job workspaces.
 *
 * Each session is a directory holding copies of the files a failed job
 * reported, plus a manifest naming them. Sessions are bounded by count and
 * age through `prune`.
 */
export class DebugBucketIndex {
  private readonly now: () => number;

  constructor(private readonly options: DebugBucketOptions) {
    this.now = options.now ?? Date.now;
  }

  async createSession(files: string[]): Promise<DebugSessionDetail | undefined> {
    const existing: string[] = [];
    for (const file of files) {
      if (await fileExists(file)) existing.push(file);
    }
    if (existing.length === 0) return undefined;

    const debugId = randomUUID();
    const dir = join(this.options.rootDir, debugId);
    await mkdir(dir, { recursive: true });

    const names: string[] = [];
    const manifest: Manifest = {
      debug_id: debugId,
      created_at: new Date(this.now()).toISOString(),
      files: names,
    };
    try {
      for (const file of existing) {
        const name = basename(file);
        if (names.includes(name)) continue;
        await copyFile(file, join(dir, name));
        names.push(name);
      }
      await writeFile(join(dir, MANIFEST_NAME), JSON.stringify(manifest, null, 2));
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      throw error;
    }

    try {
      await this.prune();
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`[portal-relay] debug prune failed error=${errorMessage(error)}`);
    }

    return this.describe(manifest);
  }

  async list(): Promise<DebugSessionSummary[]> {
    const manifests = await this.readManifests();
    return manifests.map((manifest) => ({
      debug_id: manifest.debug_id,
      created_at: manifest.created_at,
      file_count: manifest.files.length,
    }));
  }

  async get(debugId: string): Promise<DebugSessionDetail> {
    const manifest = isUuid(debugId) ? await this.readManifest(debugId) : undefined;
    if (!manifest) {
      throw new NotFoundError(`Debug session not found: ${debugId}`, 'DEBUG_SESSION_NOT_FOUND');
    }
    return this.describe(manifest);
  }

  /** Drops sessions beyond the count cap or older than the retention window. */
  async prune(): Promise<number> {
    const manifests = await this.readManifests();
    const cutoffMs = this.now() - this.options.retentionHours * 60 * 60 * 1000;
    let removed = 0;

    for (const [index, manifest] of manifests.entries()) {
      const tooMany = index >= this.options.maxSessions;
      const tooOld = Date.parse(manifest.created_at) < cutoffMs;
      if (!tooMany && !tooOld) continue;
      await rm(join(this.options.rootDir, manifest.debug_id), { recursive: true, force: true });
      removed += 1;
    }

    return removed;
  }

  fileUrl(debugId: string, name: string): string {
    return `${this.options.publicUrl}/${debugId}/${encodeURIComponent(name)}`;
  }

  private async describe(manifest: Manifest): Promise<DebugSessionDetail> {
    const files: DebugFile[] = [];
    for (const name of manifest.files) {
      const path = join(this.options.rootDir, manifest.debug_id, name);
      let size: number;
      try {
        size = (await stat(path)).size;
      } catch {
        continue;
      }
      files.push({ name, url: this.fileUrl(manifest.debug_id, name), type: debugFileType(name), size });
    }

    return { debug_id: manifest.debug_id, created_at: manifest.created_at, files };
  }

  /** Newest first. */
  private async readManifests(): Promise<Manifest[]> {
    await mkdir(this.options.rootDir, { recursive: true });
    const entries = await readdir(this.options.rootDir);
    const manifests: Manifest[] = [];

    for (const entry of entries) {
      if (!isUuid(entry)) continue;
      const manifest = await this.readManifest(entry);
      if (manifest) manifests.push(manifest);
    }

    return manifests.sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
  }

  private async readManifest(debugId: string): Promise<Manifest | undefined> {
    let raw: string;
    try {
      raw = await readFile(join(this.options.rootDir, debugId, MANIFEST_NAME), 'utf8');
    } catch {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isManifest(parsed) && parsed.debug_id === debugId ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
}
