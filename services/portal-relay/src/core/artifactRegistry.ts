import { rm } from 'fs/promises';
import { fileExists } from './artifacts.js';
import { DuplicateKeyError, errorMessage } from './errors.js';
import type { ExpiryScheduler } from './expiryScheduler.js';

export interface Artifact {
  file_id: string;
  path: string;
  logical_date: string;
  created_at: string;
  expires_at: string;
}

export type ArtifactLookup =
  | { status: 'found'; artifact: Artifact }
  | { status: 'not_found' }
  | { status: 'expired' };

interface Entry {
  artifact: Artifact;
  expiresAtMs: number;
}

export interface ArtifactRegistryOptions {
  scheduler: ExpiryScheduler;
  now?: () => number;
}

/**
 * Process-local index of downloadable artifacts.
 *
 * Not durable: a restart forgets every entry, and the startup sweep removes
 * the files those entries pointed at. Expiry is checked on every `resolve`
 * against the clock, so a late or lost timer never makes a stale file
 * servable.
 */
export class ArtifactRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly scheduler: ExpiryScheduler;
  private readonly now: () => number;

  constructor(options: ArtifactRegistryOptions) {
    this.scheduler = options.scheduler;
    this.now = options.now ?? Date.now;
  }

  register(fileId: string, path: string, logicalDate: string, ttlSeconds: number): Artifact {
    if (this.entries.has(fileId)) {
      throw new DuplicateKeyError(fileId);
    }

    const createdAtMs = this.now();
    const ttlMs = ttlSeconds * 1000;
    const expiresAtMs = createdAtMs + ttlMs;
    const artifact: Artifact = {
      file_id: fileId,
      path,
      logical_date: logicalDate,
      created_at: new Date(createdAtMs).toISOString(),
      expires_at: new Date(expiresAtMs).toISOString(),
    };

    this.entries.set(fileId, { artifact, expiresAtMs });
    this.scheduler.schedule(ttlMs, () => this.evict(fileId), `artifact eviction file_id=${fileId}`);
    return artifact;
  }

  async resolve(fileId: string): Promise<ArtifactLookup> {
    const entry = this.entries.get(fileId);
    if (!entry) return { status: 'not_found' };

    if (this.now() >= entry.expiresAtMs) {
      await this.evict(fileId);
      return { status: 'expired' };
    }

    if (!(await fileExists(entry.artifact.path))) {
      await this.evict(fileId);
      return { status: 'expired' };
    }

    return { status: 'found', artifact: { ...entry.artifact } };
  }

  async evict(fileId: string): Promise<void> {
    const entry = this.entries.get(fileId);
    if (!entry) return;
    this.entries.delete(fileId);

    try {
      await rm(entry.artifact.path, { force: true });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`[portal-relay] artifact delete failed file_id=${fileId} error=${errorMessage(error)}`);
    }
  }

  size(): number {
    return this.entries.size;
  }
}
