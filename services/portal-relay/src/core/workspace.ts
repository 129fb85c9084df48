import { randomUUID } from 'crypto';
import { mkdir, readdir, rm } from 'fs/promises';
import { basename, join } from 'path';
import { errorMessage, ResourceExhaustedError } from './errors.js';

/**
 * Scratch directory owned by exactly one in-flight job.
 *
 * Providers ask for diagnostic paths through `diagnosticPath`, which is how
 * the job runner later knows which files to salvage on failure.
 */
export class Workspace {
  private readonly diagnostics = new Set<string>();

  constructor(
    readonly id: string,
    readonly dir: string,
  ) {}

  path(name: string): string {
    return join(this.dir, basename(name));
  }

  diagnosticPath(name: string): string {
    const path = this.path(name);
    this.diagnostics.add(path);
    return path;
  }

  diagnosticFiles(): string[] {
    return [...this.diagnostics];
  }
}

export class WorkspaceManager {
  constructor(private readonly rootDir: string) {}

  async acquire(): Promise<Workspace> {
    const id = randomUUID();
    const dir = join(this.rootDir, id);

    try {
      await mkdir(this.rootDir, { recursive: true });
      await mkdir(dir);
    } catch (error) {
      throw new ResourceExhaustedError(`Could not create workspace: ${errorMessage(error)}`);
    }

    return new Workspace(id, dir);
  }

  async release(workspace: Workspace): Promise<void> {
    try {
      await rm(workspace.dir, { recursive: true, force: true });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`[portal-relay] workspace cleanup failed workspace_id=${workspace.id} error=${errorMessage(error)}`);
    }
  }

  /** Removes workspaces left behind by a previous process. */
  async sweep(): Promise<number> {
    await mkdir(this.rootDir, { recursive: true });
    const entries = await readdir(this.rootDir);
    for (const entry of entries) {
      await rm(join(this.rootDir, entry), { recursive: true, force: true });
    }
    return entries.length;
  }
}
